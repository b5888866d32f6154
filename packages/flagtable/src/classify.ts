// packages/flagtable/src/classify.ts
import type { ClassifiedToken } from "shared-types";

/** Leading dash count, capped at 2. */
export function dashRun(token: string): number {
  let size = 0;
  while (size < 2 && token.charAt(size) === "-") size++;
  return size;
}

export function classifyToken(token: string): ClassifiedToken {
  const offset = dashRun(token);
  const content = token.slice(offset);
  if (offset === 0) return { class: "positional", offset, content };
  if (offset === 1) return { class: "short", offset, content };
  return { class: "long", offset, content };
}
