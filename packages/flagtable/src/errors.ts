// packages/flagtable/src/errors.ts
//
// Owned per-call error values. Each failed parse gets its own ParseError;
// nothing is kept in module state.

import type { ParseErrorKind } from "shared-types";

export class ParseError extends Error {
  public readonly kind: ParseErrorKind;
  constructor(kind: ParseErrorKind, message: string) {
    super(message);
    this.name = "ParseError";
    this.kind = kind;
  }
}

export type FormatArg = string | number;

/** printf-style rendering: `%s`, `%c` (first code point), `%d` (integer) and `%%`. */
export function formatMessage(fmt: string, ...args: FormatArg[]): string {
  let next = 0;
  return fmt.replace(/%([%scd])/g, (match, spec: string) => {
    if (spec === "%") return "%";
    if (next >= args.length) return match;
    const arg = args[next++];
    if (arg === undefined) return match;
    if (spec === "c") return Array.from(String(arg))[0] ?? "";
    if (spec === "d") return String(Math.trunc(Number(arg)));
    return String(arg);
  });
}

export function fail(kind: ParseErrorKind, fmt: string, ...args: FormatArg[]): ParseError {
  return new ParseError(kind, formatMessage(fmt, ...args));
}
