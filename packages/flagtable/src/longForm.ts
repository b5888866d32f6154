// packages/flagtable/src/longForm.ts
import type { OptionTarget } from "shared-types";
import { assignValue } from "./assign";
import { fail } from "./errors";
import { ParseFlags, hasFlag } from "./flags";
import { findLong } from "./table";
import type { ContextSettings } from "./context";

/** Splits `name=value` at the first `=`. */
export function splitLong(content: string): { name: string; inline: string | undefined } {
  const eq = content.indexOf("=");
  if (eq === -1) return { name: content, inline: undefined };
  return { name: content.slice(0, eq), inline: content.slice(eq + 1) };
}

/** Same contract as expandShort, for `--name`, `--name=value` and `--name value`. */
export function expandLong<T extends OptionTarget>(
  settings: ContextSettings<T>,
  argv: ReadonlyArray<string>,
  index: number,
  content: string,
  dest: T,
): number {
  const { name, inline } = splitLong(content);
  const label = `--${name}`;

  const resolved = findLong(settings.options, name);
  if (!resolved) {
    if (hasFlag(settings.flags, ParseFlags.Strict)) throw fail("UnknownOption", "invalid argument: %s", label);
    return index;
  }

  if (inline !== undefined) {
    assignValue(dest, resolved.option, inline, label);
    return index;
  }

  if (!resolved.requiresValue) {
    assignValue(dest, resolved.option, undefined, label);
    return index;
  }

  const value = argv[index + 1];
  if (value === undefined) throw fail("MissingValue", "missing option value: %s", label);
  assignValue(dest, resolved.option, value, label);
  return index + 1;
}
