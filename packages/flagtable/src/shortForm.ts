// packages/flagtable/src/shortForm.ts
//
// Expands one short-form token (`-v`, `-vo`, `-ofile`) against the table.

import type { OptionTarget } from "shared-types";
import { assignValue } from "./assign";
import { fail } from "./errors";
import { ParseFlags, hasFlag } from "./flags";
import { findShort } from "./table";
import type { ContextSettings } from "./context";

/**
 * Applies every option in `content` (the token at `argv[index]` minus its dash)
 * and returns the index of the last token consumed: `index` itself, or
 * `index + 1` when the final option took the following token as its value.
 * Failures are thrown as ParseError.
 */
export function expandShort<T extends OptionTarget>(
  settings: ContextSettings<T>,
  argv: ReadonlyArray<string>,
  index: number,
  content: string,
  dest: T,
): number {
  const { options, flags } = settings;
  const strict = hasFlag(flags, ParseFlags.Strict);
  const sloppy = hasFlag(flags, ParseFlags.SloppyShorts);
  // option characters are code points, not UTF-16 units
  const chars = Array.from(content);

  if (chars.length > 1 && hasFlag(flags, ParseFlags.NoCondense) && !sloppy) {
    throw fail("CombinationNotAllowed", "short options cannot be combined: %s", argv[index] ?? `-${content}`);
  }

  if (chars.length > 1 && sloppy) {
    // the rest of the token is the value, whatever the option's type says
    const ch = chars[0] ?? "";
    const resolved = findShort(options, ch);
    if (!resolved) {
      if (strict) throw fail("UnknownOption", "invalid argument: -%c", ch);
      return index;
    }
    assignValue(dest, resolved.option, content.slice(ch.length), `-${ch}`);
    return index;
  }

  for (const [i, ch] of chars.entries()) {
    const resolved = findShort(options, ch);
    if (!resolved) {
      if (strict) throw fail("UnknownOption", "invalid argument: -%c", ch);
      // non-strict: drop the rest of this token too
      break;
    }

    if (!resolved.requiresValue) {
      assignValue(dest, resolved.option, undefined, `-${ch}`);
      continue;
    }

    if (i !== chars.length - 1) {
      throw fail("CombinedValueNotLast", "combined short option requiring value not last: -%c", ch);
    }

    // consumed whole, even when it looks like another option
    const value = argv[index + 1];
    if (value === undefined) throw fail("MissingValue", "missing option value: -%c", ch);
    assignValue(dest, resolved.option, value, `-${ch}`);
    return index + 1;
  }

  return index;
}
