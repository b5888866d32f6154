// packages/flagtable/src/context.ts
//
// Parse context and the dispatch loop that drives classification, expansion
// and extras collection across one argument vector.

import type { OptionTable, OptionTarget } from "shared-types";
import { classifyToken } from "./classify";
import { ParseError, fail } from "./errors";
import { ExtrasList, MAX_EXTRAS_CAPACITY } from "./extras";
import { ParseFlags, hasFlag } from "./flags";
import { expandLong } from "./longForm";
import { expandShort } from "./shortForm";

export type ContextSettings<T extends OptionTarget = OptionTarget> = {
  readonly name: string;
  readonly options: OptionTable<T>;
  readonly flags: number;
};

export type ParseResult =
  | { ok: true; extras: string[]; count: number }
  | { ok: false; error: ParseError };

export type ParseContext<T extends OptionTarget = OptionTarget> = ContextSettings<T> & {
  /** Applies options to `dest` and returns the positional arguments, or the first error. */
  parse(argv: ReadonlyArray<string>, dest: T): ParseResult;
};

export function createContext<T extends OptionTarget = OptionTarget>(
  name: string,
  options: OptionTable<T>,
  flags = 0,
): ParseContext<T> {
  const settings: ContextSettings<T> = { name, options, flags };
  return Object.freeze({
    ...settings,
    parse: (argv: ReadonlyArray<string>, dest: T) => parseArgv(settings, argv, dest),
  });
}

export function parseArgv<T extends OptionTarget>(
  settings: ContextSettings<T>,
  argv: ReadonlyArray<string>,
  dest: T,
  maxExtras: number = MAX_EXTRAS_CAPACITY,
): ParseResult {
  const { flags } = settings;
  const extras = new ExtrasList(maxExtras);

  try {
    for (let argi = hasFlag(flags, ParseFlags.KeepFirst) ? 0 : 1; argi < argv.length; argi++) {
      const token = argv[argi];
      if (token === undefined) break;

      if (token === "--" && hasFlag(flags, ParseFlags.DoubleDash)) {
        for (const rest of argv.slice(argi + 1)) extras.push(rest);
        break;
      }

      const classified = classifyToken(token);
      if (classified.class === "positional") {
        extras.push(token);
        continue;
      }

      // checked before the option is applied, so dest is left untouched
      if (hasFlag(flags, ParseFlags.StrictOrdering) && extras.count > 0) {
        throw fail("OrderingViolation", "options cannot be specified after arguments: %s", token);
      }

      argi =
        classified.class === "short"
          ? expandShort(settings, argv, argi, classified.content, dest)
          : expandLong(settings, argv, argi, classified.content, dest);
    }
  } catch (err) {
    if (err instanceof ParseError) return { ok: false, error: err };
    throw err;
  }

  return { ok: true, extras: extras.toArray(), count: extras.count };
}
