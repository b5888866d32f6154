// packages/flagtable/src/flags.ts

/** Context configuration bits. Combine with `|`. */
export const ParseFlags = {
  /** Parse argv[0] instead of skipping it as the program name. */
  KeepFirst: 1 << 0,
  /** Options may not follow a positional argument. */
  StrictOrdering: 1 << 1,
  /** `-abc` is rejected unless SloppyShorts is also set. */
  NoCondense: 1 << 2,
  /** `-ofile` means option `o` with inline value `file`. */
  SloppyShorts: 1 << 3,
  /** Unknown options fail the parse instead of being skipped. */
  Strict: 1 << 4,
  /** A bare `--` ends option processing; later tokens are extras. */
  DoubleDash: 1 << 5,
} as const;

export type ParseFlag = (typeof ParseFlags)[keyof typeof ParseFlags];

export function hasFlag(flags: number, flag: ParseFlag): boolean {
  return (flags & flag) !== 0;
}
