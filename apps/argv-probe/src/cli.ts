// apps/argv-probe/src/cli.ts
//
// argv-probe's own command line, parsed with flagtable itself.

import { usageError } from "cli-utils";
import { ParseFlags, createContext, formatHelp } from "flagtable";
import type { OptionTable, OptionTarget } from "flagtable";

export const TABLE_ENV = "ARGV_PROBE_TABLE";

export const PROBE_OPTIONS: OptionTable = [
  { short: "t", long: "table", type: "string", argName: "path", description: `Option table JSON (default: $${TABLE_ENV})` },
  { long: "name", type: "string", argName: "name", description: "Program name used in messages (default: prog)" },
  { short: "k", long: "keep-first", type: "bool", description: "Parse the first probed argument instead of skipping it" },
  { short: "p", long: "strict-ordering", type: "bool", description: "Reject options after positional arguments" },
  { short: "n", long: "no-condense", type: "bool", description: "Reject combined short options such as -abc" },
  { short: "s", long: "sloppy-shorts", type: "bool", description: "Read -ofile as -o with inline value file" },
  { short: "S", long: "strict", type: "bool", description: "Fail on unknown options instead of skipping them" },
  { short: "d", long: "double-dash", type: "bool", description: "Treat everything after a bare -- as positional" },
  { short: "h", long: "help", type: "bool", description: "Show this help" },
];

const PROBE_CONTEXT = createContext("argv-probe", PROBE_OPTIONS, ParseFlags.Strict);

export const HELP_TEXT = formatHelp(PROBE_CONTEXT, {
  usage: "[options...] -- <argv0> [args...]",
  prefix: "Parses the arguments after -- against a JSON option table and prints the result as JSON.",
  suffix: [
    "Exit codes:",
    "  0  parse succeeded",
    "  1  parse failed or runtime error",
    "  2  bad arguments / usage",
    "",
    "Examples:",
    "  argv-probe -t table.json -- prog -vo out.txt input.txt",
    "  argv-probe -t table.json -Sp -- prog input.txt -v",
  ].join("\n"),
});

export type ProbeConfig = {
  help: boolean;
  tablePath: string | null;
  name: string;
  flags: number;
  argv: string[];
};

const FLAG_OPTIONS: ReadonlyArray<[string, number]> = [
  ["keep-first", ParseFlags.KeepFirst],
  ["strict-ordering", ParseFlags.StrictOrdering],
  ["no-condense", ParseFlags.NoCondense],
  ["sloppy-shorts", ParseFlags.SloppyShorts],
  ["strict", ParseFlags.Strict],
  ["double-dash", ParseFlags.DoubleDash],
];

function nonEmpty(v: unknown): string | null {
  return typeof v === "string" && v.trim().length > 0 ? v.trim() : null;
}

/**
 * `argv[0]` is the script path and is skipped. The first bare `--` ends
 * argv-probe's own options; everything after it is the probed vector.
 */
export function parseProbeArgs(
  argv: ReadonlyArray<string>,
  env: Record<string, string | undefined> = process.env,
): ProbeConfig {
  const dd = argv.indexOf("--");
  const own = dd === -1 ? argv : argv.slice(0, dd);
  const probed = dd === -1 ? [] : argv.slice(dd + 1);

  const opts: OptionTarget = {};
  const result = PROBE_CONTEXT.parse(own, opts);
  if (!result.ok) throw usageError(result.error.message, HELP_TEXT);
  if (result.count > 0) {
    throw usageError(`Unexpected argument before --: ${result.extras.join(" ")}`, HELP_TEXT);
  }

  let flags = 0;
  for (const [key, bit] of FLAG_OPTIONS) {
    if (opts[key] === true) flags |= bit;
  }

  return {
    help: opts["help"] === true,
    tablePath: nonEmpty(opts["table"]) ?? nonEmpty(env[TABLE_ENV]),
    name: nonEmpty(opts["name"]) ?? "prog",
    flags,
    argv: probed,
  };
}
