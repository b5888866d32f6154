import { describe, expect, it } from "vitest";
import { CliUsageError } from "cli-utils";
import { ParseFlags } from "flagtable";
import { HELP_TEXT, parseProbeArgs } from "./cli";

describe("parseProbeArgs", () => {
  it("maps its own flags and passes the rest through", () => {
    const cfg = parseProbeArgs(["argv-probe", "-t", "table.json", "-Sp", "--", "prog", "-v"], {});
    expect(cfg).toEqual({
      help: false,
      tablePath: "table.json",
      name: "prog",
      flags: ParseFlags.Strict | ParseFlags.StrictOrdering,
      argv: ["prog", "-v"],
    });
  });

  it("reads every parse flag from long options", () => {
    const cfg = parseProbeArgs(
      ["argv-probe", "--keep-first", "--no-condense", "--sloppy-shorts", "--double-dash", "--name", "tool"],
      {},
    );
    expect(cfg.flags).toBe(
      ParseFlags.KeepFirst | ParseFlags.NoCondense | ParseFlags.SloppyShorts | ParseFlags.DoubleDash,
    );
    expect(cfg.name).toBe("tool");
    expect(cfg.tablePath).toBeNull();
  });

  it("falls back to the environment for the table path", () => {
    expect(parseProbeArgs(["argv-probe"], { ARGV_PROBE_TABLE: "env.json" }).tablePath).toBe("env.json");
    expect(parseProbeArgs(["argv-probe", "--table=cli.json"], { ARGV_PROBE_TABLE: "env.json" }).tablePath).toBe(
      "cli.json",
    );
  });

  it("rejects positionals before --", () => {
    let caught: unknown;
    try {
      parseProbeArgs(["argv-probe", "stray", "-t", "t.json", "--", "prog", "-v"], {});
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CliUsageError);
    if (caught instanceof CliUsageError) {
      expect(caught.message).toBe(`Unexpected argument before --: stray\n\n${HELP_TEXT}`);
    }
  });

  it("takes only the tokens after the first -- as the probed vector", () => {
    const cfg = parseProbeArgs(["argv-probe", "-t", "t.json", "--", "prog", "--", "x"], {});
    expect(cfg.argv).toEqual(["prog", "--", "x"]);
    expect(parseProbeArgs(["argv-probe", "-t", "t.json"], {}).argv).toEqual([]);
  });

  it("recognizes help", () => {
    expect(parseProbeArgs(["argv-probe", "-h"], {}).help).toBe(true);
  });

  it("turns its own parse errors into usage errors", () => {
    let caught: unknown;
    try {
      parseProbeArgs(["argv-probe", "--bogus"], {});
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CliUsageError);
    if (caught instanceof CliUsageError) {
      expect(caught.message).toBe(`invalid argument: --bogus\n\n${HELP_TEXT}`);
    }
  });

  it("renders help from its option table", () => {
    const lines = HELP_TEXT.split("\n");
    expect(lines.slice(0, 2)).toEqual(["Usage:", "  argv-probe [options...] -- <argv0> [args...]"]);
    expect(lines).toContain("Options:");
    expect(lines.some((l) => l.startsWith("  -t, --table <path>"))).toBe(true);
  });
});
