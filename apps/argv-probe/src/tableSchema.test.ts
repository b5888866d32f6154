import { describe, expect, it } from "vitest";
import { mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { CliUsageError } from "cli-utils";
import { loadTable, parseTableJson } from "./tableSchema";

function errorMessage(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (err instanceof CliUsageError) return err.message;
    throw err;
  }
  return "";
}

describe("option table schema", () => {
  it("accepts a well-formed table", () => {
    const raw = JSON.stringify([
      { short: "v", long: "verbose", type: "bool", description: "Print more" },
      { long: "output", type: "string", argName: "file" },
    ]);
    expect(parseTableJson(raw, "t.json")).toEqual([
      { short: "v", long: "verbose", type: "bool", description: "Print more" },
      { long: "output", type: "string", argName: "file" },
    ]);
  });

  it("rejects malformed JSON", () => {
    expect(errorMessage(() => parseTableJson("[{", "t.json"))).toMatch(/^Invalid option table JSON in t\.json: /);
  });

  it("rejects custom types and unknown fields", () => {
    const msg = errorMessage(() => parseTableJson('[{"short":"x","type":"custom","extra":1}]', "t.json"));
    expect(msg.split("\n")[0]).toBe("Invalid option table in t.json:");
    expect(msg).toContain("/0/type must be equal to one of the allowed values");
    expect(msg).toContain("/0 must NOT have additional properties");
  });

  it("requires a short or long name", () => {
    const msg = errorMessage(() => parseTableJson('[{"type":"bool"}]', "t.json"));
    expect(msg).toContain("/0 must match a schema in anyOf");
  });

  it("rejects multi-character short names", () => {
    const msg = errorMessage(() => parseTableJson('[{"short":"ab","type":"bool"}]', "t.json"));
    expect(msg).toContain("/0/short must NOT have more than 1 characters");
  });

  it("accepts a short name outside the basic plane", () => {
    expect(parseTableJson('[{"short":"é","type":"bool"},{"short":"😀","type":"bool"}]', "t.json")).toEqual([
      { short: "é", type: "bool" },
      { short: "😀", type: "bool" },
    ]);
  });

  it("loads a table from disk", async () => {
    const dir = path.join(os.tmpdir(), `argv-probe-${Date.now()}`);
    await mkdir(dir, { recursive: true });
    try {
      const tablePath = path.join(dir, "table.json");
      await writeFile(tablePath, JSON.stringify([{ short: "q", type: "bool" }]));
      await expect(loadTable(tablePath)).resolves.toEqual([{ short: "q", type: "bool" }]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("reports a missing table file as a usage error naming the path", async () => {
    const missing = path.join(os.tmpdir(), `argv-probe-missing-${Date.now()}`, "table.json");
    let caught: unknown;
    try {
      await loadTable(missing);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CliUsageError);
    if (caught instanceof CliUsageError) {
      expect(caught.exitCode).toBe(2);
      expect(caught.message.startsWith(`Cannot read option table ${missing}: `)).toBe(true);
    }
  });
});
