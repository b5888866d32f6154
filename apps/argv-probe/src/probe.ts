// apps/argv-probe/src/probe.ts
import { createContext } from "flagtable";
import type { OptionTable, OptionTarget, ProbeReport } from "shared-types";

export function runProbe(name: string, table: OptionTable, flags: number, argv: ReadonlyArray<string>): ProbeReport {
  const ctx = createContext(name, table, flags);
  const values: OptionTarget = {};
  const result = ctx.parse(argv, values);
  if (!result.ok) return { ok: false, kind: result.error.kind, message: result.error.message };
  return { ok: true, values, extras: result.extras };
}
