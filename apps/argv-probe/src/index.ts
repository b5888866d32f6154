// apps/argv-probe/src/index.ts
import path from "node:path";
import { runMain, usageError } from "cli-utils";
import { HELP_TEXT, TABLE_ENV, parseProbeArgs } from "./cli";
import { runProbe } from "./probe";
import { loadTable } from "./tableSchema";

async function main(): Promise<void> {
  const cfg = parseProbeArgs(process.argv.slice(1));

  if (cfg.help) {
    console.log(HELP_TEXT);
    return;
  }

  if (!cfg.tablePath) {
    throw usageError(`Missing option table: pass --table or set ${TABLE_ENV}.`, HELP_TEXT);
  }

  const cwd = process.env.INIT_CWD ?? process.cwd();
  const table = await loadTable(path.resolve(cwd, cfg.tablePath));
  const report = runProbe(cfg.name, table, cfg.flags, cfg.argv);

  console.log(JSON.stringify(report, null, 2));
  if (!report.ok) process.exitCode = 1;
}

runMain(main);
