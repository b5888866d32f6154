// apps/argv-probe/src/tableSchema.ts
//
// JSON-declared option tables. The engine never validates a table, so this
// is the one place a malformed table is rejected.

import { readFile } from "node:fs/promises";
import Ajv from "ajv";
import type { ErrorObject } from "ajv";
import { CliUsageError } from "cli-utils";
import type { OptionDescriptor, OptionValueType } from "shared-types";

export type JsonOptionEntry = Omit<OptionDescriptor, "set" | "type"> & {
  type: Exclude<OptionValueType, "custom">;
};

export const TABLE_SCHEMA = {
  type: "array",
  items: {
    type: "object",
    additionalProperties: false,
    properties: {
      short: { type: "string", minLength: 1, maxLength: 1, not: { const: "-" } },
      long: { type: "string", minLength: 1, pattern: "^[^=]+$" },
      type: { enum: ["string", "int", "float", "bool", "count", "list"] },
      key: { type: "string", minLength: 1 },
      requiresValue: { type: "boolean" },
      argName: { type: "string" },
      description: { type: "string" },
    },
    required: ["type"],
    anyOf: [{ required: ["short"] }, { required: ["long"] }],
  },
};

const ajv = new Ajv({ allErrors: true, strict: false });
const validateTable = ajv.compile<JsonOptionEntry[]>(TABLE_SCHEMA);

function describeErrors(errors: ErrorObject[] | null | undefined): string {
  return (errors ?? []).map((e) => `  ${e.instancePath || "/"} ${e.message ?? "is invalid"}`).join("\n");
}

export function parseTableJson(raw: string, source: string): JsonOptionEntry[] {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new CliUsageError(`Invalid option table JSON in ${source}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!validateTable(data)) {
    throw new CliUsageError(`Invalid option table in ${source}:\n${describeErrors(validateTable.errors)}`);
  }
  return data;
}

export async function loadTable(tablePath: string): Promise<JsonOptionEntry[]> {
  let raw: string;
  try {
    raw = await readFile(tablePath, "utf-8");
  } catch (err) {
    throw new CliUsageError(`Cannot read option table ${tablePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseTableJson(raw, tablePath);
}
