// packages/flagtable/src/assign.ts
//
// Default value assignment: converts the raw string for an option into the
// destination field named by `optionKey`. `label` is the option as the user
// wrote it (`-o` or `--output`) and is only used in messages.

import type { OptionDescriptor, OptionTarget } from "shared-types";
import { ParseError, fail } from "./errors";
import { optionKey } from "./table";

const TRUE_WORDS = new Set(["1", "true", "yes", "on"]);
const FALSE_WORDS = new Set(["0", "false", "no", "off"]);

export function parseBool(raw: string): boolean | null {
  const v = raw.toLowerCase();
  if (TRUE_WORDS.has(v)) return true;
  if (FALSE_WORDS.has(v)) return false;
  return null;
}

function requireValue(value: string | undefined, label: string): string {
  if (value === undefined) throw fail("MissingValue", "missing option value: %s", label);
  return value;
}

export function assignValue<T extends OptionTarget>(
  dest: T,
  option: OptionDescriptor<T>,
  value: string | undefined,
  label: string,
): void {
  const target: OptionTarget = dest;
  const key = optionKey(option);

  switch (option.type) {
    case "string":
      target[key] = value ?? "";
      return;

    case "int": {
      const raw = requireValue(value, label);
      const n = Number.parseInt(raw, 10);
      if (!/^[+-]?\d+$/.test(raw) || !Number.isSafeInteger(n)) {
        throw fail("InvalidValue", "value is not a valid integer: %s %s", label, raw);
      }
      target[key] = n;
      return;
    }

    case "float": {
      const raw = requireValue(value, label);
      const n = Number(raw);
      if (raw.trim() === "" || !Number.isFinite(n)) {
        throw fail("InvalidValue", "value is not a valid number: %s %s", label, raw);
      }
      target[key] = n;
      return;
    }

    case "bool": {
      if (value === undefined) {
        target[key] = true;
        return;
      }
      const b = parseBool(value);
      if (b === null) throw fail("InvalidValue", "value is not a valid boolean: %s %s", label, value);
      target[key] = b;
      return;
    }

    case "count": {
      if (value !== undefined) throw fail("InvalidValue", "option does not take a value: %s %s", label, value);
      const prev = target[key];
      target[key] = (typeof prev === "number" ? prev : 0) + 1;
      return;
    }

    case "list": {
      const raw = requireValue(value, label);
      const prev = target[key];
      target[key] = Array.isArray(prev) ? [...prev, raw] : [raw];
      return;
    }

    case "custom": {
      if (!option.set) throw fail("InvalidValue", "no setter for option: %s", label);
      try {
        option.set(dest, value, option);
      } catch (err) {
        if (err instanceof ParseError) throw err;
        throw new ParseError("InvalidValue", err instanceof Error ? err.message : String(err));
      }
      return;
    }
  }
}
