// packages/flagtable/src/table.ts
//
// Option-table lookup. First match in table order wins; the table itself is
// never validated here.

import type { OptionDescriptor, OptionTable, OptionTarget } from "shared-types";

export type ResolvedOption<T extends OptionTarget = OptionTarget> = {
  option: OptionDescriptor<T>;
  requiresValue: boolean;
};

export function requiresValue<T extends OptionTarget>(option: OptionDescriptor<T>): boolean {
  if (option.requiresValue !== undefined) return option.requiresValue;
  return option.type !== "bool" && option.type !== "count";
}

export function findShort<T extends OptionTarget>(options: OptionTable<T>, ch: string): ResolvedOption<T> | null {
  const option = options.find((o) => o.short !== undefined && o.short === ch);
  return option ? { option, requiresValue: requiresValue(option) } : null;
}

export function findLong<T extends OptionTarget>(options: OptionTable<T>, name: string): ResolvedOption<T> | null {
  const option = options.find((o) => o.long !== undefined && o.long === name);
  return option ? { option, requiresValue: requiresValue(option) } : null;
}

/** Destination field an option writes: `key`, else the long name, else the short char. */
export function optionKey<T extends OptionTarget>(option: OptionDescriptor<T>): string {
  return option.key ?? option.long ?? option.short ?? "";
}
