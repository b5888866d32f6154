// packages/flagtable/src/help.ts
//
// Usage text rendered from the option table, in the same layout as the
// workspace CLIs' hand-written HELP_TEXT blocks.

import type { OptionDescriptor, OptionTarget } from "shared-types";
import type { ContextSettings } from "./context";
import { requiresValue } from "./table";

export type HelpOptions = {
  /** Text after the program name on the usage line (default: `[options...]`). */
  usage?: string;
  /** Paragraph between the usage line and the option list. */
  prefix?: string;
  /** Paragraph after the option list. */
  suffix?: string;
  /** Minimum gap between the option column and descriptions (default: 2). */
  spacer?: number;
};

export function optionSignature<T extends OptionTarget>(option: OptionDescriptor<T>): string {
  const short = option.short !== undefined ? `-${option.short}` : "  ";
  const sep = option.long === undefined ? "" : option.short !== undefined ? ", " : "  ";
  const long = option.long !== undefined ? `--${option.long}` : "";
  const arg = requiresValue(option) ? ` <${option.argName ?? "value"}>` : "";
  return `${short}${sep}${long}${arg}`;
}

export function formatHelp<T extends OptionTarget>(context: ContextSettings<T>, opts: HelpOptions = {}): string {
  const spacer = opts.spacer ?? 2;
  const lines = ["Usage:", `  ${context.name} ${opts.usage ?? "[options...]"}`];

  if (opts.prefix) lines.push("", opts.prefix);

  if (context.options.length > 0) {
    const signatures = context.options.map((o) => optionSignature(o));
    const width = Math.max(...signatures.map((s) => s.length));
    lines.push("", "Options:");
    context.options.forEach((o, i) => {
      const sig = signatures[i] ?? "";
      lines.push(`  ${sig.padEnd(width + spacer)}${o.description ?? ""}`.trimEnd());
    });
  }

  if (opts.suffix) lines.push("", opts.suffix);
  return lines.join("\n");
}
