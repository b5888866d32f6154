// packages/flagtable/src/index.ts
import type { OptionTarget } from "shared-types";
import type { ParseContext } from "./context";

export type {
  OptionDescriptor,
  OptionSetter,
  OptionTable,
  OptionTarget,
  OptionValueType,
  ParseErrorKind,
  TokenClass,
} from "shared-types";

export { createContext, parseArgv } from "./context";
export type { ContextSettings, ParseContext, ParseResult } from "./context";
export { ParseFlags, hasFlag } from "./flags";
export type { ParseFlag } from "./flags";
export { ParseError, formatMessage } from "./errors";
export { classifyToken } from "./classify";
export { findLong, findShort, requiresValue } from "./table";
export { assignValue, parseBool } from "./assign";
export { formatHelp } from "./help";
export type { HelpOptions } from "./help";

/** Returns the positional arguments, or throws the parse's ParseError. */
export function parseOrThrow<T extends OptionTarget>(ctx: ParseContext<T>, argv: ReadonlyArray<string>, dest: T): string[] {
  const result = ctx.parse(argv, dest);
  if (!result.ok) throw result.error;
  return result.extras;
}
