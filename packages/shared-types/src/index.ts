// packages/shared-types/src/index.ts
//
// Canonical contract types shared across the flagtable engine and argv-probe.
// NO runtime logic; only types and type-level unions.

/* ------------------------------------------------------------------ */
/*  Option table                                                       */
/* ------------------------------------------------------------------ */

export type OptionValueType = "string" | "int" | "float" | "bool" | "count" | "list" | "custom";

/** Destination object the value-assignment step writes into. */
export type OptionTarget = Record<string, unknown>;

/** Setter used by `custom` options. Throwing fails the parse with the error's message. */
export type OptionSetter<T extends OptionTarget = OptionTarget> = (
    dest: T,
    value: string | undefined,
    option: OptionDescriptor<T>,
) => void;

export type OptionDescriptor<T extends OptionTarget = OptionTarget> = {
    /** Single character, matched after one leading dash. */
    short?: string;
    /** Name matched after two leading dashes. */
    long?: string;
    type: OptionValueType;
    /** Field of the destination to write. Defaults to `long`, then `short`. */
    key?: string;
    /** Overrides the type-derived default (everything but `bool` and `count` takes a value). */
    requiresValue?: boolean;
    set?: OptionSetter<T>;
    /** Placeholder shown in help output, e.g. `file`. */
    argName?: string;
    description?: string;
};

export type OptionTable<T extends OptionTarget = OptionTarget> = ReadonlyArray<OptionDescriptor<T>>;

/* ------------------------------------------------------------------ */
/*  Classification                                                     */
/* ------------------------------------------------------------------ */

export type TokenClass = "positional" | "short" | "long";

export type ClassifiedToken = {
    class: TokenClass;
    /** Number of leading dashes, capped at 2. */
    offset: number;
    /** Token text after the dash run. */
    content: string;
};

/* ------------------------------------------------------------------ */
/*  Results                                                            */
/* ------------------------------------------------------------------ */

export type ParseErrorKind =
    | "OutOfMemory"
    | "CombinationNotAllowed"
    | "UnknownOption"
    | "MissingValue"
    | "CombinedValueNotLast"
    | "OrderingViolation"
    | "InvalidValue";

/** JSON report printed by argv-probe. */
export type ProbeReport =
    | { ok: true; values: OptionTarget; extras: string[] }
    | { ok: false; kind: ParseErrorKind; message: string };
