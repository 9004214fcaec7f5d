/**
 * Shared types for the SpecRows validator.
 */

/**
 * A number read from document text, kept as its source token so that
 * large integers and forms such as `1.0` are written back unchanged.
 */
export class JsonNumber {
  constructor(readonly source: string) {}

  valueOf(): number {
    return Number(this.source);
  }
}

/** Any value a decoded JSON document can hold */
export type JsonValue =
  | string
  | number
  | JsonNumber
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** A decoded row exactly as it appeared in the document */
export type RawRow = readonly JsonValue[];

/** Decoded SpecRows document (top level already checked) */
export interface SpecDocument {
  /** Every top-level member, `rows` included */
  fields: Record<string, JsonValue>;
  /** The `rows` member */
  rows: readonly JsonValue[];
}

export const ROW_KINDS = ['about', 'help', 'version', 'flag', 'opt', 'arg'] as const;
export type RowKind = (typeof ROW_KINDS)[number];

export const VALUE_KINDS = ['STR', 'PATH', 'U32', 'I32', 'BYTES', 'BYTES_HEX'] as const;
export type ValueKind = (typeof VALUE_KINDS)[number];

export const SCHEMA_VERSION = 'x07cli.specrows@0.1.0';
export const ROOT_SCOPE = 'root';

export const RESERVED_SHORT_HELP = '-h';
export const RESERVED_LONG_HELP = '--help';
export const RESERVED_SHORT_VERSION = '-V';
export const RESERVED_LONG_VERSION = '--version';

/** Recognized members of a row's trailing meta object */
export interface RowMeta {
  /** Echo of the row key, as text */
  key?: string;
  /** Default literal; null when present but not a string */
  default?: string | null;
  required?: boolean;
  multiple?: boolean;
}

interface RowBase {
  /** Position of the row in the document's `rows` array */
  index: number;
  scope: string;
  /** Copy of the positional array, used verbatim in canonical output */
  raw: RawRow;
}

export interface AboutRow extends RowBase {
  kind: 'about';
  text: string;
}

export interface HelpRow extends RowBase {
  kind: 'help';
  shortOpt: string;
  longOpt: string;
  desc: string;
}

export interface VersionRow extends RowBase {
  kind: 'version';
  shortOpt: string;
  longOpt: string;
  desc: string;
}

export interface FlagRow extends RowBase {
  kind: 'flag';
  shortOpt: string;
  longOpt: string;
  key: string;
  desc: string;
  meta?: RowMeta;
}

export interface OptRow extends RowBase {
  kind: 'opt';
  shortOpt: string;
  longOpt: string;
  key: string;
  /** Not narrowed to ValueKind: unknown kinds are reported, not rejected */
  valueKind: string;
  desc: string;
  meta?: RowMeta;
}

export interface ArgRow extends RowBase {
  kind: 'arg';
  posName: string;
  key: string;
  desc: string;
  meta?: RowMeta;
  required: boolean;
  multiple: boolean;
}

export type SpecRow = AboutRow | HelpRow | VersionRow | FlagRow | OptRow | ArgRow;

/** Rows that carry short/long option names */
export type NamedRow = HelpRow | VersionRow | FlagRow | OptRow;

export type Severity = 'error' | 'warn';

export const DIAGNOSTIC_CODES = [
  'SCHEMA_VERSION',
  'ROW_SHAPE',
  'ROW_KIND_UNKNOWN',
  'ABOUT_DUP',
  'HELP_DUP',
  'VERSION_DUP',
  'FLAG_NO_NAMES',
  'OPT_NO_NAMES',
  'RESERVED_HELP_USED',
  'RESERVED_VERSION_USED',
  'DUP_SHORT',
  'DUP_LONG',
  'DUP_KEY',
  'META_KEY_MISMATCH',
  'OPT_VALUE_KIND_UNKNOWN',
  'OPT_DEFAULT_INVALID',
  'ARG_REQUIRED_AFTER_OPTIONAL',
  'ARG_MULTI_DUP',
  'ARG_MULTI_NOT_LAST',
] as const;
export type DiagnosticCode = (typeof DIAGNOSTIC_CODES)[number];

/** One invariant violation, serialized with snake_case keys */
export interface Diagnostic {
  severity: Severity;
  code: DiagnosticCode;
  scope: string;
  /** -1 when not tied to a row */
  row_index: number;
  message: string;
}

/** Rows of one scope split by kind, each in first-seen order */
export interface ScopeGroups {
  about: AboutRow[];
  help: HelpRow[];
  version: VersionRow[];
  flag: FlagRow[];
  opt: OptRow[];
  arg: ArgRow[];
}

/** Name → index of the row that claimed it first */
export interface ScopeClaims {
  shorts: Map<string, number>;
  longs: Map<string, number>;
  keys: Map<string, number>;
}

export interface ScopeValidation {
  scope: string;
  groups: ScopeGroups;
  claims: ScopeClaims;
  diagnostics: Diagnostic[];
}

/** Configuration loaded from .cli-specrows.json */
export interface Config {
  /** Schema version (must be 1) */
  version: number;
  /** Expected document schema_version */
  schema_version?: string;
  /** Per-code severity overrides */
  severity?: Partial<Record<DiagnosticCode, Severity>>;
}

/** Result of config validation */
export interface ValidationResult {
  /** List of validation error messages */
  errors: string[];
}

export interface EngineOptions {
  /** Expected schema_version; defaults to SCHEMA_VERSION */
  schemaVersion?: string;
  severity?: Partial<Record<DiagnosticCode, Severity>>;
  /** Promote every warning to an error */
  strict?: boolean;
}

export interface CanonResult {
  /** Sorted diagnostics */
  diagnostics: Diagnostic[];
  /** True when no diagnostic is an error */
  ok: boolean;
  /** Canonical document, top-level members as JSON */
  canon: Record<string, JsonValue>;
}
