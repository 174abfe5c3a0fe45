/**
 * Core types for statement/parameter correlation
 */

/** Token logged as `id=...`; unique only within one log file. */
export type TransactionId = string;

export type ParameterKind = 'string' | 'integer' | 'long' | 'float' | 'decimal' | 'other';

export interface ParameterBinding {
  kind: ParameterKind;
  typeName: string;      // Type token exactly as logged, e.g. "String", "BigDecimal"
  position: number;      // 1-based
  rawValue: string;
}

/** Bindings keyed by position. Source order is not preserved. */
export type ParameterSet = ReadonlyMap<number, ParameterBinding>;

export type SqlTemplate = string;

export type FillIssue =
  | { kind: 'unsupported-type'; position: number; typeName: string }
  | { kind: 'missing-value'; position: number };

export interface Execution {
  readonly id: TransactionId;
  readonly timestamp: string | null;
  readonly callerName: string;
  readonly logger: string | null;
  readonly template: SqlTemplate;
  readonly filledSql: string;
  readonly fillIssue: FillIssue | null;
  readonly parameters: ParameterSet;
  readonly sequenceIndex: number;
}

export interface QueryGroup {
  templateSql: SqlTemplate;
  prettyTemplateSql: string;
  executions: Execution[];
}

export interface IdSummary {
  id: TransactionId;
  hasSql: boolean;
  parameterSetCount: number;
}

/**
 * Result of a targeted or last-statement lookup. `found: false` is the
 * NotFound condition and always comes with an empty execution list.
 */
export type LocateResult =
  | { found: true; id: TransactionId; executions: Execution[] }
  | { found: false; id: TransactionId | null; executions: [] };
