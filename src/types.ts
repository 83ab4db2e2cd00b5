/** Single cell of a survey table; null is an empty cell */
export type CellValue = string | number | null

/** Row of data keyed by column name */
export type DataRow = Record<string, CellValue>

/** In-memory survey table. Column order is significant, row order is respondent order. */
export interface Table {
  columns: string[]
  rows: DataRow[]
}

/** Group of columns holding the options of one multi-response question */
export interface MultiResponseSet {
  name: string
  /** Member columns in option order */
  columns: string[]
}

/** Dependent cell is skipped unless the gate column holds one of `values` */
export interface SkipRule {
  /** Column name or multi-response set name */
  dependent: string
  gate: string
  values: string[]
}

/** Numeric response column and its per-row label column, e.g. Q3 / Q3(TEXT) */
export interface LabelPair {
  column: string
  labelColumn: string
}

/** Column groupings resolved once from the raw header and shared by every stage */
export interface SurveySchema {
  multiResponseSets: readonly MultiResponseSet[]
  skipRules: readonly SkipRule[]
  labelPairs: readonly LabelPair[]
  /** Columns that are neither set members nor label columns, in table order */
  singleColumns: readonly string[]
}

export type IssueKind =
  | 'SchemaAmbiguity'
  | 'UnresolvedSkipGate'
  | 'UnmatchedStratum'
  | 'MissingLabelPair'
  | 'StructuralInputError'

export interface ReportIssue {
  kind: IssueKind
  message: string
  column?: string
  /** Number of affected rows, where the issue covers several */
  count?: number
}

/** Output of one pipeline stage */
export interface StageResult {
  table: Table
  issues: ReportIssue[]
}

export type StepName = 'schema' | 'missing' | 'weights' | 'labels' | 'tidy'

export type StepStatus = 'completed' | 'failed' | 'disabled'

export interface StepOutcome {
  step: StepName
  status: StepStatus
  message?: string
}

export interface IssueSummary {
  count: number
  examples: ReportIssue[]
}

/** Per-run quality report returned beside the output tables */
export interface RunReport {
  steps: StepOutcome[]
  issues: Record<IssueKind, IssueSummary>
}

/** Long tables produced by the tidy export */
export interface TidyExport {
  /** One long table per multi-response set, keyed by set name */
  sets: Record<string, Table>
  master: Table
}
