/**
 * Label encoding: replace numeric answer codes with the text of their paired label column, row by row.
 * No code book is consulted; the label always comes from the same respondent's label cell.
 */

import type { DataRow, ReportIssue, StageResult, SurveySchema, Table } from '../types'
import { memberIndex } from './schemaResolver'
import { cellKey, copyRows, hasColumn, isBlank, isNumericValue } from './table'

export interface LabelOptions {
  skipSentinel: string
  idColumn?: string
  weightColumn?: string
  /** Remove the label columns once their text has been copied */
  dropLabelColumns?: boolean
}

export interface LabelEncoding extends StageResult {
  /** Option column -> option label, for multi-response members whose indicator is kept */
  optionLabels: Record<string, string>
}

/** First non-blank label text in a column, used as the option's name for a multi-response member */
export function optionLabel(rows: DataRow[], labelColumn: string): string | null {
  for (const row of rows) {
    const text = row[labelColumn]
    if (text != null && !isBlank(text)) return String(text).trim()
  }
  return null
}

/**
 * Rename multi-response option columns to their option labels in a wide table.
 * A label that clashes with a name already in use gets _1, _2 ... appended.
 */
export function renameOptionColumns(table: Table, optionLabels: Record<string, string>): Table {
  const used = new Set(table.columns)
  const renames = new Map<string, string>()
  for (const column of table.columns) {
    if (!Object.hasOwn(optionLabels, column)) continue
    const label = optionLabels[column]
    let name = label
    for (let i = 1; used.has(name); i++) name = `${label}_${i}`
    used.add(name)
    renames.set(column, name)
  }

  const columns = table.columns.map((c) => renames.get(c) ?? c)
  const rows = table.rows.map((source) => {
    const row: DataRow = {}
    table.columns.forEach((c, j) => {
      row[columns[j]] = source[c] ?? null
    })
    return row
  })
  return { columns, rows }
}

export function encodeLabels(table: Table, schema: SurveySchema, options: LabelOptions): LabelEncoding {
  const issues: ReportIssue[] = []
  const members = memberIndex(schema)
  const rows = copyRows(table.rows)
  const optionLabels: Record<string, string> = {}
  const paired = new Set<string>()
  const usedLabelColumns = new Set<string>()

  for (const { column, labelColumn } of schema.labelPairs) {
    if (!hasColumn(table, column) || !hasColumn(table, labelColumn)) continue
    paired.add(column)
    usedLabelColumns.add(labelColumn)

    if (members.has(column)) {
      const label = optionLabel(table.rows, labelColumn)
      if (label !== null) {
        optionLabels[column] = label
      } else {
        issues.push({ kind: 'MissingLabelPair', column, message: `Option "${column}" has no text in "${labelColumn}"; option left unlabeled` })
      }
      continue
    }

    let unlabeled = 0
    for (const row of rows) {
      const code = row[column]
      if (isBlank(code) || cellKey(code) === options.skipSentinel) continue
      const text = row[labelColumn]
      if (isBlank(text)) {
        unlabeled++
        continue
      }
      row[column] = text ?? null
    }
    if (unlabeled > 0) {
      issues.push({
        kind: 'MissingLabelPair',
        column,
        count: unlabeled,
        message: `${unlabeled} row(s) of "${column}" have a code but a blank "${labelColumn}"; code kept`,
      })
    }
  }

  for (const set of schema.multiResponseSets) {
    const unpaired = set.columns.filter((c) => hasColumn(table, c) && !paired.has(c))
    if (unpaired.length === 0) continue
    issues.push({
      kind: 'MissingLabelPair',
      column: set.name,
      count: unpaired.length,
      message: `${unpaired.length} option(s) of "${set.name}" have no paired label column: ${unpaired.join(', ')}; left unlabeled`,
    })
  }

  const notResponses = new Set([options.idColumn, options.weightColumn])
  for (const column of schema.singleColumns) {
    if (paired.has(column) || notResponses.has(column) || !hasColumn(table, column)) continue
    const values = table.rows.map((row) => row[column]).filter((v) => !isBlank(v) && cellKey(v) !== options.skipSentinel)
    if (values.length > 0 && values.every((v) => isNumericValue(v))) {
      issues.push({ kind: 'MissingLabelPair', column, message: `Numeric column "${column}" has no paired label column; left unchanged` })
    }
  }

  let columns = [...table.columns]
  if (options.dropLabelColumns) {
    columns = columns.filter((c) => !usedLabelColumns.has(c))
    for (const row of rows) {
      for (const c of usedLabelColumns) delete row[c]
    }
  }

  return { table: { columns, rows }, optionLabels, issues }
}
