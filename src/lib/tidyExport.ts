/**
 * Tidy (long) export: one row per (respondent, option) for each multi-response set,
 * plus a master table that also carries every single-response answer.
 *
 * Row order is respondent order, then option order within a set. Nothing is filtered:
 * a set with k options and n respondents always yields n * k rows, sentinel cells included.
 */

import type { CellValue, DataRow, MultiResponseSet, SurveySchema, Table, TidyExport } from '../types'
import { optionLabel } from './labelEncoder'
import { hasColumn, respondentIds } from './table'

export const LONG_COLUMNS = ['question', 'option', 'option_label', 'value'] as const

export interface TidyOptions {
  idColumn: string
  weightColumn?: string
  /** Respondent attributes repeated on every long row (e.g. strata) */
  carryColumns?: string[]
  /** Option labels found by the label encoder; falls back to the paired label column */
  optionLabels?: Record<string, string>
  includeSingleResponse?: boolean
}

interface LongLayout {
  lead: string[]
  ids: CellValue[]
  labelFor: (column: string) => string | null
}

function layout(table: Table, schema: SurveySchema, options: TidyOptions): LongLayout {
  const lead = [options.idColumn]
  if (options.weightColumn && hasColumn(table, options.weightColumn)) lead.push(options.weightColumn)
  for (const col of options.carryColumns ?? []) {
    if (hasColumn(table, col) && !lead.includes(col)) lead.push(col)
  }

  const labelColumnOf = new Map(schema.labelPairs.map((p) => [p.column, p.labelColumn]))
  const labelFor = (column: string): string | null => {
    const known = options.optionLabels
    if (known && Object.hasOwn(known, column)) return known[column]
    const labelColumn = labelColumnOf.get(column)
    return labelColumn && hasColumn(table, labelColumn) ? optionLabel(table.rows, labelColumn) : null
  }

  return { lead, ids: respondentIds(table, options.idColumn), labelFor }
}

function longRow(
  lead: string[],
  idColumn: string,
  id: CellValue,
  source: DataRow,
  question: string,
  option: string,
  label: string | null
): DataRow {
  const row: DataRow = {}
  for (const col of lead) row[col] = col === idColumn ? id : source[col] ?? null
  row.question = question
  row.option = option
  row.option_label = label
  row.value = source[option] ?? null
  return row
}

function meltSet(table: Table, set: MultiResponseSet, idColumn: string, shape: LongLayout): Table {
  const labels = set.columns.map((col) => shape.labelFor(col))
  const rows: DataRow[] = []
  table.rows.forEach((source, i) => {
    set.columns.forEach((col, j) => {
      rows.push(longRow(shape.lead, idColumn, shape.ids[i], source, set.name, col, labels[j]))
    })
  })
  return { columns: [...shape.lead, ...LONG_COLUMNS], rows }
}

export function exportTidy(table: Table, schema: SurveySchema, options: TidyOptions): TidyExport {
  const shape = layout(table, schema, options)
  const sets: Record<string, Table> = {}
  const masterRows: DataRow[] = []

  for (const set of schema.multiResponseSets) {
    const long = meltSet(table, set, options.idColumn, shape)
    sets[set.name] = long
    masterRows.push(...long.rows)
  }

  if (options.includeSingleResponse ?? true) {
    const lead = new Set(shape.lead)
    for (const col of schema.singleColumns) {
      if (lead.has(col) || !hasColumn(table, col)) continue
      table.rows.forEach((source, i) => {
        masterRows.push(longRow(shape.lead, options.idColumn, shape.ids[i], source, col, col, null))
      })
    }
  }

  return { sets, master: { columns: [...shape.lead, ...LONG_COLUMNS], rows: masterRows } }
}
