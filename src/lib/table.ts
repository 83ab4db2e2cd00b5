import type { CellValue, DataRow, Table } from '../types'

/** Null, or a string with nothing but whitespace */
export function isBlank(value: CellValue | undefined): boolean {
  return value == null || (typeof value === 'string' && value.trim() === '')
}

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/

/**
 * String form used when comparing codes. Numeric text is canonicalized,
 * so 1, '1' and '1.0' are the same answer.
 */
export function cellKey(value: CellValue | undefined): string {
  const text = value == null ? '' : String(value).trim()
  if (!DECIMAL.test(text)) return text
  const num = Number(text)
  return Math.abs(num) <= Number.MAX_SAFE_INTEGER ? String(num) : text
}

export function isNumericValue(value: CellValue | undefined): boolean {
  if (typeof value === 'number') return Number.isFinite(value)
  if (typeof value !== 'string' || value.trim() === '') return false
  return Number.isFinite(Number(value))
}

export function hasColumn(table: Table, column: string): boolean {
  return table.columns.includes(column)
}

/** Shallow copy of every row, so a stage can write cells without touching its input */
export function copyRows(rows: DataRow[]): DataRow[] {
  return rows.map((row) => ({ ...row }))
}

/** Respondent identifiers in row order: the id column when present, otherwise the 1-based row position */
export function respondentIds(table: Table, idColumn: string): CellValue[] {
  if (hasColumn(table, idColumn)) return table.rows.map((row) => row[idColumn] ?? null)
  return table.rows.map((_, i) => i + 1)
}

/** Distinct non-blank values of a column, ignoring `exclude` (e.g. the skip sentinel) */
export function distinctValues(rows: DataRow[], column: string, exclude?: string): Set<string> {
  const values = new Set<string>()
  for (const row of rows) {
    const value = row[column]
    if (isBlank(value)) continue
    const key = cellKey(value)
    if (key !== exclude) values.add(key)
  }
  return values
}
