import Papa from 'papaparse'
import type { CellValue, DataRow, Table } from '../types'

export interface ParseOptions {
  /** 0-based index of the header row; rows above it (e.g. an export banner) are dropped */
  headerRow?: number
}

function toCell(raw: unknown): CellValue {
  const trimmed = typeof raw === 'string' ? raw.trim() : raw == null ? '' : String(raw)
  if (trimmed === '') return null
  const num = Number(trimmed)
  if (!Number.isNaN(num) && String(num) === trimmed) return num
  return trimmed
}

/** Blank headers become Column_<n>; repeated headers get .1, .2 … so every column stays addressable. */
function uniqueHeaders(rawHeaders: unknown[]): string[] {
  const seen = new Map<string, number>()
  return rawHeaders.map((h, j) => {
    const base = (h != null ? String(h).trim() : '') || `Column_${j + 1}`
    const n = (seen.get(base) ?? 0) + 1
    seen.set(base, n)
    return n === 1 ? base : `${base}.${n - 1}`
  })
}

export function parseCSV(csvText: string, options: ParseOptions = {}): Table {
  if (!csvText || typeof csvText !== 'string') return { columns: [], rows: [] }
  const parsed = Papa.parse<string[]>(csvText.replace(/^\uFEFF/, ''), { skipEmptyLines: true })
  const headerRow = options.headerRow ?? 0
  const lines = Array.isArray(parsed?.data) ? parsed.data.slice(headerRow) : []
  if (lines.length === 0) return { columns: [], rows: [] }

  const columns = uniqueHeaders(lines[0])
  const rows: DataRow[] = []
  for (let i = 1; i < lines.length; i++) {
    const line = lines[i]
    const row: DataRow = {}
    columns.forEach((h, j) => {
      row[h] = toCell(line[j])
    })
    rows.push(row)
  }
  return { columns, rows }
}

/** Serialize a table in its own column order; empty cells become empty fields. */
export function toCSV(table: Table): string {
  const data = table.rows.map((row) => table.columns.map((c) => row[c] ?? ''))
  return Papa.unparse({ fields: table.columns, data })
}
