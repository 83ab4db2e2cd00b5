import { describe, it, expect } from 'vitest'
import { encodeLabels, renameOptionColumns } from './labelEncoder'
import { DEFAULT_CONVENTIONS, resolveSchema } from './schemaResolver'
import type { Table } from '../types'

const SKIP = 'SKIP(N/A)'

function makeTable(): Table {
  return {
    columns: ['id', 'Q4', 'Q4(TEXT)', 'Q3_1', 'Q3_1(TEXT)', 'Q3_2', 'Q3_2(TEXT)', 'age'],
    rows: [
      { id: 1, Q4: 1, 'Q4(TEXT)': 'Seoul', Q3_1: 1, 'Q3_1(TEXT)': 'Coffee', Q3_2: 0, 'Q3_2(TEXT)': null, age: 34 },
      { id: 2, Q4: 2, 'Q4(TEXT)': null, Q3_1: 0, 'Q3_1(TEXT)': null, Q3_2: 1, 'Q3_2(TEXT)': 'Tea', age: 29 },
      { id: 3, Q4: SKIP, 'Q4(TEXT)': null, Q3_1: SKIP, 'Q3_1(TEXT)': null, Q3_2: SKIP, 'Q3_2(TEXT)': null, age: null },
      { id: 4, Q4: 1, 'Q4(TEXT)': 'Busan', Q3_1: 1, 'Q3_1(TEXT)': 'Coffee', Q3_2: 0, 'Q3_2(TEXT)': null, age: 41 },
    ],
  }
}

const schemaOf = (table: Table) => resolveSchema(table.columns, DEFAULT_CONVENTIONS, { idColumn: 'id' }).schema

describe('encodeLabels', () => {
  it('replaces codes with the same row’s label text', () => {
    const table = makeTable()
    const { table: out } = encodeLabels(table, schemaOf(table), { skipSentinel: SKIP, idColumn: 'id' })
    expect(out.rows.map((r) => r.Q4)).toEqual(['Seoul', 2, SKIP, 'Busan'])
  })

  it('never takes a label from another row', () => {
    const table = makeTable()
    const { table: out } = encodeLabels(table, schemaOf(table), { skipSentinel: SKIP, idColumn: 'id' })
    out.rows.forEach((row, i) => {
      const source = table.rows[i]
      expect([source.Q4, source['Q4(TEXT)']]).toContain(row.Q4)
    })
  })

  it('keeps multi-response indicators and returns option labels instead', () => {
    const table = makeTable()
    const { table: out, optionLabels } = encodeLabels(table, schemaOf(table), { skipSentinel: SKIP, idColumn: 'id' })
    expect(out.rows.map((r) => [r.Q3_1, r.Q3_2])).toEqual([
      [1, 0],
      [0, 1],
      [SKIP, SKIP],
      [1, 0],
    ])
    expect(optionLabels).toEqual({ Q3_1: 'Coffee', Q3_2: 'Tea' })
  })

  it('reports blank label cells and numeric columns with no pair', () => {
    const table = makeTable()
    const { issues } = encodeLabels(table, schemaOf(table), { skipSentinel: SKIP, idColumn: 'id' })
    expect(issues).toEqual([
      expect.objectContaining({ kind: 'MissingLabelPair', column: 'Q4', count: 1 }),
      expect.objectContaining({ kind: 'MissingLabelPair', column: 'age' }),
    ])
  })

  it('keeps label columns unless asked to drop them', () => {
    const table = makeTable()
    const kept = encodeLabels(table, schemaOf(table), { skipSentinel: SKIP, idColumn: 'id' }).table
    expect(kept.columns).toEqual(table.columns)
    expect(kept.rows[0]['Q4(TEXT)']).toBe('Seoul')

    const dropped = encodeLabels(table, schemaOf(table), { skipSentinel: SKIP, idColumn: 'id', dropLabelColumns: true }).table
    expect(dropped.columns).toEqual(['id', 'Q4', 'Q3_1', 'Q3_2', 'age'])
    expect(Object.keys(dropped.rows[0])).toEqual(['id', 'Q4', 'Q3_1', 'Q3_2', 'age'])
  })

  it('does not modify its input table', () => {
    const table = makeTable()
    const before = structuredClone(table)
    encodeLabels(table, schemaOf(table), { skipSentinel: SKIP, idColumn: 'id', dropLabelColumns: true })
    expect(table).toEqual(before)
  })
})

describe('encodeLabels on unlabeled options', () => {
  it('reports multi-response options that have no label column', () => {
    const table: Table = {
      columns: ['id', 'Q5_1', 'Q5_2', 'Q5_2(TEXT)'],
      rows: [{ id: 1, Q5_1: 1, Q5_2: 0, 'Q5_2(TEXT)': 'Tea' }],
    }
    const { issues, optionLabels } = encodeLabels(table, schemaOf(table), { skipSentinel: SKIP, idColumn: 'id' })
    expect(optionLabels).toEqual({ Q5_2: 'Tea' })
    expect(issues).toEqual([
      {
        kind: 'MissingLabelPair',
        column: 'Q5',
        count: 1,
        message: '1 option(s) of "Q5" have no paired label column: Q5_1; left unlabeled',
      },
    ])
  })
})

describe('renameOptionColumns', () => {
  it('renames option columns to their labels and keeps cell values', () => {
    const table: Table = {
      columns: ['id', 'Q3_1', 'Q3_2', 'age'],
      rows: [{ id: 1, Q3_1: 1, Q3_2: SKIP, age: 30 }],
    }
    const out = renameOptionColumns(table, { Q3_1: 'Coffee', Q3_2: 'Tea' })
    expect(out.columns).toEqual(['id', 'Coffee', 'Tea', 'age'])
    expect(out.rows).toEqual([{ id: 1, Coffee: 1, Tea: SKIP, age: 30 }])
  })

  it('adds a numeric suffix when a label is already a column name or another label', () => {
    const table: Table = {
      columns: ['Q3_1', 'Q3_2', 'Q3_3', 'Tea'],
      rows: [{ Q3_1: 1, Q3_2: 0, Q3_3: 1, Tea: 'yes' }],
    }
    const out = renameOptionColumns(table, { Q3_1: 'Tea', Q3_2: 'Tea', Q3_3: 'Coffee' })
    expect(out.columns).toEqual(['Tea_1', 'Tea_2', 'Coffee', 'Tea'])
    expect(out.rows).toEqual([{ Tea_1: 1, Tea_2: 0, Coffee: 1, Tea: 'yes' }])
  })

  it('leaves columns without a label alone', () => {
    const table: Table = { columns: ['Q3_1', 'Q3_2'], rows: [{ Q3_1: 1, Q3_2: 0 }] }
    expect(renameOptionColumns(table, {})).toEqual(table)
  })
})
