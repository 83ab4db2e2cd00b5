import { describe, it, expect } from 'vitest'
import { computeWeights, referenceShares, type WeightOptions } from './weights'
import { StructuralInputError } from './report'
import type { DataRow, Table } from '../types'

const options: WeightOptions = {
  strata: ['gender', 'region'],
  targetColumn: 'pop_share',
  targetKind: 'auto',
  rescale: false,
  weightColumn: 'weight',
}

/** 10 respondents: 3 F/North, 3 M/North, 4 F/South */
function makeSample(): Table {
  const rows: DataRow[] = []
  const add = (gender: string, region: string, count: number) => {
    for (let i = 0; i < count; i++) rows.push({ id: rows.length + 1, gender, region })
  }
  add('F', 'North', 3)
  add('M', 'North', 3)
  add('F', 'South', 4)
  return { columns: ['id', 'gender', 'region'], rows }
}

function makeReference(shares: [string, string, number | string][]): Table {
  return {
    columns: ['gender', 'region', 'pop_share'],
    rows: shares.map(([gender, region, pop_share]) => ({ gender, region, pop_share })),
  }
}

const weightsOf = (table: Table) => table.rows.map((r) => r.weight)

function total(values: unknown[]): number {
  return values.reduce<number>((sum, v) => sum + (typeof v === 'number' ? v : 0), 0)
}

describe('computeWeights', () => {
  it('gives weight 1 when the sample share equals the population share', () => {
    const reference = makeReference([
      ['F', 'North', 0.3],
      ['M', 'North', 0.3],
      ['F', 'South', 0.4],
    ])
    const { table, issues } = computeWeights(makeSample(), reference, options)
    for (const w of weightsOf(table)) expect(w).toBeCloseTo(1, 10)
    expect(total(weightsOf(table))).toBeCloseTo(10, 6)
    expect(issues).toEqual([])
  })

  it('divides the target share by the observed share', () => {
    const reference = makeReference([
      ['F', 'North', 0.5],
      ['M', 'North', 0.2],
      ['F', 'South', 0.3],
    ])
    const w = weightsOf(computeWeights(makeSample(), reference, options).table)
    expect(w[0]).toBeCloseTo(5 / 3, 10)
    expect(w[3]).toBeCloseTo(2 / 3, 10)
    expect(w[6]).toBeCloseTo(0.75, 10)
  })

  it('normalizes population counts to shares', () => {
    const reference = makeReference([
      ['F', 'North', 500],
      ['M', 'North', 200],
      ['F', 'South', 300],
    ])
    const w = weightsOf(computeWeights(makeSample(), reference, options).table)
    expect(w[0]).toBeCloseTo(5 / 3, 10)
    expect(w[9]).toBeCloseTo(0.75, 10)
  })

  it('rescales weights to sum to the sample size', () => {
    const reference = makeReference([
      ['F', 'North', 0.25],
      ['M', 'North', 0.25],
      ['F', 'South', 0.25],
    ])
    const raw = weightsOf(computeWeights(makeSample(), reference, { ...options, targetKind: 'proportion' }).table)
    expect(total(raw)).toBeCloseTo(7.5, 10)

    const scaled = weightsOf(computeWeights(makeSample(), reference, { ...options, targetKind: 'proportion', rescale: true }).table)
    expect(Math.abs(total(scaled) - 10) / 10).toBeLessThan(1e-6)
    for (const w of scaled) expect(w).toBeGreaterThan(0)
  })

  it('leaves unmatched respondents unweighted and reports their stratum', () => {
    const reference = makeReference([
      ['F', 'North', 0.5],
      ['M', 'North', 0.2],
    ])
    const { table, issues } = computeWeights(makeSample(), reference, options)
    expect(weightsOf(table).slice(6)).toEqual([null, null, null, null])
    expect(issues).toHaveLength(1)
    expect(issues[0]).toMatchObject({ kind: 'UnmatchedStratum', count: 4 })
    expect(issues[0].message).toContain('gender=F, region=South')
  })

  it('rescales matched respondents only', () => {
    const reference = makeReference([
      ['F', 'North', 0.5],
      ['M', 'North', 0.2],
    ])
    const w = weightsOf(computeWeights(makeSample(), reference, { ...options, rescale: true }).table)
    expect(total(w.slice(0, 6))).toBeCloseTo(6, 10)
    expect(w.slice(6).every((v) => v === null)).toBe(true)
  })

  it('treats a non-positive or non-numeric target as unmatched', () => {
    const reference = makeReference([
      ['F', 'North', 0.5],
      ['M', 'North', 0],
      ['F', 'South', 'n/a'],
    ])
    const { table, issues } = computeWeights(makeSample(), reference, options)
    expect(weightsOf(table).filter((w) => w === null)).toHaveLength(7)
    expect(issues.map((i) => i.count)).toEqual([3, 4])
  })

  it('matches stratum values regardless of number or string form', () => {
    const sample: Table = {
      columns: ['sex'],
      rows: [{ sex: 1 }, { sex: 2 }],
    }
    const reference: Table = {
      columns: ['sex', 'pop_share'],
      rows: [
        { sex: '1', pop_share: 0.6 },
        { sex: '2 ', pop_share: 0.4 },
      ],
    }
    const w = weightsOf(computeWeights(sample, reference, { ...options, strata: ['sex'] }).table)
    expect(w[0]).toBeCloseTo(1.2, 10)
    expect(w[1]).toBeCloseTo(0.8, 10)
  })

  it('matches a stratum code written as 1.0 to the reference code 1', () => {
    const sample: Table = { columns: ['sex'], rows: [{ sex: '1.0' }, { sex: 2 }] }
    const reference: Table = {
      columns: ['sex', 'pop_share'],
      rows: [
        { sex: 1, pop_share: 0.5 },
        { sex: 2, pop_share: 0.5 },
      ],
    }
    const { table, issues } = computeWeights(sample, reference, { ...options, strata: ['sex'] })
    expect(weightsOf(table)).toEqual([1, 1])
    expect(issues).toEqual([])
  })

  it('appends the weight column and copies every other cell', () => {
    const sample = makeSample()
    const before = structuredClone(sample)
    const reference = makeReference([
      ['F', 'North', 0.3],
      ['M', 'North', 0.3],
      ['F', 'South', 0.4],
    ])
    const { table } = computeWeights(sample, reference, options)
    expect(table.columns).toEqual(['id', 'gender', 'region', 'weight'])
    expect(table.rows[0]).toMatchObject({ id: 1, gender: 'F', region: 'North' })
    expect(sample).toEqual(before)
  })

  it('throws a structural error when a stratum column is missing', () => {
    const reference = makeReference([['F', 'North', 1]])
    expect(() => computeWeights(makeSample(), reference, { ...options, strata: ['gender', 'age'] })).toThrow(StructuralInputError)
    expect(() => computeWeights(makeSample(), reference, { ...options, strata: [] })).toThrow(StructuralInputError)
  })

  it('throws a structural error when the reference has no target column', () => {
    const reference = makeReference([['F', 'North', 1]])
    expect(() => computeWeights(makeSample(), reference, { ...options, targetColumn: 'share' })).toThrow(
      'Column(s) missing from population reference: share'
    )
  })
})

describe('referenceShares', () => {
  it('sums duplicate strata', () => {
    const reference = makeReference([
      ['F', 'North', 0.25],
      ['F', 'North', 0.25],
      ['M', 'North', 0.5],
    ])
    const shares = referenceShares(reference, ['gender', 'region'], options)
    expect(shares.get(JSON.stringify(['F', 'North']))).toBeCloseTo(0.5, 10)
  })

  it('reads percentages', () => {
    const reference = makeReference([['F', 'North', '40%']])
    const shares = referenceShares(reference, ['gender', 'region'], { ...options, targetKind: 'proportion' })
    expect(shares.get(JSON.stringify(['F', 'North']))).toBeCloseTo(0.4, 10)
  })
})
