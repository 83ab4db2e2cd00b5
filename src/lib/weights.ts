/**
 * Post-stratification weights: weight = population share of the respondent's stratum / its sample share.
 * Respondents whose stratum has no usable population target keep an empty weight and are reported.
 */

import { sum } from 'simple-statistics'
import type { CellValue, ReportIssue, StageResult, Table } from '../types'
import type { TargetKind } from './config'
import { StructuralInputError } from './report'
import { cellKey, copyRows, hasColumn } from './table'

export interface WeightOptions {
  strata: string[]
  targetColumn: string
  targetKind: TargetKind
  rescale: boolean
  weightColumn: string
}

type StratumKey = string

/** Tuple of trimmed stratum values; JSON keeps ("a,b", "c") apart from ("a", "b,c"). */
function stratumKey(row: Record<string, CellValue>, strata: string[]): StratumKey {
  return JSON.stringify(strata.map((c) => cellKey(row[c])))
}

function describeStratum(key: StratumKey, strata: string[]): string {
  const values: unknown = JSON.parse(key)
  const parts = Array.isArray(values) ? values : []
  return strata.map((c, i) => `${c}=${String(parts[i] ?? '')}`).join(', ')
}

function targetNumber(value: CellValue | undefined): number {
  if (typeof value === 'number') return value
  const text = cellKey(value)
  if (text === '') return NaN
  return text.endsWith('%') ? Number(text.slice(0, -1)) / 100 : Number(text)
}

/**
 * Target share per stratum. Duplicate strata are summed; non-finite or non-positive targets are dropped.
 * Counts (or, with 'auto', any target above 1) are normalized to sum to 1 over the usable strata.
 */
export function referenceShares(reference: Table, strata: string[], options: Pick<WeightOptions, 'targetColumn' | 'targetKind'>): Map<StratumKey, number> {
  const totals = new Map<StratumKey, number[]>()
  for (const row of reference.rows) {
    const key = stratumKey(row, strata)
    const target = targetNumber(row[options.targetColumn])
    if (!totals.has(key)) totals.set(key, [])
    totals.get(key)?.push(target)
  }

  const shares = new Map<StratumKey, number>()
  for (const [key, targets] of totals) {
    const total = sum(targets)
    if (Number.isFinite(total) && total > 0) shares.set(key, total)
  }

  const values = [...shares.values()]
  const normalize = options.targetKind === 'count' || (options.targetKind === 'auto' && values.some((v) => v > 1))
  if (normalize && values.length > 0) {
    const grand = sum(values)
    for (const [key, value] of shares) shares.set(key, value / grand)
  }
  return shares
}

export function computeWeights(table: Table, reference: Table, options: WeightOptions): StageResult {
  const { strata, weightColumn } = options
  if (strata.length === 0) {
    throw new StructuralInputError('weights', 'No stratum columns configured for weight calculation')
  }
  const missingInTable = strata.filter((c) => !hasColumn(table, c))
  if (missingInTable.length > 0) {
    throw new StructuralInputError('weights', `Stratum column(s) missing from survey table: ${missingInTable.join(', ')}`)
  }
  const missingInReference = [...strata, options.targetColumn].filter((c) => !hasColumn(reference, c))
  if (missingInReference.length > 0) {
    throw new StructuralInputError('weights', `Column(s) missing from population reference: ${missingInReference.join(', ')}`)
  }

  const shares = referenceShares(reference, strata, options)
  const keys = table.rows.map((row) => stratumKey(row, strata))
  const observed = new Map<StratumKey, number>()
  for (const key of keys) observed.set(key, (observed.get(key) ?? 0) + 1)

  const n = table.rows.length
  // target / (n_s / n), evaluated as target * n / n_s
  const weights: (number | null)[] = keys.map((key) => {
    const target = shares.get(key)
    const inStratum = observed.get(key) ?? 0
    return target === undefined || inStratum === 0 ? null : (target * n) / inStratum
  })

  if (options.rescale) {
    const matched = weights.filter((w): w is number => w !== null)
    const total = matched.length > 0 ? sum(matched) : 0
    if (total > 0) {
      const factor = matched.length / total
      for (let i = 0; i < weights.length; i++) {
        const w = weights[i]
        if (w !== null) weights[i] = w * factor
      }
    }
  }

  const issues: ReportIssue[] = []
  for (const [key, count] of observed) {
    if (shares.has(key)) continue
    issues.push({
      kind: 'UnmatchedStratum',
      count,
      message: `Stratum (${describeStratum(key, strata)}) has no usable population target; ${count} respondent(s) left unweighted`,
    })
  }

  const rows = copyRows(table.rows)
  rows.forEach((row, i) => {
    row[weightColumn] = weights[i]
  })
  const columns = hasColumn(table, weightColumn) ? [...table.columns] : [...table.columns, weightColumn]
  return { table: { columns, rows }, issues }
}
