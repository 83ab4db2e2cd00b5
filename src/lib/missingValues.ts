/**
 * Missing-value handling: binary-encode multi-response options and mark structurally skipped cells.
 *
 * A skipped cell holds the skip sentinel, never 0 or blank, so later stages can tell
 * "not asked" apart from "not selected" and "no answer".
 */

import type { CellValue, ReportIssue, SkipRule, StageResult, SurveySchema, Table } from '../types'
import { dependentColumns } from './schemaResolver'
import { cellKey, copyRows, distinctValues, hasColumn, isBlank } from './table'

export interface MissingValueOptions {
  skipSentinel: string
  idColumn?: string
  /** Also fill blanks of low-cardinality single-response columns with the sentinel */
  fillCategoricalBlanks?: boolean
  categoricalMaxDistinct?: number
}

/** 0/1 indicator for one option cell: blank or zero -> 0, sentinel stays, anything else -> 1 */
export function binarize(value: CellValue | undefined, skipSentinel: string): CellValue {
  if (value == null) return 0
  if (typeof value === 'number') return value === 0 ? 0 : 1
  const text = value.trim()
  if (text === '') return 0
  if (text === skipSentinel) return skipSentinel
  return Number(text) === 0 ? 0 : 1
}

export interface SkipRuleOrder {
  ordered: SkipRule[]
  /** Rules on a cycle */
  cyclic: SkipRule[]
  /** Rules outside any cycle whose gate is written, directly or not, by a cyclic rule */
  blocked: SkipRule[]
}

/** True when rule `start` can reach itself through the run-after edges among `candidates` */
function onCycle(start: number, after: Set<number>[], candidates: Set<number>): boolean {
  const seen = new Set<number>()
  const stack = [...after[start]]
  while (stack.length > 0) {
    const next = stack.pop()
    if (next === undefined || seen.has(next) || !candidates.has(next)) continue
    if (next === start) return true
    seen.add(next)
    stack.push(...after[next])
  }
  return false
}

/**
 * Order rules so a rule gated on another rule's dependent runs after it.
 * Rules caught in a cycle, and rules waiting on one, are returned separately and never applied.
 */
export function orderSkipRules(rules: readonly SkipRule[], schema: SurveySchema): SkipRuleOrder {
  const writes = rules.map((r) => new Set(dependentColumns(r, schema)))
  const after = rules.map(() => new Set<number>())
  const pending = rules.map(() => 0)
  rules.forEach((rule, i) => {
    writes.forEach((cols, j) => {
      if (cols.has(rule.gate) && !after[j].has(i)) {
        after[j].add(i)
        pending[i]++
      }
    })
  })

  const ordered: SkipRule[] = []
  const done = new Set<number>()
  let progressed = true
  while (progressed) {
    progressed = false
    for (let i = 0; i < rules.length; i++) {
      if (done.has(i) || pending[i] > 0) continue
      done.add(i)
      ordered.push(rules[i])
      for (const j of after[i]) pending[j]--
      progressed = true
      break
    }
  }
  const unresolved = new Set(rules.map((_, i) => i).filter((i) => !done.has(i)))
  const cyclic: SkipRule[] = []
  const blocked: SkipRule[] = []
  for (const i of unresolved) {
    if (onCycle(i, after, unresolved)) cyclic.push(rules[i])
    else blocked.push(rules[i])
  }
  return { ordered, cyclic, blocked }
}

export function handleMissingValues(
  table: Table,
  schema: SurveySchema,
  options: MissingValueOptions
): StageResult {
  const { skipSentinel } = options
  const issues: ReportIssue[] = []
  const rows = copyRows(table.rows)

  for (const set of schema.multiResponseSets) {
    for (const col of set.columns) {
      if (!hasColumn(table, col)) continue
      for (const row of rows) row[col] = binarize(row[col], skipSentinel)
    }
  }

  const { ordered, cyclic, blocked } = orderSkipRules(schema.skipRules, schema)
  for (const rule of cyclic) {
    issues.push({
      kind: 'UnresolvedSkipGate',
      column: rule.gate,
      message: `Skip rule for "${rule.dependent}" gated on "${rule.gate}" is part of a cycle; not applied`,
    })
  }
  for (const rule of blocked) {
    issues.push({
      kind: 'UnresolvedSkipGate',
      column: rule.gate,
      message: `Skip rule for "${rule.dependent}" gated on "${rule.gate}" depends on a cyclic rule; not applied`,
    })
  }

  const skipDependents = new Set<string>()
  for (const rule of ordered) {
    if (!hasColumn(table, rule.gate)) {
      issues.push({
        kind: 'UnresolvedSkipGate',
        column: rule.gate,
        message: `Gate column "${rule.gate}" for "${rule.dependent}" is not in the table; no skip fill applied`,
      })
      continue
    }
    const targets: string[] = []
    for (const col of dependentColumns(rule, schema)) {
      if (hasColumn(table, col)) {
        targets.push(col)
      } else {
        issues.push({
          kind: 'UnresolvedSkipGate',
          column: col,
          message: `Dependent column "${col}" gated on "${rule.gate}" is not in the table`,
        })
      }
    }
    const allowed = new Set(rule.values.map((v) => cellKey(v)))
    for (const row of rows) {
      if (allowed.has(cellKey(row[rule.gate]))) continue
      for (const col of targets) row[col] = skipSentinel
    }
    for (const col of targets) skipDependents.add(col)
  }

  if (options.fillCategoricalBlanks) {
    const maxDistinct = options.categoricalMaxDistinct ?? 20
    for (const col of schema.singleColumns) {
      if (col === options.idColumn || skipDependents.has(col) || !hasColumn(table, col)) continue
      const hasDecimals = rows.some((row) => {
        const v = row[col]
        return typeof v === 'number' && !Number.isInteger(v)
      })
      if (hasDecimals || distinctValues(rows, col, skipSentinel).size > maxDistinct) continue
      for (const row of rows) {
        if (isBlank(row[col])) row[col] = skipSentinel
      }
    }
  }

  return { table: { columns: [...table.columns], rows }, issues }
}
