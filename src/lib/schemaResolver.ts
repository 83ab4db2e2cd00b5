/**
 * Resolve the survey schema from the raw header: multi-response sets, label pairs and skip rules.
 * Runs once per table; every later stage reads the frozen result instead of re-deriving groupings.
 */

import type { LabelPair, MultiResponseSet, ReportIssue, SkipRule, SurveySchema } from '../types'

export interface SchemaConventions {
  optionPattern: string
  optionSeparator: string
  labelSuffix: string
}

export interface SchemaDeclarations {
  idColumn?: string
  /** Explicit sets (name -> members); members are claimed before inference runs */
  multiResponseSets?: Record<string, string[]>
  skipRules?: SkipRule[]
  excludeColumns?: string[]
}

export interface SchemaResolution {
  schema: SurveySchema
  issues: ReportIssue[]
}

export const DEFAULT_CONVENTIONS: SchemaConventions = {
  optionPattern: '^(.+?)_(\\d+)$',
  optionSeparator: '_',
  labelSuffix: '(TEXT)',
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const child of Object.values(value)) deepFreeze(child)
  }
  return value
}

/** Pair each `X(TEXT)` column with `X`; tolerates a space before the suffix ("X (TEXT)"). */
export function detectLabelPairs(columns: string[], labelSuffix: string): LabelPair[] {
  const present = new Set(columns)
  const pairs: LabelPair[] = []
  for (const col of columns) {
    if (!col.endsWith(labelSuffix) || col.length === labelSuffix.length) continue
    const raw = col.slice(0, -labelSuffix.length)
    const base = present.has(raw) ? raw : raw.trimEnd()
    if (base && base !== col && present.has(base) && !base.endsWith(labelSuffix)) {
      pairs.push({ column: base, labelColumn: col })
    }
  }
  return pairs
}

/** Split a column name into stem and option suffix, or null when the pattern does not match. */
function splitOption(name: string, pattern: RegExp): { stem: string; option: string } | null {
  const m = pattern.exec(name)
  if (!m || !m[1] || !m[2]) return null
  return { stem: m[1], option: m[2] }
}

export function resolveSchema(
  columns: string[],
  conventions: SchemaConventions = DEFAULT_CONVENTIONS,
  declarations: SchemaDeclarations = {}
): SchemaResolution {
  const issues: ReportIssue[] = []
  const present = new Set(columns)
  const position = new Map(columns.map((c, i) => [c, i]))

  const labelPairs = detectLabelPairs(columns, conventions.labelSuffix)
  const labelColumns = new Set(labelPairs.map((p) => p.labelColumn))

  const claimed = new Set<string>()
  const sets: MultiResponseSet[] = []

  for (const [name, members] of Object.entries(declarations.multiResponseSets ?? {})) {
    const kept: string[] = []
    for (const col of members) {
      if (!present.has(col) || labelColumns.has(col)) {
        issues.push({ kind: 'SchemaAmbiguity', column: col, message: `Declared member "${col}" of set "${name}" is not a response column in the table` })
      } else if (claimed.has(col) || kept.includes(col)) {
        issues.push({ kind: 'SchemaAmbiguity', column: col, message: `Column "${col}" is declared in more than one set; kept in the first` })
      } else {
        kept.push(col)
      }
    }
    if (kept.length < 2) {
      issues.push({ kind: 'SchemaAmbiguity', column: name, message: `Declared set "${name}" has fewer than two usable members; treated as single-response` })
      continue
    }
    for (const col of kept) claimed.add(col)
    sets.push({ name, columns: kept })
  }

  const never = new Set([...(declarations.excludeColumns ?? []), ...(declarations.idColumn ? [declarations.idColumn] : [])])
  const pattern = new RegExp(conventions.optionPattern)
  const byStem = new Map<string, string[]>()
  for (const col of columns) {
    if (claimed.has(col) || labelColumns.has(col) || never.has(col)) continue
    const split = splitOption(col, pattern)
    if (!split) continue
    if (!byStem.has(split.stem)) byStem.set(split.stem, [])
    byStem.get(split.stem)?.push(col)
  }

  const declaredNames = new Set(sets.map((s) => s.name))
  const stems: string[] = []
  for (const [stem, members] of byStem) {
    if (members.length < 2) continue
    if (declaredNames.has(stem)) {
      issues.push({ kind: 'SchemaAmbiguity', column: stem, message: `Inferred set "${stem}" clashes with a declared set of the same name; left ungrouped` })
      continue
    }
    stems.push(stem)
    for (const col of members) claimed.add(col)
    sets.push({ name: stem, columns: members })
  }

  // Q7_other beside Q7_1, Q7_2: same stem, unparseable option
  for (const col of columns) {
    if (claimed.has(col) || labelColumns.has(col) || never.has(col)) continue
    const stem = stems.find((s) => col.startsWith(s + conventions.optionSeparator))
    if (stem) {
      issues.push({ kind: 'SchemaAmbiguity', column: col, message: `Column "${col}" looks like an option of "${stem}" but its suffix does not parse; left ungrouped` })
    }
  }

  const first = (set: MultiResponseSet) => Math.min(...set.columns.map((c) => position.get(c) ?? Infinity))
  sets.sort((a, b) => first(a) - first(b))

  const schema: SurveySchema = {
    multiResponseSets: sets,
    skipRules: (declarations.skipRules ?? []).map((r) => ({ ...r, values: [...r.values] })),
    labelPairs,
    singleColumns: columns.filter((c) => !claimed.has(c) && !labelColumns.has(c)),
  }
  return { schema: deepFreeze(schema), issues }
}

/** Columns a skip rule writes to: the set's members when `dependent` names a set, otherwise the column itself. */
export function dependentColumns(rule: SkipRule, schema: SurveySchema): string[] {
  const set = schema.multiResponseSets.find((s) => s.name === rule.dependent)
  return set ? [...set.columns] : [rule.dependent]
}

/** Lookup of set membership: column -> set name */
export function memberIndex(schema: SurveySchema): Map<string, string> {
  const index = new Map<string, string>()
  for (const set of schema.multiResponseSets) {
    for (const col of set.columns) index.set(col, set.name)
  }
  return index
}
