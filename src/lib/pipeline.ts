/**
 * Survey pre-processing pipeline: schema -> missing values -> weights -> labels -> tidy export.
 *
 * Every stage takes a table and returns a new one. Data problems become report issues;
 * a StructuralInputError skips its step for the run and later steps see the unmodified table.
 * Anything else thrown is a bug and propagates.
 */

import type { ReportIssue, RunReport, StepName, SurveySchema, Table, TidyExport } from '../types'
import type { PipelineConfig } from './config'
import { encodeLabels, renameOptionColumns } from './labelEncoder'
import { logger } from './logger'
import { handleMissingValues } from './missingValues'
import { ReportBuilder, StructuralInputError } from './report'
import { resolveSchema } from './schemaResolver'
import { exportTidy } from './tidyExport'
import { computeWeights } from './weights'

export interface PipelineInput {
  raw: Table
  /** Population reference; required when weight calculation is enabled */
  reference?: Table
  /** Checked between stages only */
  signal?: AbortSignal
}

export interface PipelineResult {
  /** Processed wide table */
  table: Table
  schema: SurveySchema
  optionLabels: Record<string, string>
  tidy?: TidyExport
  report: RunReport
}

export function runPipeline(input: PipelineInput, config: PipelineConfig): PipelineResult {
  const { raw, reference, signal } = input
  const { steps } = config
  const report = new ReportBuilder(config.report.maxExamples)
  const log = logger.child({ rows: raw.rows.length, columns: raw.columns.length })

  const record = (step: StepName, issues: ReportIssue[]) => {
    report.add(issues)
    report.step(step, 'completed')
    log.info({ step, issues: issues.length }, 'step completed')
  }

  const fail = (step: StepName, err: StructuralInputError) => {
    report.add([{ kind: 'StructuralInputError', message: err.message }])
    report.step(step, 'failed', err.message)
    log.warn({ step, err: err.message }, 'step skipped for this run')
  }

  const disabled = (step: StepName) => {
    report.step(step, 'disabled')
    log.debug({ step }, 'step disabled')
  }

  signal?.throwIfAborted()
  const resolution = resolveSchema(raw.columns, config.conventions, {
    idColumn: config.idColumn,
    multiResponseSets: config.multiResponseSets,
    skipRules: config.skipRules,
    excludeColumns: config.excludeColumns,
  })
  const { schema } = resolution
  record('schema', resolution.issues)
  log.debug(
    { sets: schema.multiResponseSets.map((s) => `${s.name}(${s.columns.length})`), labelPairs: schema.labelPairs.length },
    'schema resolved'
  )

  let table = raw

  signal?.throwIfAborted()
  if (steps.runMissingValueHandling) {
    const result = handleMissingValues(table, schema, {
      skipSentinel: config.skipSentinel,
      idColumn: config.idColumn,
      fillCategoricalBlanks: config.missing.fillCategoricalBlanks,
      categoricalMaxDistinct: config.missing.categoricalMaxDistinct,
    })
    table = result.table
    record('missing', result.issues)
  } else {
    disabled('missing')
  }

  signal?.throwIfAborted()
  if (!steps.runWeightCalculation) {
    disabled('weights')
  } else if (!reference) {
    fail('weights', new StructuralInputError('weights', 'Weight calculation is enabled but no population reference was supplied'))
  } else {
    try {
      const result = computeWeights(table, reference, config.weights)
      table = result.table
      record('weights', result.issues)
    } catch (err) {
      if (!(err instanceof StructuralInputError)) throw err
      fail('weights', err)
    }
  }

  let optionLabels: Record<string, string> = {}
  signal?.throwIfAborted()
  if (steps.runLabelEncoding) {
    const result = encodeLabels(table, schema, {
      skipSentinel: config.skipSentinel,
      idColumn: config.idColumn,
      weightColumn: config.weights.weightColumn,
      dropLabelColumns: config.labels.dropLabelColumns,
    })
    table = result.table
    optionLabels = result.optionLabels
    record('labels', result.issues)
  } else {
    disabled('labels')
  }

  let tidy: TidyExport | undefined
  signal?.throwIfAborted()
  if (steps.runTidyExport) {
    tidy = exportTidy(table, schema, {
      idColumn: config.idColumn,
      weightColumn: config.weights.weightColumn,
      carryColumns: config.tidy.carryColumns,
      optionLabels,
      includeSingleResponse: config.tidy.includeSingleResponse,
    })
    record('tidy', [])
    log.info({ sets: Object.keys(tidy.sets).length, masterRows: tidy.master.rows.length }, 'tidy tables built')
  } else {
    disabled('tidy')
  }

  // Renaming last keeps the schema valid for every stage above
  if (steps.runLabelEncoding && config.labels.renameOptionColumns) {
    table = renameOptionColumns(table, optionLabels)
    log.debug({ renamed: Object.keys(optionLabels).length }, 'option columns renamed')
  }

  return { table, schema, optionLabels, tidy, report: report.build() }
}
