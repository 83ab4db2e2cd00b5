/**
 * Command-line host for the pipeline: reads CSV files, runs the enabled steps, writes CSVs and a report.
 *
 * Usage:
 *   tsx src/cli.ts --input raw.csv --out out/ --tidy --labels
 *   tsx src/cli.ts --input raw.csv --out out/ --weights --population pop.csv --strata gender,region
 */

import { readFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import { Command } from 'commander'
import { config as loadDotenv } from 'dotenv'
import { ConfigError, parseConfig, withEnvOverrides, type PipelineConfig } from './lib/config'
import { parseCSV } from './lib/csvParse'
import { logger } from './lib/logger'
import { writeOutputs } from './lib/outputs'
import { runPipeline } from './lib/pipeline'
import { issueCount } from './lib/report'
import type { Table } from './types'

interface CliOptions {
  input: string
  out: string
  population?: string
  config?: string
  strata?: string
  headerRow: string
  weights?: boolean
  rescale?: boolean
  labels?: boolean
  tidy?: boolean
  missing: boolean
}

async function readTable(path: string, headerRow = 0): Promise<Table> {
  const text = await readFile(resolve(path), 'utf8')
  return parseCSV(text, { headerRow })
}

async function buildConfig(opts: CliOptions): Promise<PipelineConfig> {
  const fromFile: unknown = opts.config ? JSON.parse(await readFile(resolve(opts.config), 'utf8')) : {}
  const base = withEnvOverrides(parseConfig(fromFile))
  const strata = opts.strata
    ? opts.strata.split(',').map((s) => s.trim()).filter(Boolean)
    : undefined

  return parseConfig({
    ...base,
    steps: {
      ...base.steps,
      ...(opts.missing ? {} : { runMissingValueHandling: false }),
      ...(opts.weights ? { runWeightCalculation: true } : {}),
      ...(opts.labels ? { runLabelEncoding: true } : {}),
      ...(opts.tidy ? { runTidyExport: true } : {}),
    },
    weights: {
      ...base.weights,
      ...(strata ? { strata } : {}),
      ...(opts.rescale ? { rescale: true } : {}),
    },
  })
}

async function main(): Promise<void> {
  loadDotenv()

  const program = new Command()
    .name('survey-prep')
    .description('Encode multi-response sets, fill skips, weight, label and reshape a survey table')
    .requiredOption('-i, --input <path>', 'Raw survey CSV')
    .requiredOption('-o, --out <dir>', 'Output directory')
    .option('--population <path>', 'Population reference CSV (for weights)')
    .option('--config <path>', 'Pipeline configuration JSON')
    .option('--strata <columns>', 'Comma-separated stratum columns')
    .option('--header-row <n>', '0-based header row of the raw CSV', '0')
    .option('--weights', 'Enable weight calculation')
    .option('--rescale', 'Rescale weights to sum to the matched sample size')
    .option('--labels', 'Enable label encoding')
    .option('--tidy', 'Enable tidy (long) export')
    .option('--no-missing', 'Disable missing-value handling')
    .parse(process.argv)

  const opts = program.opts<CliOptions>()

  let config: PipelineConfig
  try {
    config = await buildConfig(opts)
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error({ issues: err.issues }, err.message)
      process.exitCode = 1
      return
    }
    throw err
  }

  const headerRow = Number.parseInt(opts.headerRow, 10)
  const raw = await readTable(opts.input, Number.isNaN(headerRow) ? 0 : headerRow)
  const reference = opts.population ? await readTable(opts.population) : undefined
  logger.info({ input: opts.input, rows: raw.rows.length, columns: raw.columns.length }, 'survey table loaded')

  const result = runPipeline({ raw, reference }, config)
  const files = await writeOutputs(resolve(opts.out), result)

  for (const outcome of result.report.steps) {
    if (outcome.status === 'failed') logger.warn({ step: outcome.step }, outcome.message ?? 'step failed')
  }
  logger.info({ out: opts.out, files, issues: issueCount(result.report) }, 'outputs written')
}

main().catch((err) => {
  logger.fatal({ err }, 'survey-prep failed')
  process.exit(1)
})
