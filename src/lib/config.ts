/**
 * Pipeline configuration: step toggles and the naming conventions used to read the survey header.
 * Validated with zod; every field has a default so `parseConfig({})` is a complete configuration.
 */

import { z } from 'zod'

/** Accepts booleans plus the strings and numbers found in env vars and hand-written JSON */
const booleanString = z.union([z.boolean(), z.string(), z.number()]).transform((val) => {
  if (typeof val === 'boolean') return val
  if (typeof val === 'number') return val !== 0
  const lower = val.toLowerCase().trim()
  return !(lower === 'false' || lower === '0' || lower === '' || lower === 'no' || lower === 'off')
})

const regexString = z.string().refine(
  (pattern) => {
    try {
      new RegExp(pattern)
      return true
    } catch {
      return false
    }
  },
  { message: 'must be a valid regular expression' }
)

const SkipRuleSchema = z.object({
  dependent: z.string().min(1),
  gate: z.string().min(1),
  values: z
    .array(z.union([z.string(), z.number()]))
    .min(1)
    .transform((values) => values.map((v) => String(v).trim())),
})

const TargetKind = z.enum(['auto', 'proportion', 'count'])

export const PipelineConfigSchema = z.object({
  steps: z
    .object({
      runMissingValueHandling: booleanString.default(true),
      runWeightCalculation: booleanString.default(false),
      runLabelEncoding: booleanString.default(false),
      runTidyExport: booleanString.default(false),
    })
    .default({}),

  /** Respondent id column; row position is used when the table has no such column */
  idColumn: z.string().min(1).default('respondent_id'),
  skipSentinel: z.string().min(1).default('SKIP(N/A)'),

  conventions: z
    .object({
      /** Splits a column name into (stem, option number); group 1 is the stem, group 2 the option */
      optionPattern: regexString.default('^(.+?)_(\\d+)$'),
      /** Separator between stem and option, used to spot names that only partially match */
      optionSeparator: z.string().min(1).default('_'),
      labelSuffix: z.string().min(1).default('(TEXT)'),
    })
    .default({}),

  /** Explicit multi-response sets (name -> member columns); these win over inferred sets */
  multiResponseSets: z.record(z.array(z.string().min(1)).min(1)).default({}),
  skipRules: z.array(SkipRuleSchema).default([]),
  /** Columns never grouped into a multi-response set */
  excludeColumns: z.array(z.string()).default([]),

  missing: z
    .object({
      fillCategoricalBlanks: booleanString.default(false),
      categoricalMaxDistinct: z.coerce.number().int().positive().default(20),
    })
    .default({}),

  weights: z
    .object({
      strata: z.array(z.string().min(1)).default([]),
      targetColumn: z.string().min(1).default('pop_share'),
      targetKind: TargetKind.default('auto'),
      rescale: booleanString.default(false),
      weightColumn: z.string().min(1).default('weight'),
    })
    .default({}),

  labels: z
    .object({
      dropLabelColumns: booleanString.default(false),
      /** Rename option columns of the processed wide table to their labels, after tidy export */
      renameOptionColumns: booleanString.default(false),
    })
    .default({}),

  tidy: z
    .object({
      carryColumns: z.array(z.string()).default([]),
      includeSingleResponse: booleanString.default(true),
    })
    .default({}),

  report: z
    .object({
      maxExamples: z.coerce.number().int().nonnegative().default(5),
    })
    .default({}),
})

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>
export type TargetKind = z.infer<typeof TargetKind>

export class ConfigError extends Error {
  readonly issues: string[]

  constructor(message: string, issues: string[]) {
    super(message)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

/** Validate a configuration object (e.g. parsed JSON) and fill in defaults. */
export function parseConfig(input: unknown = {}): PipelineConfig {
  const parsed = PipelineConfigSchema.safeParse(input)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    throw new ConfigError(`Invalid pipeline configuration: ${issues.join('; ')}`, issues)
  }
  return parsed.data
}

type StepInput = NonNullable<PipelineConfigInput['steps']>

const STEP_ENV_VARS: ReadonlyArray<readonly [keyof StepInput, string]> = [
  ['runMissingValueHandling', 'SURVEY_PREP_RUN_MISSING_VALUE_HANDLING'],
  ['runWeightCalculation', 'SURVEY_PREP_RUN_WEIGHT_CALCULATION'],
  ['runLabelEncoding', 'SURVEY_PREP_RUN_LABEL_ENCODING'],
  ['runTidyExport', 'SURVEY_PREP_RUN_TIDY_EXPORT'],
]

/**
 * Overlay SURVEY_PREP_* environment variables on a configuration input.
 * Only variables that are set take effect; the result still goes through `parseConfig`.
 */
export function withEnvOverrides(
  input: PipelineConfigInput,
  env: Record<string, string | undefined> = process.env
): PipelineConfigInput {
  const steps: StepInput = { ...input.steps }
  for (const [key, name] of STEP_ENV_VARS) {
    const raw = env[name]
    if (raw !== undefined) steps[key] = raw
  }
  return {
    ...input,
    steps,
    ...(env.SURVEY_PREP_ID_COLUMN ? { idColumn: env.SURVEY_PREP_ID_COLUMN } : {}),
    ...(env.SURVEY_PREP_SKIP_SENTINEL ? { skipSentinel: env.SURVEY_PREP_SKIP_SENTINEL } : {}),
  }
}
