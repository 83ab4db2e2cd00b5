export type * from './types'
export { parseConfig, withEnvOverrides, ConfigError, PipelineConfigSchema } from './lib/config'
export type { PipelineConfig, PipelineConfigInput, TargetKind } from './lib/config'
export { parseCSV, toCSV } from './lib/csvParse'
export { resolveSchema, detectLabelPairs, dependentColumns, DEFAULT_CONVENTIONS } from './lib/schemaResolver'
export type { SchemaConventions, SchemaDeclarations, SchemaResolution } from './lib/schemaResolver'
export { handleMissingValues, binarize, orderSkipRules } from './lib/missingValues'
export type { MissingValueOptions } from './lib/missingValues'
export { computeWeights, referenceShares } from './lib/weights'
export type { WeightOptions } from './lib/weights'
export { encodeLabels, renameOptionColumns } from './lib/labelEncoder'
export type { LabelEncoding, LabelOptions } from './lib/labelEncoder'
export { exportTidy, LONG_COLUMNS } from './lib/tidyExport'
export type { TidyOptions } from './lib/tidyExport'
export { runPipeline } from './lib/pipeline'
export type { PipelineInput, PipelineResult } from './lib/pipeline'
export { StructuralInputError, ReportBuilder, emptyReport, issueCount } from './lib/report'
export { writeOutputs, outputFiles, tidyFileNames } from './lib/outputs'
export { logger } from './lib/logger'
