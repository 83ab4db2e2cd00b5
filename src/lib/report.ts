/**
 * Run report: accumulates the non-fatal conditions raised by each stage so the caller can judge data quality.
 */

import type { IssueKind, IssueSummary, ReportIssue, RunReport, StepName, StepOutcome, StepStatus } from '../types'

export const ISSUE_KINDS: IssueKind[] = [
  'SchemaAmbiguity',
  'UnresolvedSkipGate',
  'UnmatchedStratum',
  'MissingLabelPair',
  'StructuralInputError',
]

/**
 * Raised when an enabled step cannot run at all (e.g. a stratum column is missing).
 * The pipeline skips that step for the whole run and keeps going.
 */
export class StructuralInputError extends Error {
  readonly step: StepName

  constructor(step: StepName, message: string) {
    super(message)
    this.name = 'StructuralInputError'
    this.step = step
  }
}

function summaries(make: (kind: IssueKind) => IssueSummary): Record<IssueKind, IssueSummary> {
  return {
    SchemaAmbiguity: make('SchemaAmbiguity'),
    UnresolvedSkipGate: make('UnresolvedSkipGate'),
    UnmatchedStratum: make('UnmatchedStratum'),
    MissingLabelPair: make('MissingLabelPair'),
    StructuralInputError: make('StructuralInputError'),
  }
}

export function emptyReport(): RunReport {
  return { steps: [], issues: summaries(() => ({ count: 0, examples: [] })) }
}

export class ReportBuilder {
  private readonly report: RunReport = emptyReport()
  private readonly maxExamples: number

  constructor(maxExamples: number) {
    this.maxExamples = maxExamples
  }

  step(step: StepName, status: StepStatus, message?: string): void {
    const outcome: StepOutcome = message ? { step, status, message } : { step, status }
    this.report.steps.push(outcome)
  }

  add(issues: ReportIssue[]): void {
    for (const issue of issues) {
      const summary = this.report.issues[issue.kind]
      summary.count++
      if (summary.examples.length < this.maxExamples) summary.examples.push(issue)
    }
  }

  build(): RunReport {
    return {
      steps: [...this.report.steps],
      issues: summaries((kind) => {
        const { count, examples } = this.report.issues[kind]
        return { count, examples: [...examples] }
      }),
    }
  }
}

/** Total number of issues across all kinds */
export function issueCount(report: RunReport): number {
  return ISSUE_KINDS.reduce((sum, kind) => sum + report.issues[kind].count, 0)
}
