/**
 * Output sink: write the processed table, the tidy tables and the run report into a directory.
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { toCSV } from './csvParse'
import type { PipelineResult } from './pipeline'
import type { Table } from '../types'

/** Byte-order mark so spreadsheet apps open non-ASCII headers as UTF-8 */
const BOM = '\uFEFF'

function csvFile(table: Table): string {
  return BOM + toCSV(table)
}

/** File-system-safe name for a set (set names come from column headers) */
export function safeFileName(name: string): string {
  return name.replace(/[\\/:*?"<>|\s]+/g, '_') || 'set'
}

const MASTER_FILE = 'all_tidy.csv'

/**
 * Tidy file name per set name. Names are unique ignoring case, and never the master's;
 * a clash gets _1, _2 ... appended to the stem.
 */
export function tidyFileNames(setNames: string[]): Map<string, string> {
  const used = new Set([MASTER_FILE.toLowerCase()])
  const files = new Map<string, string>()
  for (const name of setNames) {
    const stem = safeFileName(name)
    let file = `${stem}_tidy.csv`
    for (let i = 1; used.has(file.toLowerCase()); i++) file = `${stem}_${i}_tidy.csv`
    used.add(file.toLowerCase())
    files.set(name, file)
  }
  return files
}

/** Relative paths of the files `writeOutputs` produces for a result */
export function outputFiles(result: PipelineResult): string[] {
  const files = ['processed.csv']
  if (result.tidy) {
    for (const file of tidyFileNames(Object.keys(result.tidy.sets)).values()) files.push(join('tidy', file))
    files.push(join('tidy', MASTER_FILE))
  }
  files.push('report.json')
  return files
}

export async function writeOutputs(dir: string, result: PipelineResult): Promise<string[]> {
  await mkdir(dir, { recursive: true })
  await writeFile(join(dir, 'processed.csv'), csvFile(result.table), 'utf8')
  if (result.tidy) {
    await mkdir(join(dir, 'tidy'), { recursive: true })
    const names = tidyFileNames(Object.keys(result.tidy.sets))
    for (const [name, table] of Object.entries(result.tidy.sets)) {
      await writeFile(join(dir, 'tidy', names.get(name) ?? `${safeFileName(name)}_tidy.csv`), csvFile(table), 'utf8')
    }
    await writeFile(join(dir, 'tidy', MASTER_FILE), csvFile(result.tidy.master), 'utf8')
  }
  await writeFile(join(dir, 'report.json'), JSON.stringify(result.report, null, 2) + '\n', 'utf8')
  return outputFiles(result)
}
