/**
 * Console output: the StatusReporter behind every RunLogger status line, and
 * the end-of-run summaries for install, diff and verify.
 *
 * Everything goes through a Writer so tests can capture it.
 */

import {
  ActionType,
  StatusTag,
  VerificationStatus,
  type Action,
  type DiffReport,
  type ExecutionReport,
  type StatusReporter,
  type VerificationResult,
  type VerifyPass,
} from '@tuneup/core'
import { colorDiff, formatTag, t, verifyColor } from './theme.js'

export type Writer = (line: string) => void

// eslint-disable-next-line no-console
export const consoleWriter: Writer = (line) => console.log(line)

export class ConsoleReporter implements StatusReporter {
  constructor(private readonly write: Writer = consoleWriter) {}

  status(tag: StatusTag, subject: string, message: string): void {
    this.write(`${formatTag(tag)} ${t.white(subject)}  ${t.text(message)}`)
  }

  detail(text: string): void {
    this.write(indent(colorDiff(text.trimEnd())))
  }
}

function indent(text: string): string {
  return text.split('\n').map((line) => `    ${line}`).join('\n')
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`
}

// ---------------------------------------------------------------------------
// install
// ---------------------------------------------------------------------------

export interface TagCounts {
  readonly ok: number
  readonly fail: number
  readonly warn: number
  readonly info: number
}

export function countTags(report: ExecutionReport): TagCounts {
  const tags = [...report.outcomes.map((o) => o.tag), ...report.triggers.map((tr) => tr.tag)]
  const count = (tag: StatusTag): number => tags.filter((x) => x === tag).length
  return {
    ok: count(StatusTag.Ok),
    fail: count(StatusTag.Fail),
    warn: count(StatusTag.Warn),
    info: count(StatusTag.Info),
  }
}

/** Plain-text summary lines; colored by the caller. */
export function summarizeExecution(report: ExecutionReport): string[] {
  const c = countTags(report)
  const lines = [
    `${report.dryRun ? 'Dry run' : 'Run'} ${report.runId}: ${c.ok} ok, ${c.fail} failed, ` +
      `${plural(c.warn, 'warning')}, ${c.info} info`,
  ]
  if (report.backups.length > 0) {
    lines.push(`${report.dryRun ? 'Would back up' : 'Backed up'} ${plural(report.backups.length, 'file')}:`)
    for (const b of report.backups) lines.push(`  ${b.originalPath} -> ${b.backupPath}`)
  }
  if (report.rebootRequired && !report.dryRun) lines.push('Reboot required.')
  if (report.halted !== undefined) {
    lines.push(`Stopped: ${report.halted.message}`)
    lines.push(`To continue: ${report.halted.remediation}`)
  }
  return lines
}

// ---------------------------------------------------------------------------
// diff
// ---------------------------------------------------------------------------

const ACTION_MARKS: Readonly<Record<ActionType, string>> = {
  [ActionType.Create]: '+',
  [ActionType.Update]: '~',
  [ActionType.Remove]: '-',
  [ActionType.Skip]: ' ',
}

export function formatChange(action: Action): string {
  return `${ACTION_MARKS[action.type]} ${action.resourceId}  ${action.type.toLowerCase()}: ${action.reason}`
}

export function printDiff(diff: DiffReport, write: Writer): void {
  for (const action of diff.changes) {
    write(t.white(formatChange(action)))
    if (action.diffText !== undefined && action.diffText !== '') write(indent(colorDiff(action.diffText)))
  }
}

export function summarizeDiff(diff: DiffReport): string {
  if (diff.changes.length === 0) return 'No changes: the system matches the catalog.'
  return `${plural(diff.changes.length, 'change')} pending (${diff.actions.length} resources checked).`
}

// ---------------------------------------------------------------------------
// verify
// ---------------------------------------------------------------------------

export function countStatuses(results: ReadonlyArray<VerificationResult>): Record<VerificationStatus, number> {
  const counts: Record<VerificationStatus, number> = {
    [VerificationStatus.Pass]: 0,
    [VerificationStatus.Fail]: 0,
    [VerificationStatus.Skipped]: 0,
    [VerificationStatus.Info]: 0,
  }
  for (const r of results) counts[r.status]++
  return counts
}

export function summarizeVerification(pass: VerifyPass, results: ReadonlyArray<VerificationResult>): string {
  const c = countStatuses(results)
  return (
    `Verification (${pass}): ${c[VerificationStatus.Pass]} passed, ${c[VerificationStatus.Fail]} failed, ` +
    `${c[VerificationStatus.Skipped]} skipped, ${c[VerificationStatus.Info]} info`
  )
}

export function colorVerificationSummary(results: ReadonlyArray<VerificationResult>, line: string): string {
  const c = countStatuses(results)
  return verifyColor(c[VerificationStatus.Fail] > 0 ? VerificationStatus.Fail : VerificationStatus.Pass)(line)
}
