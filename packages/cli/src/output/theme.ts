import chalk, { type ChalkInstance } from 'chalk'
import { StatusTag, VerificationStatus } from '@tuneup/core'

export const t = {
  blue:   chalk.hex('#4FC3F7'),
  text:   chalk.hex('#C8C8C0'),
  white:  chalk.hex('#F2F2EC'),
  dim:    chalk.hex('#444444'),
  muted:  chalk.hex('#666666'),
  amber:  chalk.hex('#D4880A'),
  green:  chalk.hex('#81C784'),
  red:    chalk.hex('#CF6679'),
} as const

const _tagColors: Record<StatusTag, ChalkInstance> = {
  [StatusTag.Ok]:   t.green,
  [StatusTag.Fail]: t.red,
  [StatusTag.Warn]: t.amber,
  [StatusTag.Info]: t.blue,
}

export const tagColor = (tag: StatusTag): ChalkInstance => _tagColors[tag]

const _verifyColors: Record<VerificationStatus, ChalkInstance> = {
  [VerificationStatus.Pass]:    t.green,
  [VerificationStatus.Fail]:    t.red,
  [VerificationStatus.Skipped]: t.muted,
  [VerificationStatus.Info]:    t.blue,
}

export const verifyColor = (status: VerificationStatus): ChalkInstance => _verifyColors[status]

/** `[ OK ]`, `[FAIL]`, padded so subjects line up. */
export function formatTag(tag: StatusTag): string {
  const inner = tag.length >= 4 ? tag : ` ${tag.padEnd(3)}`
  return tagColor(tag)(`[${inner}]`)
}

export function colorDiff(diffText: string): string {
  return diffText
    .split('\n')
    .map((line) => {
      if (line.startsWith('+')) return t.green(line)
      if (line.startsWith('-')) return t.red(line)
      return t.text(line)
    })
    .join('\n')
}
