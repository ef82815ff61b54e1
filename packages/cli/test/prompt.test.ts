/**
 * tuneup CLI — prompter tests
 *
 *   PR-1: only y / yes accepts
 *   PR-2: a closed input declines
 *   PR-3: AutoAcceptPrompter accepts and logs the acceptance
 */

import { describe, it, expect } from 'vitest'
import { PassThrough } from 'node:stream'
import { MemoryRunLogSink, RunLogger, silentReporter } from '@tuneup/core'
import { AutoAcceptPrompter, ReadlinePrompter } from '../src/prompt.js'

async function ask(answer: string | null): Promise<boolean> {
  const input = new PassThrough()
  const output = new PassThrough()
  const prompter = new ReadlinePrompter(input, output)
  const pending = prompter.confirm('Rebuild the initramfs?')
  if (answer === null) input.end()
  else input.write(`${answer}\n`)
  return pending
}

describe('ReadlinePrompter', () => {
  it('PR-1: accepts y and yes, declines anything else', async () => {
    expect(await ask('y')).toBe(true)
    expect(await ask('YES')).toBe(true)
    expect(await ask('')).toBe(false)
    expect(await ask('no')).toBe(false)
    expect(await ask('yep')).toBe(false)
  })

  it('PR-2: end of input declines', async () => {
    expect(await ask(null)).toBe(false)
  })
})

describe('AutoAcceptPrompter', () => {
  it('PR-3: accepts and records an INFO status', async () => {
    const sink = new MemoryRunLogSink()
    const log = new RunLogger('r1', sink, silentReporter, () => '2026-03-01T12:00:00.000Z')

    expect(await new AutoAcceptPrompter(log).confirm('Add sd-encrypt?')).toBe(true)
    expect(sink.entries).toEqual([
      {
        timestamp: '2026-03-01T12:00:00.000Z',
        runId: 'r1',
        event: 'status',
        tag: 'INFO',
        subject: 'confirm',
        message: 'auto-accepted (--all): Add sd-encrypt?',
      },
    ])
  })
})
