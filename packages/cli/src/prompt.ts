import * as readline from 'node:readline/promises'
import { stdin, stdout } from 'node:process'
import { StatusTag, type Prompter, type RunLogger } from '@tuneup/core'

/**
 * Asks on the terminal. Only `y` or `yes` accepts; an empty answer or a
 * closed input declines.
 */
export class ReadlinePrompter implements Prompter {
  constructor(
    private readonly input: NodeJS.ReadableStream = stdin,
    private readonly output: NodeJS.WritableStream = stdout,
  ) {}

  async confirm(question: string): Promise<boolean> {
    const rl = readline.createInterface({ input: this.input, output: this.output })
    const closed = new Promise<string>((resolve) => {
      rl.once('close', () => resolve(''))
    })
    try {
      const answer = await Promise.race([rl.question(`${question} [y/N] `).catch(() => ''), closed])
      return /^y(es)?$/i.test(answer.trim())
    } finally {
      rl.close()
    }
  }
}

/** `--all`: every confirmation is accepted and the acceptance is logged. */
export class AutoAcceptPrompter implements Prompter {
  constructor(private readonly log: RunLogger) {}

  confirm(question: string): Promise<boolean> {
    this.log.status(StatusTag.Info, 'confirm', `auto-accepted (--all): ${question}`)
    return Promise.resolve(true)
  }
}
