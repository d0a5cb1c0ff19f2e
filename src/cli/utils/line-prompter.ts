/**
 * Line-oriented prompting over a single readline interface.
 *
 * One interface serves the whole run, so answers piped in ahead of their
 * questions are buffered instead of lost. Answers are trimmed.
 */

import { createInterface } from 'readline'
import type { Interface } from 'readline'
import type { Readable, Writable } from 'stream'
import { PromptClosedError } from '../../core/errors.js'

export interface LinePrompter {
  /**
   * Write `question` and wait for the next line of input.
   * @throws {PromptClosedError} if input ends before a line arrives.
   */
  ask(question: string): Promise<string>

  /** Write a line of feedback to the user */
  say(message: string): void

  close(): void
}

interface PendingQuestion {
  question: string
  resolve: (answer: string) => void
  reject: (err: Error) => void
}

export class ReadlinePrompter implements LinePrompter {
  private readonly _rl: Interface
  private readonly _output: Writable
  private readonly _buffered: string[] = []
  private _pending: PendingQuestion | null = null
  private _closed = false

  constructor(input: Readable, output: Writable) {
    this._output = output
    this._rl = createInterface({ input, terminal: false })

    this._rl.on('line', (line: string) => {
      const pending = this._pending
      if (pending === null) {
        this._buffered.push(line)
        return
      }
      this._pending = null
      pending.resolve(line.trim())
    })

    this._rl.on('close', () => {
      this._closed = true
      const pending = this._pending
      if (pending !== null) {
        this._pending = null
        pending.reject(new PromptClosedError(pending.question))
      }
    })
  }

  ask(question: string): Promise<string> {
    this._output.write(question)

    const buffered = this._buffered.shift()
    if (buffered !== undefined) return Promise.resolve(buffered.trim())
    if (this._closed) return Promise.reject(new PromptClosedError(question))

    return new Promise((resolve, reject) => {
      this._pending = { question, resolve, reject }
    })
  }

  say(message: string): void {
    this._output.write(message + '\n')
  }

  close(): void {
    this._rl.close()
  }
}
