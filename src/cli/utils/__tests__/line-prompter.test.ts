/**
 * Unit tests for ReadlinePrompter and TerminalConfirmationPrompter.
 */

import { describe, it, expect } from 'vitest'
import { PassThrough, Writable } from 'stream'
import { ReadlinePrompter } from '../line-prompter.js'
import { TerminalConfirmationPrompter } from '../terminal-confirmation.js'
import { PromptClosedError } from '../../../core/errors.js'

function collector(): { stream: Writable; text: () => string } {
  let text = ''
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      text += chunk.toString()
      callback()
    },
  })
  return { stream, text: () => text }
}

describe('ReadlinePrompter', () => {
  it('writes the question and resolves with the trimmed answer', async () => {
    const input = new PassThrough()
    const out = collector()
    const prompter = new ReadlinePrompter(input, out.stream)

    const answer = prompter.ask('Name? ')
    input.write('  alice  \n')

    await expect(answer).resolves.toBe('alice')
    expect(out.text()).toBe('Name? ')
    prompter.close()
  })

  it('buffers lines that arrive before the question', async () => {
    const input = new PassThrough()
    const prompter = new ReadlinePrompter(input, collector().stream)

    input.end('first\nsecond\n')
    await new Promise((resolve) => setImmediate(resolve))

    await expect(prompter.ask('1? ')).resolves.toBe('first')
    await expect(prompter.ask('2? ')).resolves.toBe('second')
    prompter.close()
  })

  it('rejects a pending question when input ends', async () => {
    const input = new PassThrough()
    const prompter = new ReadlinePrompter(input, collector().stream)

    const answer = prompter.ask('Value? ')
    input.end()

    await expect(answer).rejects.toBeInstanceOf(PromptClosedError)
  })

  it('rejects immediately once input has ended', async () => {
    const input = new PassThrough()
    const prompter = new ReadlinePrompter(input, collector().stream)
    input.end()
    await new Promise((resolve) => setImmediate(resolve))

    await expect(prompter.ask('Value? ')).rejects.toMatchObject({
      code: 'PROMPT_CLOSED',
      context: { question: 'Value? ' },
    })
  })
})

describe('TerminalConfirmationPrompter', () => {
  it('asks the overwrite and re-entry questions and reports mismatches', async () => {
    const input = new PassThrough()
    const out = collector()
    const confirmation = new TerminalConfirmationPrompter(new ReadlinePrompter(input, out.stream))

    input.end('yes\nold\n')
    await expect(confirmation.askOverwrite('db password')).resolves.toBe('yes')
    await expect(confirmation.askCurrentValue(1, 3)).resolves.toBe('old')
    confirmation.notifyMismatch()

    expect(out.text()).toBe(
      'Key "db password" already exists. Do you want to change its value? (yes/no): ' +
        'Enter the current value to confirm (attempt 1 of 3): ' +
        'Value does not match.\n',
    )
  })
})
