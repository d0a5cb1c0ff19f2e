/**
 * ConfirmationPrompter backed by a LinePrompter — the terminal side of the
 * overwrite confirmation protocol.
 */

import type { ConfirmationPrompter } from '../../modules/env-update/env-updater.js'
import type { LinePrompter } from './line-prompter.js'

export class TerminalConfirmationPrompter implements ConfirmationPrompter {
  constructor(private readonly _prompter: LinePrompter) {}

  askOverwrite(rawKey: string): Promise<string> {
    return this._prompter.ask(
      `Key "${rawKey}" already exists. Do you want to change its value? (yes/no): `,
    )
  }

  askCurrentValue(attempt: number, maxAttempts: number): Promise<string> {
    return this._prompter.ask(
      `Enter the current value to confirm (attempt ${String(attempt)} of ${String(maxAttempts)}): `,
    )
  }

  notifyMismatch(): void {
    this._prompter.say('Value does not match.')
  }
}
