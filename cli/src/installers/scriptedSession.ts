import type { InteractiveProcess } from './exec.js'
import { ProvisionError, ProvisionErrorCode } from './errors.js'

export interface PromptStep {
  name: string
  pattern: RegExp
  response: string
}

export interface ScriptedSessionResult {
  answered: Array<{ name: string; response: string }>
  exitCode: number
}

/**
 * Answers a fixed, ordered list of prompts from a subprocess. Output is
 * accumulated and only the next expected prompt is tested against it, so a
 * prompt arriving out of order is never answered. Once the last prompt is
 * answered stdin is closed and the remaining output is drained.
 */
export async function runScriptedSession(
  proc: InteractiveProcess,
  steps: PromptStep[],
  options: { onOutput?: (chunk: string) => void } = {}
): Promise<ScriptedSessionResult> {
  const answered: ScriptedSessionResult['answered'] = []
  let buffer = ''
  let next = 0

  for await (const chunk of proc.output) {
    options.onOutput?.(chunk)
    if (next >= steps.length) continue
    buffer += chunk
    let step = steps[next]
    let match = step ? step.pattern.exec(buffer) : null
    while (step && match) {
      proc.write(`${step.response}\n`)
      answered.push({ name: step.name, response: step.response })
      buffer = buffer.slice(match.index + match[0].length)
      next++
      if (next === steps.length) proc.end()
      step = steps[next]
      match = step ? step.pattern.exec(buffer) : null
    }
  }

  const exitCode = await proc.exited
  const inputError = proc.inputError()
  if (inputError) {
    throw new ProvisionError(
      ProvisionErrorCode.SCRIPTED_SESSION_FAILED,
      `Installer stopped reading input (${inputError.message}) after ${answered.length} of ${steps.length} answers`,
      { answered: answered.map((a) => a.name), exitCode }
    )
  }
  const pending = steps[next]
  if (pending) {
    throw new ProvisionError(
      ProvisionErrorCode.SCRIPTED_SESSION_FAILED,
      `Installer exited (code ${exitCode}) before prompting for ${pending.name}`,
      { answered: answered.map((a) => a.name), exitCode }
    )
  }
  return { answered, exitCode }
}
