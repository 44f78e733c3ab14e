import { execFile } from 'node:child_process'
import { promisify } from 'node:util'
import { logger } from '@infra/logging'
import { COMMAND_TIMEOUT_MS } from '@config/constants'
import { sanitizeForLog } from '@shared/utils/validators'

type CommandOptions = {
  timeoutMs?: number
}

const MAX_STDOUT_BUFFER = 10 * 1024 * 1024
const COMMAND_NAME_PATTERN = /^[a-zA-Z0-9_-]+$/

const execFileAsync = promisify(execFile)

/**
 * Runs a system command without a shell and returns its trimmed stdout.
 *
 * Non-zero exit, timeout, a missing binary and any other failure all yield
 * `null`; callers turn that into a marker or a "no match".
 */
export async function runCommand(
  cmd: string,
  args: string[],
  options?: CommandOptions
): Promise<string | null> {
  const timeoutMs = options?.timeoutMs ?? COMMAND_TIMEOUT_MS

  try {
    const { stdout, stderr } = await execFileAsync(cmd, args, {
      encoding: 'utf8',
      maxBuffer: MAX_STDOUT_BUFFER,
      windowsHide: true,
      timeout: timeoutMs
    })

    if (stderr?.trim()) {
      logger.debug('Command stderr output', {
        command: `${cmd} ${args.join(' ')}`,
        stderr: sanitizeForLog(stderr.trim())
      })
    }

    return stdout.trim()
  } catch (error) {
    logger.debug('Command failed', {
      command: `${cmd} ${args.join(' ')}`,
      error: sanitizeForLog(error instanceof Error ? error.message : error)
    })
    return null
  }
}

export async function commandExists(command: string): Promise<boolean> {
  if (!COMMAND_NAME_PATTERN.test(command)) {
    return false
  }

  const output = await runCommand('which', [command])
  return output !== null && output.length > 0
}
