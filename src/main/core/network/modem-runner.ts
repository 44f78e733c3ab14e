import { z } from 'zod'
import { logger } from '@infra/logging'
import { MODEM_COMMAND } from '@config/constants'
import { sanitizeForLog } from '@shared/utils/validators'
import { runCommand } from './command-runner'

const ACTIVE_MODEM_STATES = new Set([
  'enabled',
  'searching',
  'registered',
  'connecting',
  'connected',
  'disconnecting'
])

const modemDetailsSchema = z.object({
  modem: z.object({
    generic: z.object({
      device: z.string().min(1),
      state: z.string().optional()
    })
  })
})

// "/org/freedesktop/ModemManager1/Modem/0 [Quectel] EM05-G"
export function parseModemList(output: string): string[] {
  const ids: string[] = []
  output.split(/\r?\n/).forEach((line) => {
    const match = line.match(/\/Modem\/(\d+)\b/)
    if (match) ids.push(match[1])
  })
  return ids
}

/**
 * Sysfs device path of a modem in an active state, from `mmcli -m <id> -J`.
 */
export function parseModemDetails(output: string): string | undefined {
  let parsed: unknown
  try {
    parsed = JSON.parse(output)
  } catch {
    return undefined
  }

  const result = modemDetailsSchema.safeParse(parsed)
  if (!result.success) return undefined

  const { device, state } = result.data.modem.generic
  const normalizedState = state?.trim().toLowerCase()
  if (!normalizedState || !ACTIVE_MODEM_STATES.has(normalizedState)) return undefined

  return device
}

/**
 * Device paths of every active cellular modem. ModemManager is optional: when
 * mmcli is missing or fails the list is simply empty.
 */
export async function getActiveModemDevicePaths(): Promise<string[]> {
  const listing = await runCommand(MODEM_COMMAND, ['-L'])
  if (!listing) return []

  const paths: string[] = []
  for (const id of parseModemList(listing)) {
    const details = await runCommand(MODEM_COMMAND, ['-m', id, '-J'])
    const device = details ? parseModemDetails(details) : undefined
    if (device) {
      logger.debug(`Active modem ${id}`, { device: sanitizeForLog(device) })
      paths.push(device)
    }
  }

  return paths
}
