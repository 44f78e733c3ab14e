import { logger } from '@infra/logging'
import {
  DataMarker,
  type DefaultRoute,
  type RoutingInfo
} from '@shared/interfaces/common'
import { sanitizeForLog, validateInterfaceName } from '@shared/utils/validators'
import { runCommand } from './command-runner'
import { selectBestDefaultRoute } from './metric-order'

// "2: eth0: <BROADCAST,MULTICAST,UP,LOWER_UP> mtu 1500 ..."
const LINK_HEADER = /^\d+:\s+([^:@\s]+)/

const NO_ROUTE: RoutingInfo = {
  gateway: DataMarker.NoneValue,
  metric: DataMarker.NoneValue
}

export function parseInterfaceList(output: string): string[] {
  const names: string[] = []

  output.split(/\r?\n/).forEach((line) => {
    const match = line.match(LINK_HEADER)
    if (!match) return

    const name = match[1].trim()
    if (validateInterfaceName(name)) {
      names.push(name)
    } else {
      logger.warn('Skipping interface with invalid name', { name: sanitizeForLog(name) })
    }
  })

  return names
}

/**
 * All interfaces regardless of state, in the order the kernel lists them.
 * Empty on failure.
 */
export async function getInterfaceList(): Promise<string[]> {
  const output = await runCommand('ip', ['-o', 'link', 'show'])
  if (!output) return []
  return parseInterfaceList(output)
}

type AddressFamily = 'inet' | 'inet6'

export function parseAddressMap(output: string, family: AddressFamily): Map<string, string> {
  const result = new Map<string, string>()
  let currentIface: string | null = null
  const addressPattern = family === 'inet' ? /inet\s+([0-9.]+)/ : /inet6\s+([0-9a-fA-F:]+)/

  output.split(/\r?\n/).forEach((line) => {
    if (!/^\s/.test(line)) {
      const match = line.match(LINK_HEADER)
      currentIface = match ? match[1] : null
      return
    }

    if (!currentIface || result.has(currentIface)) return

    const trimmed = line.trim()
    if (!trimmed.startsWith(`${family} `)) return

    if (family === 'inet6') {
      if (/\bfe80:/i.test(trimmed)) return
      if (trimmed.includes('temporary') || trimmed.includes('deprecated')) return
      if (!trimmed.includes('scope global')) return
    }

    const match = trimmed.match(addressPattern)
    if (match) {
      result.set(currentIface, match[1])
    }
  })

  return result
}

export async function getAllIpv4Addresses(): Promise<Map<string, string>> {
  const output = await runCommand('ip', ['-4', 'addr', 'show'])
  return output ? parseAddressMap(output, 'inet') : new Map()
}

// global scope only: link-local, temporary and deprecated addresses are skipped
export async function getAllIpv6Addresses(): Promise<Map<string, string>> {
  const output = await runCommand('ip', ['-6', 'addr', 'show'])
  return output ? parseAddressMap(output, 'inet6') : new Map()
}

/**
 * Reads the default route line of `ip route show dev <if>`.
 *
 * A metric the kernel does not print is reported as DEFAULT, never resolved to
 * a number: the effective value depends on the destination queried.
 */
export function parseRouteInfo(output: string): RoutingInfo {
  for (const line of output.split(/\r?\n/)) {
    const trimmed = line.trim()
    if (!trimmed.startsWith('default')) continue

    const gateway = trimmed.match(/via\s+([0-9a-fA-F.:]+)/)?.[1] ?? DataMarker.NoneValue
    const metric = trimmed.match(/metric\s+(\d+)/)?.[1] ?? DataMarker.Default

    return { gateway, metric }
  }

  return { ...NO_ROUTE }
}

export async function getRouteInfo(iface: string): Promise<RoutingInfo> {
  const output = await runCommand('ip', ['route', 'show', 'dev', iface])
  if (!output) return { ...NO_ROUTE }

  const route = parseRouteInfo(output)
  logger.debug(`[${sanitizeForLog(iface)}] Route`, {
    gateway: sanitizeForLog(route.gateway),
    metric: sanitizeForLog(route.metric)
  })
  return route
}

export function parseDefaultRoutes(output: string): DefaultRoute[] {
  const routes: DefaultRoute[] = []

  output.split(/\r?\n/).forEach((line) => {
    const trimmed = line.trim()
    if (!trimmed.startsWith('default')) return

    const interfaceName = trimmed.match(/dev\s+(\S+)/)?.[1]
    if (!interfaceName) return

    routes.push({
      interfaceName,
      metric: trimmed.match(/metric\s+(\d+)/)?.[1] ?? DataMarker.Default
    })
  })

  return routes
}

/**
 * Interface holding the host's default route, chosen by metric. Undefined when
 * there is no default route.
 */
export async function getActiveInterface(): Promise<string | undefined> {
  const output = await runCommand('ip', ['route', 'show', 'default'])
  if (!output) return undefined

  return selectBestDefaultRoute(parseDefaultRoutes(output))?.interfaceName
}
