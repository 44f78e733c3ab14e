import { logger } from '@infra/logging'
import { INSTALL_HINTS, REQUIRED_COMMANDS, type RequiredCommand } from '@config/constants'
import {
  createEmptyEgress,
  createEmptyInterfaceRecord,
  DataMarker,
  type EgressInfo,
  type InterfaceRecord
} from '@shared/interfaces/common'
import { sanitizeForLog } from '@shared/utils/validators'
import { commandExists } from '@core/network/command-runner'
import { classifyDnsLeaks } from '@core/network/dns-leak-classifier'
import { classifyInterface } from '@core/network/interface-classifier'
import { correlateVpnUnderlay, type VpnCorrelation } from '@core/network/vpn-underlay'
import type { NetworkDataSources } from './data-sources'

export interface NetworkSnapshot {
  interfaces: InterfaceRecord[]
  activeInterface: string | null
  vpnCorrelations: VpnCorrelation[]
}

/**
 * Returns the required commands missing from PATH, logging an install hint for
 * each. Runs before any collection starts.
 */
export async function checkDependencies(
  exists: (command: string) => Promise<boolean> = commandExists
): Promise<RequiredCommand[]> {
  const missing: RequiredCommand[] = []

  for (const command of REQUIRED_COMMANDS) {
    if (await exists(command)) continue

    missing.push(command)
    logger.error(`Missing required command: ${command}`)
    logger.error(`  Install: ${INSTALL_HINTS[command]}`)
  }

  return missing
}

interface InterfaceContext {
  activeInterface: string | undefined
  egress: EgressInfo | undefined
  ipv4: Map<string, string>
  ipv6: Map<string, string>
  modemDevicePaths: readonly string[]
}

async function processSingleInterface(
  name: string,
  sources: NetworkDataSources,
  context: InterfaceContext
): Promise<InterfaceRecord> {
  const record = createEmptyInterfaceRecord(name)

  const signals = await sources.getInterfaceSignals(name, context.modemDevicePaths)
  record.interfaceType = classifyInterface(signals)
  logger.debug(`[${sanitizeForLog(name)}] Type: ${record.interfaceType}`)

  record.device = await sources.getDeviceName(name, record.interfaceType)
  logger.debug(`[${sanitizeForLog(name)}] Device: ${sanitizeForLog(record.device)}`)

  record.ip = {
    ipv4: context.ipv4.get(name) ?? DataMarker.NotAvailable,
    ipv6: context.ipv6.get(name) ?? DataMarker.NotAvailable
  }

  const dns = await sources.getInterfaceDns(name)
  record.dns.servers = dns.servers
  record.dns.currentServer = dns.currentServer

  record.routing = await sources.getRouteInfo(name)

  record.egress =
    name === context.activeInterface && context.egress ? { ...context.egress } : createEmptyEgress()

  return record
}

/*
  Stages, in order:
    1. interface list, active interface, egress (active interface only)
    2. batched address maps and modem paths
    3. per-interface type, device, ip, dns, routing; a failing interface is dropped
    4. barrier: DNS leak classification over the complete set
    5. barrier: socket snapshot and VPN underlay correlation
*/
export async function collectNetworkData(sources: NetworkDataSources): Promise<NetworkSnapshot> {
  const interfaceNames = await sources.listInterfaces()
  if (interfaceNames.length === 0) {
    logger.error('No network interfaces found')
    return { interfaces: [], activeInterface: null, vpnCorrelations: [] }
  }
  logger.info(`Found ${interfaceNames.length} interfaces`)

  const activeInterface = await sources.getActiveInterface()
  if (activeInterface) {
    logger.info(`Active interface: ${sanitizeForLog(activeInterface)}`)
  } else {
    logger.info('No active interface (no default route)')
  }

  let egress: EgressInfo | undefined
  if (activeInterface) {
    logger.info('Querying external IP...')
    egress = await sources.getEgress()
  }

  logger.debug('Batch querying addresses...')
  const context: InterfaceContext = {
    activeInterface,
    egress,
    ipv4: await sources.getIpv4Addresses(),
    ipv6: await sources.getIpv6Addresses(),
    modemDevicePaths: await sources.getModemDevicePaths()
  }

  const interfaces: InterfaceRecord[] = []
  for (const name of interfaceNames) {
    try {
      interfaces.push(await processSingleInterface(name, sources, context))
    } catch (error) {
      logger.warn(`Failed to process ${sanitizeForLog(name)}`, {
        error: sanitizeForLog(error instanceof Error ? error.message : error)
      })
    }
  }

  logger.debug('Checking DNS leaks...')
  classifyDnsLeaks(interfaces)

  logger.debug('Detecting VPN underlay...')
  const sockets = await sources.getSocketTuples()
  const vpnCorrelations = correlateVpnUnderlay(interfaces, sockets)

  return {
    interfaces,
    activeInterface: activeInterface ?? null,
    vpnCorrelations
  }
}
