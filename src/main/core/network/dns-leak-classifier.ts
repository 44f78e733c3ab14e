import { logger } from '@infra/logging'
import { PUBLIC_DNS_SERVERS } from '@config/constants'
import {
  DnsLeakStatus,
  InterfaceType,
  type InterfaceRecord
} from '@shared/interfaces/common'
import { sanitizeForLog } from '@shared/utils/validators'

export interface DnsCategories {
  vpnDns: ReadonlySet<string>
  ispDns: ReadonlySet<string>
}

const ISP_UPLINK_TYPES: ReadonlySet<InterfaceType> = new Set([
  InterfaceType.Ethernet,
  InterfaceType.Wireless,
  InterfaceType.Tether
])

/**
 * Splits every configured resolver on the host into VPN-owned and ISP-owned
 * sets. Needs the complete interface set.
 */
export function collectDnsCategories(records: readonly InterfaceRecord[]): DnsCategories {
  const vpnDns = new Set<string>()
  const ispDns = new Set<string>()

  for (const record of records) {
    if (record.interfaceType === InterfaceType.Vpn) {
      record.dns.servers.forEach((server) => vpnDns.add(server))
    } else if (ISP_UPLINK_TYPES.has(record.interfaceType)) {
      record.dns.servers.forEach((server) => ispDns.add(server))
    }
  }

  return { vpnDns, ispDns }
}

function overlap(configured: readonly string[], known: ReadonlySet<string>): string[] {
  return configured.filter((server) => known.has(server))
}

/*
  The order of the checks is part of the contract: an interface listing both an
  ISP resolver and a VPN resolver is a LEAK, never OK.
*/
export function detectDnsLeak(
  interfaceName: string,
  configured: readonly string[],
  categories: DnsCategories,
  publicServers: ReadonlySet<string> = PUBLIC_DNS_SERVERS
): DnsLeakStatus {
  if (categories.vpnDns.size === 0) {
    return DnsLeakStatus.NotApplicable
  }

  if (configured.length === 0) {
    return DnsLeakStatus.NotApplicable
  }

  const ispOverlap = overlap(configured, categories.ispDns)
  if (ispOverlap.length > 0) {
    logger.warn(`DNS leak on ${sanitizeForLog(interfaceName)}: using ISP DNS`, {
      servers: ispOverlap
    })
    return DnsLeakStatus.Leak
  }

  const vpnOverlap = overlap(configured, categories.vpnDns)
  if (vpnOverlap.length > 0) {
    logger.debug(`${sanitizeForLog(interfaceName)} using VPN DNS`, { servers: vpnOverlap })
    return DnsLeakStatus.Ok
  }

  const publicOverlap = overlap(configured, publicServers)
  if (publicOverlap.length > 0) {
    logger.info(`${sanitizeForLog(interfaceName)} using public DNS (not the ISP)`, {
      servers: publicOverlap
    })
    return DnsLeakStatus.Public
  }

  logger.warn(`${sanitizeForLog(interfaceName)} using unknown DNS`, {
    servers: configured.map((server) => sanitizeForLog(server))
  })
  return DnsLeakStatus.Warn
}

/**
 * Sets `dns.leakStatus` on every record. Runs only once the type and DNS
 * configuration of every interface are known.
 */
export function classifyDnsLeaks(
  records: InterfaceRecord[],
  publicServers: ReadonlySet<string> = PUBLIC_DNS_SERVERS
): DnsCategories {
  const categories = collectDnsCategories(records)

  for (const record of records) {
    record.dns.leakStatus = detectDnsLeak(
      record.name,
      record.dns.servers,
      categories,
      publicServers
    )
  }

  return categories
}
