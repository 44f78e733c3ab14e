import { BlockList } from 'node:net'
import { logger } from '@infra/logging'
import {
  ALTERNATE_VPN_PORTS,
  CARRIER_GRADE_NAT_RANGE,
  DNS_PORT,
  PRIVATE_IPV4_RANGES,
  PRIVATE_IPV6_RANGES,
  WIREGUARD_PORT
} from '@config/constants'
import {
  DataMarker,
  InterfaceType,
  type InterfaceRecord,
  type SocketTuple
} from '@shared/interfaces/common'
import { isValidIpv4, isValidIpv6, sanitizeForLog } from '@shared/utils/validators'
import { sortByMetric } from './metric-order'

export interface EndpointConfig {
  dnsPort: number
  wireguardPort: number
  alternatePorts: ReadonlySet<number>
}

export const DEFAULT_ENDPOINT_CONFIG: EndpointConfig = {
  dnsPort: DNS_PORT,
  wireguardPort: WIREGUARD_PORT,
  alternatePorts: ALTERNATE_VPN_PORTS
}

export interface VpnCorrelation {
  vpnInterface: string
  serverIp: string
  carrierInterface: string | null
}

const PHYSICAL_TYPES: ReadonlySet<InterfaceType> = new Set([
  InterfaceType.Ethernet,
  InterfaceType.Wireless,
  InterfaceType.Cellular,
  InterfaceType.Tether
])

const NO_GATEWAY: ReadonlySet<string> = new Set([
  DataMarker.NoneValue,
  DataMarker.NotAvailable,
  DataMarker.NotApplicable
])

const unroutableAddresses = buildUnroutableList()

function buildUnroutableList(): BlockList {
  const list = new BlockList()
  PRIVATE_IPV4_RANGES.forEach(({ network, prefix }) => list.addSubnet(network, prefix, 'ipv4'))
  list.addSubnet(CARRIER_GRADE_NAT_RANGE.network, CARRIER_GRADE_NAT_RANGE.prefix, 'ipv4')
  PRIVATE_IPV6_RANGES.forEach(({ network, prefix }) => list.addSubnet(network, prefix, 'ipv6'))
  return list
}

/**
 * True for private, loopback, link-local, unspecified and carrier-grade NAT
 * (100.64.0.0/10) addresses. A VPN server is never reachable at one of these
 * from the host's point of view. Unparseable input is not flagged.
 */
export function isPrivateOrCgnat(address: string): boolean {
  if (isValidIpv4(address)) {
    return unroutableAddresses.check(address, 'ipv4')
  }
  if (isValidIpv6(address)) {
    return unroutableAddresses.check(address, 'ipv6')
  }
  return false
}

/*
  Candidate ranking, lowest wins:
    0  the socket originates from the tunnel's own address
    1  remote port is the WireGuard port
    2  remote port is one of the OpenVPN ports
*/
function rankCandidate(
  tuple: SocketTuple,
  localAddress: string,
  config: EndpointConfig
): number | null {
  if (tuple.localAddress === localAddress) return 0
  if (tuple.remotePort === config.wireguardPort) return 1
  if (config.alternatePorts.has(tuple.remotePort)) return 2
  return null
}

export function findVpnServerEndpoint(
  localAddress: string,
  sockets: readonly SocketTuple[],
  config: EndpointConfig = DEFAULT_ENDPOINT_CONFIG
): string | undefined {
  let best: { rank: number; address: string } | undefined

  for (const tuple of sockets) {
    if (tuple.state !== 'established') continue
    if (tuple.remotePort === config.dnsPort) continue
    if (isPrivateOrCgnat(tuple.remoteAddress)) continue

    const rank = rankCandidate(tuple, localAddress, config)
    if (rank === null) continue

    // strict comparison keeps the first-seen candidate on ties
    if (!best || rank < best.rank) {
      best = { rank, address: tuple.remoteAddress }
    }
  }

  return best?.address
}

export function findCarrierInterface(
  vpnInterfaceName: string,
  records: readonly InterfaceRecord[]
): InterfaceRecord | undefined {
  const candidates = records.filter(
    (record) =>
      record.name !== vpnInterfaceName &&
      PHYSICAL_TYPES.has(record.interfaceType) &&
      !NO_GATEWAY.has(record.routing.gateway)
  )

  return sortByMetric(candidates, (record) => record.routing.metric)[0]
}

/**
 * Maps each VPN tunnel to its server endpoint and to the physical interface
 * carrying it. This is the only step allowed to touch a record other than the
 * one being examined: the VPN record gets `serverIp`, the carrier record gets
 * `carriesVpn`. Both writes happen here, with both records in hand.
 */
export function correlateVpnUnderlay(
  records: InterfaceRecord[],
  sockets: readonly SocketTuple[],
  config: EndpointConfig = DEFAULT_ENDPOINT_CONFIG
): VpnCorrelation[] {
  const correlations: VpnCorrelation[] = []

  for (const vpnRecord of records) {
    if (vpnRecord.interfaceType !== InterfaceType.Vpn) continue

    const localAddress = vpnRecord.ip.ipv4
    if (!isValidIpv4(localAddress)) {
      logger.debug(`[${sanitizeForLog(vpnRecord.name)}] No tunnel address, skipping endpoint lookup`)
      continue
    }

    const serverIp = findVpnServerEndpoint(localAddress, sockets, config)
    if (!serverIp) {
      logger.debug(`Could not determine VPN server for ${sanitizeForLog(vpnRecord.name)}`)
      continue
    }

    vpnRecord.vpn.serverIp = serverIp
    logger.debug(`[${sanitizeForLog(vpnRecord.name)}] VPN server: ${sanitizeForLog(serverIp)}`)

    const carrier = findCarrierInterface(vpnRecord.name, records)
    if (carrier) {
      carrier.vpn.carriesVpn = true
      logger.info(`[${sanitizeForLog(vpnRecord.name)}] Carried by ${sanitizeForLog(carrier.name)}`)
    }

    correlations.push({
      vpnInterface: vpnRecord.name,
      serverIp,
      carrierInterface: carrier?.name ?? null
    })
  }

  return correlations
}
