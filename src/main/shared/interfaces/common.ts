/**
 * Placeholder values for fields that carry no real data. Each marker has its own
 * meaning and they must never be merged:
 *
 * - `--`           field does not apply to this interface
 * - `N/A`          data could not be retrieved or is not configured
 * - `NONE`         explicitly nothing (e.g. no default route)
 * - `DEFAULT`      kernel default in effect (e.g. route metric not set)
 * - `QUERY FAILED` a lookup was attempted and failed
 */
export const DataMarker = {
  NotApplicable: '--',
  NotAvailable: 'N/A',
  NoneValue: 'NONE',
  Default: 'DEFAULT',
  QueryFailed: 'QUERY FAILED'
} as const

export type DataMarker = (typeof DataMarker)[keyof typeof DataMarker]

export const InterfaceType = {
  Loopback: 'loopback',
  Ethernet: 'ethernet',
  Wireless: 'wireless',
  Vpn: 'vpn',
  // Built-in modem with a SIM card
  Cellular: 'cellular',
  // USB phone tethering
  Tether: 'tether',
  Virtual: 'virtual',
  Bridge: 'bridge',
  Unknown: 'unknown'
} as const

export type InterfaceType = (typeof InterfaceType)[keyof typeof InterfaceType]

/**
 * OK: resolver owned by the VPN provider.
 * PUBLIC: Cloudflare/Google/Quad9, not the ISP but not the VPN either.
 * LEAK: resolver also used by a physical uplink, the ISP sees the queries.
 * WARN: resolver nobody recognises.
 * `--`: no VPN active or no DNS configured.
 */
export const DnsLeakStatus = {
  Ok: 'OK',
  Public: 'PUBLIC',
  Leak: 'LEAK',
  Warn: 'WARN',
  NotApplicable: '--'
} as const

export type DnsLeakStatus = (typeof DnsLeakStatus)[keyof typeof DnsLeakStatus]

// ip address or marker
export type AddressValue = string

// digit string, DEFAULT or NONE
export type MetricValue = string

export interface IpConfig {
  ipv4: AddressValue
  ipv6: AddressValue
}

export interface DnsConfig {
  servers: string[]
  currentServer: string | null
  leakStatus: DnsLeakStatus
}

export interface RoutingInfo {
  gateway: AddressValue
  metric: MetricValue
}

export interface VpnInfo {
  serverIp: string | null
  carriesVpn: boolean
}

export interface EgressInfo {
  externalIp: string
  externalIpv6: string
  isp: string
  country: string
}

export interface InterfaceRecord {
  name: string
  interfaceType: InterfaceType
  device: string
  ip: IpConfig
  dns: DnsConfig
  routing: RoutingInfo
  vpn: VpnInfo
  egress: EgressInfo
}

export function createEmptyEgress(): EgressInfo {
  return {
    externalIp: DataMarker.NotApplicable,
    externalIpv6: DataMarker.NotApplicable,
    isp: DataMarker.NotApplicable,
    country: DataMarker.NotApplicable
  }
}

export function createFailedEgress(): EgressInfo {
  return {
    externalIp: DataMarker.QueryFailed,
    externalIpv6: DataMarker.QueryFailed,
    isp: DataMarker.QueryFailed,
    country: DataMarker.QueryFailed
  }
}

export function createEmptyInterfaceRecord(name: string): InterfaceRecord {
  return {
    name,
    interfaceType: InterfaceType.Unknown,
    device: DataMarker.NotAvailable,
    ip: {
      ipv4: DataMarker.NotAvailable,
      ipv6: DataMarker.NotAvailable
    },
    dns: {
      servers: [],
      currentServer: null,
      leakStatus: DnsLeakStatus.NotApplicable
    },
    routing: {
      gateway: DataMarker.NoneValue,
      metric: DataMarker.NoneValue
    },
    vpn: {
      serverIp: null,
      carriesVpn: false
    },
    egress: createEmptyEgress()
  }
}

export interface SocketTuple {
  localAddress: string
  localPort: number
  remoteAddress: string
  remotePort: number
  // lower-case, `established` for ESTAB rows
  state: string
}

export interface DefaultRoute {
  interfaceName: string
  metric: MetricValue
}

export interface InterfaceDns {
  servers: string[]
  currentServer: string | null
}

/**
 * Everything the classifier needs to know about one interface, fetched up front
 * so every rule stays a pure predicate. Absent values mean the lookup failed or
 * the file did not exist.
 */
export interface InterfaceSignals {
  name: string
  // resolved /sys/class/net/<if>/device target
  devicePath?: string
  // basename of the bound kernel driver
  driver?: string
  hasWirelessPhy: boolean
  // output of `ip -d link show <if>`
  kernelLinkInfo?: string
  // sysfs device paths owned by active cellular modems
  modemDevicePaths: readonly string[]
}
