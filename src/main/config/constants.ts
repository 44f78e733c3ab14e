import { InterfaceType } from '@shared/interfaces/common'

export const TOOL_NAME = 'netscope'
export const TOOL_VERSION = '1.0.0'

export const COMMAND_TIMEOUT_MS = 10_000
export const HTTP_TIMEOUT_MS = 10_000
export const EGRESS_RETRY_ATTEMPTS = 3
export const EGRESS_RETRY_BACKOFF_MS = 1000

export const IPINFO_URL = 'https://ipinfo.io/json'
export const IPINFO_IPV6_URL = 'https://v6.ipinfo.io/json'

export const SYSFS_NET_PATH = '/sys/class/net'

export const LOOPBACK_INTERFACE_NAME = 'lo'

export const PUBLIC_DNS_SERVERS: ReadonlySet<string> = new Set([
  // Cloudflare
  '1.1.1.1',
  '1.0.0.1',
  '2606:4700:4700::1111',
  '2606:4700:4700::1001',
  // Google
  '8.8.8.8',
  '8.8.4.4',
  '2001:4860:4860::8888',
  '2001:4860:4860::8844',
  // Quad9
  '9.9.9.9',
  '149.112.112.112',
  '2620:fe::fe',
  '2620:fe::9'
])

export const REQUIRED_COMMANDS = ['ip', 'lspci', 'lsusb', 'resolvectl', 'ss'] as const

export type RequiredCommand = (typeof REQUIRED_COMMANDS)[number]

export const INSTALL_HINTS: Record<RequiredCommand, string> = {
  ip: 'sudo apt install iproute2',
  lspci: 'sudo apt install pciutils',
  lsusb: 'sudo apt install usbutils',
  resolvectl: 'sudo apt install systemd-resolved',
  ss: 'sudo apt install iproute2'
}

// ModemManager CLI, optional
export const MODEM_COMMAND = 'mmcli'

export const USB_TETHER_DRIVERS: ReadonlySet<string> = new Set([
  'cdc_ether',
  'cdc_mbim',
  'cdc_ncm',
  'ipheth',
  'rndis_host'
])

export const VPN_NAME_PREFIXES: readonly string[] = ['tun', 'tap', 'ppp', 'wg']

export const INTERFACE_TYPE_PATTERNS: Readonly<Record<string, InterfaceType>> = {
  lo: InterfaceType.Loopback,
  eth: InterfaceType.Ethernet,
  en: InterfaceType.Ethernet,
  wl: InterfaceType.Wireless,
  wlan: InterfaceType.Wireless,
  ww: InterfaceType.Cellular,
  vpn: InterfaceType.Vpn,
  tun: InterfaceType.Vpn,
  tap: InterfaceType.Vpn,
  ppp: InterfaceType.Vpn,
  wg: InterfaceType.Vpn,
  docker: InterfaceType.Bridge,
  br: InterfaceType.Bridge,
  virbr: InterfaceType.Bridge,
  veth: InterfaceType.Virtual,
  vnet: InterfaceType.Virtual,
  macvlan: InterfaceType.Virtual,
  ipvlan: InterfaceType.Virtual,
  vlan: InterfaceType.Virtual
}

export const DNS_PORT = 53
export const WIREGUARD_PORT = 51820

export const ALTERNATE_VPN_PORTS: ReadonlySet<number> = new Set([1194, 443, 5060, 4569])

export const CARRIER_GRADE_NAT_RANGE = { network: '100.64.0.0', prefix: 10 } as const

export const PRIVATE_IPV4_RANGES: ReadonlyArray<{ network: string; prefix: number }> = [
  { network: '0.0.0.0', prefix: 8 },
  { network: '10.0.0.0', prefix: 8 },
  { network: '127.0.0.0', prefix: 8 },
  { network: '169.254.0.0', prefix: 16 },
  { network: '172.16.0.0', prefix: 12 },
  { network: '192.168.0.0', prefix: 16 }
]

export const PRIVATE_IPV6_RANGES: ReadonlyArray<{ network: string; prefix: number }> = [
  { network: '::', prefix: 128 },
  { network: '::1', prefix: 128 },
  { network: 'fc00::', prefix: 7 },
  { network: 'fe80::', prefix: 10 }
]

export const CORPORATE_SUFFIXES: readonly string[] = [
  'co.',
  'company',
  'corp.',
  'corp',
  'corporation',
  'inc.',
  'inc',
  'ltd.',
  'ltd',
  'limited',
  'llc',
  'gmbh'
]

export const DEVICE_TECHNICAL_TERMS: readonly string[] = [
  '802.11ac',
  '802.11ax',
  '802.11n',
  'controller',
  'adapter',
  'ethernet',
  'network',
  'wireless',
  'gigabit',
  'fast ethernet',
  'base-t',
  'base-tx',
  '10/100',
  '10/100/1000',
  'pci express',
  'pcie',
  'rev',
  'revision'
]

export const TABLE_COLUMNS: ReadonlyArray<readonly [string, number]> = [
  ['INTERFACE', 15],
  ['TYPE', 10],
  ['DEVICE', 20],
  ['INTERNAL_IPv4', 15],
  ['INTERNAL_IPv6', 25],
  ['DNS_SERVER', 20],
  ['EXTERNAL_IPv4', 15],
  ['EXTERNAL_IPv6', 25],
  ['ISP', 15],
  ['COUNTRY', 10],
  ['GATEWAY', 15],
  ['METRIC', 10]
]

export const COLUMN_SEPARATOR = '   '

export const ExitCode = {
  Success: 0,
  GeneralError: 1,
  MissingDependencies: 2,
  InvalidArguments: 4
} as const

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode]

export const AnsiColor = {
  Green: '\u001b[92m',
  Cyan: '\u001b[96m',
  Red: '\u001b[91m',
  Yellow: '\u001b[93m',
  Reset: '\u001b[0m'
} as const

export type AnsiColor = (typeof AnsiColor)[keyof typeof AnsiColor]
