import { AnsiColor, COLUMN_SEPARATOR, TABLE_COLUMNS } from '@config/constants'
import {
  DataMarker,
  DnsLeakStatus,
  InterfaceType,
  type InterfaceRecord
} from '@shared/interfaces/common'
import { cleanupDeviceName, cleanupIspName, shortenText } from './formatters'

export const TABLE_TITLE = 'Network Interface Analysis'

export const TABLE_WIDTH =
  TABLE_COLUMNS.reduce((total, [, width]) => total + width, 0) +
  COLUMN_SEPARATOR.length * (TABLE_COLUMNS.length - 1)

const NO_EGRESS: ReadonlySet<string> = new Set([
  DataMarker.NotApplicable,
  DataMarker.NotAvailable,
  DataMarker.QueryFailed
])

const NO_DIRECT_EGRESS: ReadonlySet<string> = new Set([...NO_EGRESS, DataMarker.NoneValue])

const DNS_WARNING_STATUSES: ReadonlySet<DnsLeakStatus> = new Set([
  DnsLeakStatus.Leak,
  DnsLeakStatus.Warn,
  DnsLeakStatus.Public
])

type RowColorRule = {
  name: string
  color: AnsiColor
  matches: (record: InterfaceRecord) => boolean
}

// First match wins
export const ROW_COLOR_RULES: readonly RowColorRule[] = [
  {
    name: 'dns-warning',
    color: AnsiColor.Yellow,
    matches: (record) => DNS_WARNING_STATUSES.has(record.dns.leakStatus)
  },
  {
    name: 'vpn-dns-ok',
    color: AnsiColor.Green,
    matches: (record) =>
      record.interfaceType === InterfaceType.Vpn && record.dns.leakStatus === DnsLeakStatus.Ok
  },
  {
    name: 'vpn-egress',
    color: AnsiColor.Green,
    matches: (record) =>
      record.interfaceType === InterfaceType.Vpn && !NO_EGRESS.has(record.egress.externalIp)
  },
  {
    name: 'vpn-carrier',
    color: AnsiColor.Cyan,
    matches: (record) => record.vpn.carriesVpn
  },
  {
    name: 'direct-internet',
    color: AnsiColor.Red,
    matches: (record) => !NO_DIRECT_EGRESS.has(record.egress.externalIp)
  }
]

export function getRowColor(record: InterfaceRecord): AnsiColor | undefined {
  return ROW_COLOR_RULES.find((rule) => rule.matches(record))?.color
}

function toRowCells(record: InterfaceRecord): string[] {
  return [
    record.name,
    record.interfaceType,
    cleanupDeviceName(record.device),
    record.ip.ipv4,
    record.ip.ipv6,
    record.dns.currentServer ?? DataMarker.NotApplicable,
    record.egress.externalIp,
    record.egress.externalIpv6,
    cleanupIspName(record.egress.isp),
    record.egress.country,
    record.routing.gateway,
    record.routing.metric
  ]
}

function formatCells(cells: readonly string[]): string {
  return TABLE_COLUMNS.map(([, width], index) =>
    shortenText(cells[index] ?? '', width).padEnd(width)
  ).join(COLUMN_SEPARATOR)
}

function paint(text: string, color: AnsiColor | undefined, colors: boolean): string {
  return colors && color ? `${color}${text}${AnsiColor.Reset}` : text
}

export function formatRow(record: InterfaceRecord, colors = true): string {
  return paint(formatCells(toRowCells(record)), getRowColor(record), colors)
}

function formatLegend(colors: boolean): string[] {
  return [
    '',
    'Color Legend:',
    `${paint('GREEN', AnsiColor.Green, colors)}  - VPN tunnel (encrypted, DNS OK)`,
    `${paint('CYAN', AnsiColor.Cyan, colors)}   - Physical interface carrying VPN`,
    `${paint('RED', AnsiColor.Red, colors)}    - Direct internet (unencrypted)`,
    `${paint('YELLOW', AnsiColor.Yellow, colors)} - DNS leak, public DNS, or warning`,
    '',
    'DNS Status Meanings:',
    '  OK     - Using VPN DNS (best privacy - VPN provider sees queries)',
    '  PUBLIC - Using public DNS (Cloudflare/Google/Quad9 - not leaking to ISP, but suboptimal)',
    '  LEAK   - Using ISP DNS (security issue - ISP sees all queries, defeats VPN privacy)',
    '  WARN   - Using unknown DNS (investigate further)',
    '  --     - Not applicable (no VPN active or no DNS configured)',
    ''
  ]
}

/**
 * Renders the interface table with legend. Returns the text without a trailing
 * newline; `colors: false` drops every ANSI sequence (used for log files).
 */
export function renderTable(
  interfaces: readonly InterfaceRecord[],
  options: { colors?: boolean } = {}
): string {
  const colors = options.colors ?? true
  const rule = '='.repeat(TABLE_WIDTH)

  return [
    rule,
    TABLE_TITLE,
    rule,
    formatCells(TABLE_COLUMNS.map(([name]) => name)),
    rule,
    ...interfaces.map((record) => formatRow(record, colors)),
    rule,
    ...formatLegend(colors)
  ].join('\n')
}
