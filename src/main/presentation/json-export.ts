import { z } from 'zod'
import { TOOL_NAME, TOOL_VERSION } from '@config/constants'
import {
  DataMarker,
  DnsLeakStatus,
  InterfaceType,
  type InterfaceRecord
} from '@shared/interfaces/common'

const exportedInterfaceSchema = z.object({
  name: z.string(),
  interface_type: z.nativeEnum(InterfaceType),
  device: z.string(),
  internal_ipv4: z.string(),
  internal_ipv6: z.string(),
  dns_servers: z.array(z.string()),
  current_dns: z.string().nullable(),
  dns_leak_status: z.nativeEnum(DnsLeakStatus),
  external_ipv4: z.string(),
  external_ipv6: z.string(),
  egress_isp: z.string(),
  egress_country: z.string(),
  default_gateway: z.string(),
  metric: z.string(),
  vpn_server_ip: z.string().nullable(),
  carries_vpn: z.boolean()
})

const exportDocumentSchema = z.object({
  metadata: z.object({
    timestamp: z.string().datetime({ offset: true }),
    interface_count: z.number().int().nonnegative(),
    tool: z.string(),
    version: z.string(),
    summary: z.object({
      vpn_active: z.boolean(),
      vpn_interfaces: z.number().int().nonnegative(),
      dns_leak_detected: z.boolean()
    })
  }),
  interfaces: z.array(exportedInterfaceSchema)
})

export type ExportedInterface = z.infer<typeof exportedInterfaceSchema>
export type ExportDocument = z.infer<typeof exportDocumentSchema>

export function toExportedInterface(record: InterfaceRecord): ExportedInterface {
  return {
    name: record.name,
    interface_type: record.interfaceType,
    device: record.device,
    internal_ipv4: record.ip.ipv4,
    internal_ipv6: record.ip.ipv6,
    dns_servers: [...record.dns.servers],
    current_dns: record.dns.currentServer,
    dns_leak_status: record.dns.leakStatus,
    external_ipv4: record.egress.externalIp,
    external_ipv6: record.egress.externalIpv6,
    egress_isp: record.egress.isp,
    egress_country: record.egress.country,
    default_gateway: record.routing.gateway,
    metric: record.routing.metric,
    vpn_server_ip: record.vpn.serverIp,
    carries_vpn: record.vpn.carriesVpn
  }
}

export function fromExportedInterface(entry: ExportedInterface): InterfaceRecord {
  return {
    name: entry.name,
    interfaceType: entry.interface_type,
    device: entry.device,
    ip: { ipv4: entry.internal_ipv4, ipv6: entry.internal_ipv6 },
    dns: {
      servers: [...entry.dns_servers],
      currentServer: entry.current_dns,
      leakStatus: entry.dns_leak_status
    },
    routing: { gateway: entry.default_gateway, metric: entry.metric },
    vpn: { serverIp: entry.vpn_server_ip, carriesVpn: entry.carries_vpn },
    egress: {
      externalIp: entry.external_ipv4,
      externalIpv6: entry.external_ipv6,
      isp: entry.egress_isp,
      country: entry.egress_country
    }
  }
}

export function buildExportDocument(
  interfaces: readonly InterfaceRecord[],
  now: Date = new Date()
): ExportDocument {
  const vpnInterfaces = interfaces.filter((record) => record.interfaceType === InterfaceType.Vpn)

  return {
    metadata: {
      timestamp: now.toISOString(),
      interface_count: interfaces.length,
      tool: TOOL_NAME,
      version: TOOL_VERSION,
      summary: {
        // a VPN counts as active once it holds an address
        vpn_active: vpnInterfaces.some((record) => record.ip.ipv4 !== DataMarker.NotAvailable),
        vpn_interfaces: vpnInterfaces.length,
        dns_leak_detected: interfaces.some(
          (record) => record.dns.leakStatus === DnsLeakStatus.Leak
        )
      }
    },
    interfaces: interfaces.map(toExportedInterface)
  }
}

export function exportToJson(
  interfaces: readonly InterfaceRecord[],
  options: { indent?: number; now?: Date } = {}
): string {
  return JSON.stringify(buildExportDocument(interfaces, options.now), null, options.indent ?? 2)
}

/**
 * Reads an export back. Throws a ZodError when the document does not match the
 * export layout.
 */
export function parseExportDocument(json: string): ExportDocument {
  const parsed: unknown = JSON.parse(json)
  return exportDocumentSchema.parse(parsed)
}
