import { describe, expect, it } from 'vitest'
import { ZodError } from 'zod'
import {
  buildExportDocument,
  exportToJson,
  fromExportedInterface,
  parseExportDocument
} from '@main/presentation/json-export'
import { makeRecord } from '../../../helpers/interface-records'

const NOW = new Date('2026-01-02T03:04:05.000Z')

const records = [
  makeRecord('lo', {
    interfaceType: 'loopback',
    ip: { ipv4: '127.0.0.1' }
  }),
  makeRecord('enp3s0', {
    interfaceType: 'ethernet',
    device: 'Intel Corporation Ethernet Controller I225-V',
    ip: { ipv4: '192.168.1.20', ipv6: '2001:db8:10::5' },
    dns: { servers: ['192.168.1.1'], currentServer: '192.168.1.1', leakStatus: 'LEAK' },
    routing: { gateway: '192.168.1.1', metric: '100' },
    vpn: { carriesVpn: true }
  }),
  makeRecord('wg0', {
    interfaceType: 'vpn',
    ip: { ipv4: '10.8.0.2' },
    dns: { servers: ['10.8.0.1'], currentServer: '10.8.0.1', leakStatus: 'OK' },
    routing: { gateway: 'NONE', metric: 'DEFAULT' },
    vpn: { serverIp: '198.51.100.7' },
    egress: {
      externalIp: '203.0.113.9',
      externalIpv6: 'QUERY FAILED',
      isp: 'AS64500 Example Networks LLC',
      country: 'NL'
    }
  })
]

describe('buildExportDocument', () => {
  it('summarises the host in the metadata', () => {
    const document = buildExportDocument(records, NOW)

    expect(document.metadata).toEqual({
      timestamp: '2026-01-02T03:04:05.000Z',
      interface_count: 3,
      tool: 'netscope',
      version: '1.0.0',
      summary: {
        vpn_active: true,
        vpn_interfaces: 1,
        dns_leak_detected: true
      }
    })
  })

  it('does not count a VPN without an address as active', () => {
    const document = buildExportDocument([makeRecord('tun0', { interfaceType: 'vpn' })], NOW)

    expect(document.metadata.summary).toEqual({
      vpn_active: false,
      vpn_interfaces: 1,
      dns_leak_detected: false
    })
  })

  it('flattens each record into snake_case fields', () => {
    const [, enp3s0] = buildExportDocument(records, NOW).interfaces

    expect(enp3s0).toEqual({
      name: 'enp3s0',
      interface_type: 'ethernet',
      device: 'Intel Corporation Ethernet Controller I225-V',
      internal_ipv4: '192.168.1.20',
      internal_ipv6: '2001:db8:10::5',
      dns_servers: ['192.168.1.1'],
      current_dns: '192.168.1.1',
      dns_leak_status: 'LEAK',
      external_ipv4: '--',
      external_ipv6: '--',
      egress_isp: '--',
      egress_country: '--',
      default_gateway: '192.168.1.1',
      metric: '100',
      vpn_server_ip: null,
      carries_vpn: true
    })
  })
})

describe('exportToJson', () => {
  it('indents with two spaces by default', () => {
    const json = exportToJson([], { now: NOW })

    expect(json.split('\n')[1]).toBe('  "metadata": {')
  })

  it('reproduces every field and marker when read back', () => {
    const document = parseExportDocument(exportToJson(records, { now: NOW }))

    expect(document.interfaces.map(fromExportedInterface)).toEqual(records)
  })

  it('keeps the five markers distinct', () => {
    const [lo, , wg0] = parseExportDocument(exportToJson(records, { now: NOW })).interfaces

    expect(lo.external_ipv4).toBe('--')
    expect(lo.device).toBe('N/A')
    expect(lo.default_gateway).toBe('NONE')
    expect(wg0.metric).toBe('DEFAULT')
    expect(wg0.external_ipv6).toBe('QUERY FAILED')
  })
})

describe('parseExportDocument', () => {
  it('rejects a document with the wrong layout', () => {
    expect(() => parseExportDocument('{"metadata":{}}')).toThrow(ZodError)
  })

  it('rejects an unknown interface type', () => {
    const document = buildExportDocument(records, NOW)
    const tampered = {
      ...document,
      interfaces: [{ ...document.interfaces[0], interface_type: 'modem' }]
    }

    expect(() => parseExportDocument(JSON.stringify(tampered))).toThrow(ZodError)
  })

  it('rejects malformed JSON', () => {
    expect(() => parseExportDocument('{')).toThrow(SyntaxError)
  })
})
