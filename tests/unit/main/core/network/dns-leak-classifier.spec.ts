import { describe, expect, it, vi } from 'vitest'
import { logger } from '@infra/logging'
import {
  classifyDnsLeaks,
  collectDnsCategories,
  detectDnsLeak
} from '@main/core/network/dns-leak-classifier'
import { makeRecord } from '../../../../helpers/interface-records'

vi.mock('@infra/logging', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  }
}))

describe('collectDnsCategories', () => {
  it('splits resolvers by the type of interface that configures them', () => {
    const categories = collectDnsCategories([
      makeRecord('wg0', { interfaceType: 'vpn', dns: { servers: ['10.8.0.1', '10.8.0.1'] } }),
      makeRecord('enp3s0', { interfaceType: 'ethernet', dns: { servers: ['192.168.1.1'] } }),
      makeRecord('wlp2s0', { interfaceType: 'wireless', dns: { servers: ['192.168.50.1'] } }),
      makeRecord('usb0', { interfaceType: 'tether', dns: { servers: ['172.20.10.1'] } }),
      makeRecord('docker0', { interfaceType: 'bridge', dns: { servers: ['172.17.0.1'] } }),
      makeRecord('wwan0', { interfaceType: 'cellular', dns: { servers: ['10.200.0.1'] } })
    ])

    expect([...categories.vpnDns]).toEqual(['10.8.0.1'])
    expect([...categories.ispDns]).toEqual(['192.168.1.1', '192.168.50.1', '172.20.10.1'])
  })
})

describe('detectDnsLeak', () => {
  const categories = {
    vpnDns: new Set(['10.8.0.1']),
    ispDns: new Set(['192.168.1.1'])
  }

  it('is not applicable when no VPN resolver exists anywhere', () => {
    const noVpn = { vpnDns: new Set<string>(), ispDns: new Set(['192.168.1.1']) }

    expect(detectDnsLeak('enp3s0', ['192.168.1.1'], noVpn)).toBe('--')
    expect(detectDnsLeak('enp3s0', ['8.8.8.8'], noVpn)).toBe('--')
  })

  it('is not applicable for an interface without resolvers', () => {
    expect(detectDnsLeak('enp3s0', [], categories)).toBe('--')
  })

  it('reports LEAK before OK when both an ISP and a VPN resolver are configured', () => {
    expect(detectDnsLeak('enp3s0', ['10.8.0.1', '192.168.1.1'], categories)).toBe('LEAK')
    expect(vi.mocked(logger.warn)).toHaveBeenCalledWith('DNS leak on enp3s0: using ISP DNS', {
      servers: ['192.168.1.1']
    })
  })

  it('reports OK for VPN resolvers only', () => {
    expect(detectDnsLeak('wg0', ['10.8.0.1'], categories)).toBe('OK')
  })

  it('reports PUBLIC for a well-known resolver', () => {
    expect(detectDnsLeak('enp3s0', ['2606:4700:4700::1111'], categories)).toBe('PUBLIC')
  })

  it('reports PUBLIC for a public resolver no uplink owns while a VPN is active', () => {
    const vpnOnly = { vpnDns: new Set(['10.8.0.1']), ispDns: new Set<string>() }

    expect(detectDnsLeak('enp3s0', ['8.8.8.8'], vpnOnly)).toBe('PUBLIC')
  })

  it('reports WARN for an unrecognised resolver', () => {
    expect(detectDnsLeak('enp3s0', ['203.0.113.53'], categories)).toBe('WARN')
  })

  it('uses the supplied public resolver table', () => {
    const publicServers = new Set(['203.0.113.53'])

    expect(detectDnsLeak('enp3s0', ['203.0.113.53'], categories, publicServers)).toBe('PUBLIC')
    expect(detectDnsLeak('enp3s0', ['8.8.8.8'], categories, publicServers)).toBe('WARN')
  })

  it('keeps a resolver shared with the VPN as OK when no ISP resolver overlaps', () => {
    const vpnOnly = { vpnDns: new Set(['10.8.0.1']), ispDns: new Set<string>() }

    expect(detectDnsLeak('enp3s0', ['10.8.0.1'], vpnOnly)).toBe('OK')
  })
})

describe('classifyDnsLeaks', () => {
  it('marks every interface not applicable on a host without VPN', () => {
    const records = [
      makeRecord('enp3s0', { interfaceType: 'ethernet', dns: { servers: ['192.168.1.1'] } })
    ]

    classifyDnsLeaks(records)

    expect(records[0].dns.leakStatus).toBe('--')
  })

  it('treats the resolver configured on an uplink as ISP-owned while a VPN is active', () => {
    const records = [
      makeRecord('wg0', { interfaceType: 'vpn', dns: { servers: ['10.8.0.1'] } }),
      makeRecord('enp3s0', { interfaceType: 'ethernet', dns: { servers: ['8.8.8.8'] } })
    ]

    classifyDnsLeaks(records)

    expect(records.map((record) => record.dns.leakStatus)).toEqual(['OK', 'LEAK'])
  })

  it('flags the ISP resolver as a leak on every interface that uses it', () => {
    const records = [
      makeRecord('wg0', { interfaceType: 'vpn', dns: { servers: ['10.8.0.1', '192.168.1.1'] } }),
      makeRecord('enp3s0', { interfaceType: 'ethernet', dns: { servers: ['192.168.1.1'] } }),
      makeRecord('lo', { interfaceType: 'loopback' })
    ]

    const categories = classifyDnsLeaks(records)

    expect(records.map((record) => record.dns.leakStatus)).toEqual(['LEAK', 'LEAK', '--'])
    expect([...categories.vpnDns]).toEqual(['10.8.0.1', '192.168.1.1'])
  })
})
