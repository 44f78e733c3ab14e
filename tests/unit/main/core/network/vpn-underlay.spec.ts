import { describe, expect, it, vi } from 'vitest'
import {
  correlateVpnUnderlay,
  findCarrierInterface,
  findVpnServerEndpoint,
  isPrivateOrCgnat
} from '@main/core/network/vpn-underlay'
import type { SocketTuple } from '@shared/interfaces/common'
import { makeRecord } from '../../../../helpers/interface-records'

vi.mock('@infra/logging', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  }
}))

function tuple(
  local: string,
  localPort: number,
  remote: string,
  remotePort: number,
  state = 'established'
): SocketTuple {
  return {
    localAddress: local,
    localPort,
    remoteAddress: remote,
    remotePort,
    state
  }
}

describe('isPrivateOrCgnat', () => {
  it.each([
    '10.1.2.3',
    '172.16.0.1',
    '172.31.255.254',
    '192.168.1.1',
    '127.0.0.1',
    '169.254.10.10',
    '100.64.0.1',
    '100.127.255.254',
    '0.0.0.0',
    '::1',
    'fd00::1',
    'fe80::1'
  ])('treats %s as unroutable', (address) => {
    expect(isPrivateOrCgnat(address)).toBe(true)
  })

  it.each(['203.0.113.9', '198.51.100.7', '100.128.0.1', '172.32.0.1', '2001:db8::1'])(
    'treats %s as public',
    (address) => {
      expect(isPrivateOrCgnat(address)).toBe(false)
    }
  )

  it('does not flag unparseable input', () => {
    expect(isPrivateOrCgnat('not-an-ip')).toBe(false)
  })
})

describe('findVpnServerEndpoint', () => {
  it('prefers a socket originating from the tunnel address over the WireGuard port', () => {
    const sockets = [
      tuple('192.168.1.20', 41641, '198.51.100.7', 51820),
      tuple('10.8.0.2', 5000, '203.0.113.9', 51820)
    ]

    expect(findVpnServerEndpoint('10.8.0.2', sockets)).toBe('203.0.113.9')
  })

  it('prefers the WireGuard port over the alternate ports', () => {
    const sockets = [
      tuple('192.168.1.20', 50000, '198.51.100.30', 1194),
      tuple('192.168.1.20', 50001, '198.51.100.31', 51820)
    ]

    expect(findVpnServerEndpoint('10.8.0.2', sockets)).toBe('198.51.100.31')
  })

  it('keeps the first candidate on a tie', () => {
    const sockets = [
      tuple('192.168.1.20', 50000, '198.51.100.40', 443),
      tuple('192.168.1.20', 50001, '198.51.100.41', 4569)
    ]

    expect(findVpnServerEndpoint('10.8.0.2', sockets)).toBe('198.51.100.40')
  })

  it('never selects a DNS connection, even from the tunnel address', () => {
    const sockets = [tuple('10.8.0.2', 40000, '198.51.100.53', 53)]

    expect(findVpnServerEndpoint('10.8.0.2', sockets)).toBeUndefined()
  })

  it('never selects a carrier-grade NAT or private remote', () => {
    const sockets = [
      tuple('10.8.0.2', 40000, '100.64.1.1', 51820),
      tuple('192.168.1.20', 40001, '192.168.1.50', 51820)
    ]

    expect(findVpnServerEndpoint('10.8.0.2', sockets)).toBeUndefined()
  })

  it('ignores sockets that are not established', () => {
    const sockets = [tuple('10.8.0.2', 40000, '203.0.113.9', 51820, 'time-wait')]

    expect(findVpnServerEndpoint('10.8.0.2', sockets)).toBeUndefined()
  })

  it('ignores unrelated traffic', () => {
    const sockets = [tuple('192.168.1.20', 40000, '198.51.100.80', 8080)]

    expect(findVpnServerEndpoint('10.8.0.2', sockets)).toBeUndefined()
  })
})

describe('findCarrierInterface', () => {
  it('ignores VPN, virtual and bridge interfaces even with a gateway', () => {
    const records = [
      makeRecord('wg0', { interfaceType: 'vpn', routing: { gateway: '10.8.0.1', metric: '1' } }),
      makeRecord('wg1', { interfaceType: 'vpn', routing: { gateway: '10.9.0.1', metric: '2' } }),
      makeRecord('veth0', { interfaceType: 'virtual', routing: { gateway: '172.18.0.1', metric: '3' } }),
      makeRecord('docker0', { interfaceType: 'bridge', routing: { gateway: '172.17.0.1', metric: '4' } }),
      makeRecord('wlp2s0', { interfaceType: 'wireless', routing: { gateway: '192.168.50.1', metric: '600' } })
    ]

    expect(findCarrierInterface('wg0', records)?.name).toBe('wlp2s0')
  })

  it('skips interfaces without a default gateway', () => {
    const records = [
      makeRecord('enp3s0', { interfaceType: 'ethernet', routing: { gateway: 'NONE', metric: '100' } }),
      makeRecord('wwan0', { interfaceType: 'cellular', routing: { gateway: 'N/A', metric: '50' } })
    ]

    expect(findCarrierInterface('wg0', records)).toBeUndefined()
  })

  it('picks the best metric, numeric before DEFAULT', () => {
    const records = [
      makeRecord('usb0', { interfaceType: 'tether', routing: { gateway: '172.20.10.1', metric: 'DEFAULT' } }),
      makeRecord('wlp2s0', { interfaceType: 'wireless', routing: { gateway: '192.168.50.1', metric: '600' } }),
      makeRecord('enp3s0', { interfaceType: 'ethernet', routing: { gateway: '192.168.1.1', metric: '100' } })
    ]

    expect(findCarrierInterface('wg0', records)?.name).toBe('enp3s0')
  })
})

describe('correlateVpnUnderlay', () => {
  it('sets the server on the tunnel and marks the carrier', () => {
    const records = [
      makeRecord('enp3s0', {
        interfaceType: 'ethernet',
        ip: { ipv4: '192.168.1.20' },
        routing: { gateway: '192.168.1.1', metric: '100' }
      }),
      makeRecord('wg0', { interfaceType: 'vpn', ip: { ipv4: '10.8.0.2' } })
    ]
    const sockets = [
      tuple('192.168.1.20', 41641, '198.51.100.7', 51820),
      tuple('10.8.0.2', 5000, '203.0.113.9', 51820)
    ]

    const correlations = correlateVpnUnderlay(records, sockets)

    expect(correlations).toEqual([
      { vpnInterface: 'wg0', serverIp: '203.0.113.9', carrierInterface: 'enp3s0' }
    ])
    expect(records[1].vpn).toEqual({ serverIp: '203.0.113.9', carriesVpn: false })
    expect(records[0].vpn).toEqual({ serverIp: null, carriesVpn: true })
  })

  it('leaves every record untouched when no endpoint is found', () => {
    const records = [
      makeRecord('enp3s0', {
        interfaceType: 'ethernet',
        routing: { gateway: '192.168.1.1', metric: '100' }
      }),
      makeRecord('wg0', { interfaceType: 'vpn', ip: { ipv4: '10.8.0.2' } })
    ]

    expect(correlateVpnUnderlay(records, [])).toEqual([])
    expect(records[0].vpn.carriesVpn).toBe(false)
    expect(records[1].vpn.serverIp).toBeNull()
  })

  it('skips a tunnel without an address', () => {
    const records = [makeRecord('tun0', { interfaceType: 'vpn', ip: { ipv4: 'N/A' } })]
    const sockets = [tuple('192.168.1.20', 40000, '203.0.113.9', 51820)]

    expect(correlateVpnUnderlay(records, sockets)).toEqual([])
    expect(records[0].vpn.serverIp).toBeNull()
  })

  it('reports a tunnel without a carrier', () => {
    const records = [makeRecord('wg0', { interfaceType: 'vpn', ip: { ipv4: '10.8.0.2' } })]
    const sockets = [tuple('10.8.0.2', 5000, '203.0.113.9', 51820)]

    expect(correlateVpnUnderlay(records, sockets)).toEqual([
      { vpnInterface: 'wg0', serverIp: '203.0.113.9', carrierInterface: null }
    ])
  })
})
