import type { SocketTuple } from '@shared/interfaces/common'
import { stripZoneId } from '@shared/utils/validators'
import { runCommand } from './command-runner'

type SocketEndpoint = {
  address: string
  port: number
}

const SS_COMMAND = { cmd: 'ss', args: ['-tuna'] }

const IPV4_MAPPED_PREFIX = '::ffff:'

// ss abbreviates the state column
const STATE_NAMES: Record<string, string> = {
  ESTAB: 'established',
  'SYN-SENT': 'syn-sent',
  'SYN-RECV': 'syn-recv',
  'FIN-WAIT-1': 'fin-wait-1',
  'FIN-WAIT-2': 'fin-wait-2',
  'TIME-WAIT': 'time-wait',
  'CLOSE-WAIT': 'close-wait',
  'LAST-ACK': 'last-ack',
  UNCONN: 'unconnected'
}

/**
 * Snapshot of TCP/UDP sockets. A failed or missing `ss` yields an empty list.
 */
export async function collectSocketTuples(): Promise<SocketTuple[]> {
  const output = await runCommand(SS_COMMAND.cmd, SS_COMMAND.args)
  if (!output) return []
  return parseSsOutput(output)
}

export function parseSsOutput(output: string): SocketTuple[] {
  const tuples: SocketTuple[] = []

  output.split(/\r?\n/).forEach((line) => {
    const columns = line.trim().split(/\s+/)
    if (columns.length < 6) return

    const [netid, state, , , localRaw, remoteRaw] = columns
    const protocol = netid.toLowerCase()
    if (protocol !== 'tcp' && protocol !== 'udp') return

    const local = parseEndpoint(localRaw)
    const remote = parseEndpoint(remoteRaw)
    if (!local || !remote) return

    tuples.push({
      localAddress: local.address,
      localPort: local.port,
      remoteAddress: remote.address,
      remotePort: remote.port,
      state: normalizeState(state)
    })
  })

  return tuples
}

function normalizeState(raw: string): string {
  const upper = raw.toUpperCase()
  return STATE_NAMES[upper] ?? raw.toLowerCase()
}

export function parseEndpoint(raw: string | undefined): SocketEndpoint | undefined {
  if (!raw) return undefined

  const separator = raw.lastIndexOf(':')
  if (separator <= 0) return undefined

  const portRaw = raw.slice(separator + 1)
  if (!/^\d+$/.test(portRaw)) return undefined

  // [::1]:631, [fe80::1]%wlan0:22, 127.0.0.53%lo:53
  let address = stripZoneId(raw.slice(0, separator)).replace(/^\[/, '').replace(/\]$/, '')

  if (address.toLowerCase().startsWith(IPV4_MAPPED_PREFIX) && address.includes('.')) {
    address = address.slice(IPV4_MAPPED_PREFIX.length)
  }

  if (!address) return undefined

  return { address, port: Number.parseInt(portRaw, 10) }
}
