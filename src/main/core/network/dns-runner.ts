import type { InterfaceDns } from '@shared/interfaces/common'
import { runCommand } from './command-runner'

const IPV4_PATTERN = /\b(?:\d{1,3}\.){3}\d{1,3}\b/g
const IPV6_PATTERN = /(?<![0-9a-fA-F:.])(?:[0-9a-fA-F]{0,4}:){2,7}[0-9a-fA-F]{0,4}(?![0-9a-fA-F:.])/g

/**
 * Pulls addresses out of a resolvectl value such as
 * "10.8.0.1 2001:db8::53#dns.example".
 */
export function extractAddresses(text: string): string[] {
  const addresses: string[] = []

  for (const token of text.trim().split(/\s+/)) {
    // strip DoT server name and port suffixes
    const value = token.split('#')[0]
    const ipv4 = value.match(IPV4_PATTERN)
    if (ipv4) {
      addresses.push(...ipv4)
      continue
    }
    const ipv6 = value.match(IPV6_PATTERN)
    if (ipv6) {
      addresses.push(...ipv6)
    }
  }

  return addresses
}

export function parseDnsServers(lines: readonly string[]): string[] {
  const servers: string[] = []
  let inDnsSection = false

  for (const line of lines) {
    const labelIndex = line.indexOf('DNS Servers:')
    if (labelIndex !== -1 && !line.includes('Fallback DNS Servers:')) {
      inDnsSection = true
      servers.push(...extractAddresses(line.slice(labelIndex + 'DNS Servers:'.length)))
      continue
    }

    if (!inDnsSection) continue

    // continuation lines carry no label, only indentation and addresses
    if (/^\s+\S/.test(line) && !/^\s*[A-Za-z][A-Za-z ]*:(\s|$)/.test(line)) {
      servers.push(...extractAddresses(line))
    } else {
      break
    }
  }

  return servers
}

export function parseCurrentDnsServer(lines: readonly string[]): string | null {
  for (const line of lines) {
    const labelIndex = line.indexOf('Current DNS Server:')
    if (labelIndex === -1) continue

    const [first] = extractAddresses(line.slice(labelIndex + 'Current DNS Server:'.length))
    if (first) return first
  }
  return null
}

export function parseResolvectlStatus(output: string): InterfaceDns {
  const lines = output.split(/\r?\n/)
  return {
    servers: parseDnsServers(lines),
    currentServer: parseCurrentDnsServer(lines)
  }
}

export async function getInterfaceDns(iface: string): Promise<InterfaceDns> {
  const output = await runCommand('resolvectl', ['status', iface])
  if (!output) {
    return { servers: [], currentServer: null }
  }
  return parseResolvectlStatus(output)
}
