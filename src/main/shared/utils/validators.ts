import { isIPv4, isIPv6 } from 'node:net'

const INTERFACE_NAME_PATTERN = /^[a-zA-Z0-9._:@-]+$/
const MAX_INTERFACE_NAME_LENGTH = 64
const MAX_LOG_VALUE_LENGTH = 200

// '@' is allowed for veth pairs (eth0@if2)
export function validateInterfaceName(name: string): boolean {
  if (!name || name.length > MAX_INTERFACE_NAME_LENGTH) {
    return false
  }
  return INTERFACE_NAME_PATTERN.test(name)
}

export function stripZoneId(address: string): string {
  const zoneIndex = address.indexOf('%')
  return zoneIndex === -1 ? address : address.slice(0, zoneIndex)
}

export function isValidIpv4(address: string | null | undefined): boolean {
  return Boolean(address) && isIPv4(address ?? '')
}

export function isValidIpv6(address: string | null | undefined): boolean {
  if (!address) return false
  return isIPv6(stripZoneId(address))
}

/**
 * Flattens a value taken from command output before it reaches a log line:
 * newlines, ANSI escapes and control characters are removed and the result is
 * capped at 200 characters.
 */
export function sanitizeForLog(value: unknown): string {
  let text = typeof value === 'string' ? value : JSON.stringify(value) ?? String(value)

  text = text.replace(/[\r\n]/g, ' ')
  // eslint-disable-next-line no-control-regex
  text = text.replace(/\u001b\[[0-9;]*m/g, '')
  // eslint-disable-next-line no-control-regex
  text = text.replace(/[\u0000-\u0008\u000b-\u001f\u007f]/g, '')

  if (text.length > MAX_LOG_VALUE_LENGTH) {
    text = `${text.slice(0, MAX_LOG_VALUE_LENGTH - 3)}...`
  }

  return text
}
