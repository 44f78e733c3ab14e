import { CORPORATE_SUFFIXES, DEVICE_TECHNICAL_TERMS } from '@config/constants'
import { DataMarker } from '@shared/interfaces/common'
import { USB_DEVICE_FALLBACK } from '@core/network/device-info'

// Display-only cleanup. Records keep the raw values; these run right before printing.

const DEVICE_PASSTHROUGH: ReadonlySet<string> = new Set([
  DataMarker.NotAvailable,
  DataMarker.NotApplicable,
  DataMarker.NoneValue,
  USB_DEVICE_FALLBACK
])

const ISP_PASSTHROUGH: ReadonlySet<string> = new Set([
  DataMarker.NotApplicable,
  DataMarker.NotAvailable,
  DataMarker.QueryFailed
])

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&')
}

// longest first so "corporation" goes before "corp"
function buildTermPatterns(terms: readonly string[]): RegExp[] {
  return [...terms]
    .sort((a, b) => b.length - a.length)
    .map((term) => new RegExp(`\\b${escapeRegExp(term)}(?=\\s|[.,\\-]|$)`, 'gi'))
}

const DEVICE_TERM_PATTERNS = buildTermPatterns([...CORPORATE_SUFFIXES, ...DEVICE_TECHNICAL_TERMS])
const ISP_TERM_PATTERNS = buildTermPatterns(CORPORATE_SUFFIXES)

function removeTerms(value: string, patterns: readonly RegExp[]): string {
  return patterns.reduce((current, pattern) => current.replace(pattern, ''), value)
}

function normalize(value: string): string {
  return value
    .split(/\s+/)
    .filter((part) => part.length > 0)
    .join(' ')
    .replace(/^[ ,:.-]+|[ ,:.-]+$/g, '')
}

/**
 * "Intel Corporation Ethernet Controller I225-V" becomes "Intel I225-V".
 * Returns the input unchanged when nothing would be left.
 */
export function cleanupDeviceName(deviceName: string): string {
  if (DEVICE_PASSTHROUGH.has(deviceName)) return deviceName

  let cleaned = deviceName
    .replace(/^\d+[:.]\S+\s+/, '')
    .replace(/^Bus\s+\d+\s+Device\s+\d+:\s+/i, '')
    .replace(/ID\s+[0-9a-f]{4}:[0-9a-f]{4}\s+/i, '')
    .replace(/\([^)]*\)/g, '')
    .replace(/\[[^\]]*\]/g, '')

  cleaned = normalize(removeTerms(cleaned, DEVICE_TERM_PATTERNS))
  return cleaned.length > 0 ? cleaned : deviceName
}

// "AS7922 Comcast Cable Communications, LLC" -> "Comcast Cable Communications"
export function cleanupIspName(isp: string): string {
  if (ISP_PASSTHROUGH.has(isp)) return isp

  const cleaned = normalize(removeTerms(isp.replace(/^AS\d+\s+/, ''), ISP_TERM_PATTERNS))
  return cleaned.length > 0 ? cleaned : isp
}

export function shortenText(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text

  const truncated = text.slice(0, maxLength - 3)
  const lastSpace = truncated.lastIndexOf(' ')
  if (lastSpace > maxLength * 0.7) {
    return `${truncated.slice(0, lastSpace)}...`
  }
  return `${truncated}...`
}
