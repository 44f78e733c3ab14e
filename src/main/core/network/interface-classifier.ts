import {
  InterfaceType,
  type InterfaceSignals
} from '@shared/interfaces/common'
import {
  INTERFACE_TYPE_PATTERNS,
  LOOPBACK_INTERFACE_NAME,
  USB_TETHER_DRIVERS,
  VPN_NAME_PREFIXES
} from '@config/constants'

export interface ClassifierConfig {
  loopbackName: string
  tetherDrivers: ReadonlySet<string>
  vpnNamePrefixes: readonly string[]
  namePatterns: Readonly<Record<string, InterfaceType>>
}

export const DEFAULT_CLASSIFIER_CONFIG: ClassifierConfig = {
  loopbackName: LOOPBACK_INTERFACE_NAME,
  tetherDrivers: USB_TETHER_DRIVERS,
  vpnNamePrefixes: VPN_NAME_PREFIXES,
  namePatterns: INTERFACE_TYPE_PATTERNS
}

/**
 * A classification rule. Returns the interface type when it recognises the
 * interface, `null` when it cannot tell. Rules never throw and never fall back
 * to a default type on missing data.
 */
export type ClassificationRule = (
  signals: InterfaceSignals,
  config: ClassifierConfig
) => InterfaceType | null

export const matchLoopback: ClassificationRule = (signals, config) =>
  signals.name === config.loopbackName ? InterfaceType.Loopback : null

export const matchCellularModem: ClassificationRule = (signals) => {
  const { devicePath } = signals
  if (!devicePath) return null

  const ownedByModem = signals.modemDevicePaths.some(
    (modemPath) => devicePath === modemPath || devicePath.startsWith(`${modemPath}/`)
  )
  return ownedByModem ? InterfaceType.Cellular : null
}

export const matchUsbTether: ClassificationRule = (signals, config) => {
  if (!signals.devicePath?.includes('/usb')) return null
  if (!signals.driver) return null

  return config.tetherDrivers.has(signals.driver) ? InterfaceType.Tether : null
}

export const matchVpnName: ClassificationRule = (signals, config) => {
  const { name } = signals
  if (name.toLowerCase().includes('vpn')) return InterfaceType.Vpn

  return config.vpnNamePrefixes.some((prefix) => name.startsWith(prefix))
    ? InterfaceType.Vpn
    : null
}

export const matchWireless: ClassificationRule = (signals) =>
  signals.hasWirelessPhy ? InterfaceType.Wireless : null

export const matchKernelLinkType: ClassificationRule = (signals) => {
  const info = signals.kernelLinkInfo?.toLowerCase()
  if (!info) return null

  if (info.includes('wireguard') || info.includes('tun') || info.includes('tap')) {
    return InterfaceType.Vpn
  }
  if (info.includes('veth')) return InterfaceType.Virtual
  if (info.includes('bridge')) return InterfaceType.Bridge

  return null
}

export const matchNamePattern: ClassificationRule = (signals, config) => {
  let bestPrefix: string | undefined

  for (const prefix of Object.keys(config.namePatterns)) {
    if (!signals.name.startsWith(prefix)) continue
    if (!bestPrefix || prefix.length > bestPrefix.length) {
      bestPrefix = prefix
    }
  }

  return bestPrefix ? config.namePatterns[bestPrefix] : null
}

/*
  Order matters: the first rule that recognises the interface wins and later
  rules are not consulted. Cellular runs before tether so a modem attached over
  USB is not reported as phone tethering.
*/
export const CLASSIFICATION_RULES: ReadonlyArray<{ name: string; rule: ClassificationRule }> = [
  { name: 'loopback', rule: matchLoopback },
  { name: 'cellular-modem', rule: matchCellularModem },
  { name: 'usb-tether', rule: matchUsbTether },
  { name: 'vpn-name', rule: matchVpnName },
  { name: 'wireless-phy', rule: matchWireless },
  { name: 'kernel-link-type', rule: matchKernelLinkType },
  { name: 'name-pattern', rule: matchNamePattern }
]

export interface Classification {
  type: InterfaceType
  // name of the rule that matched, undefined when nothing did
  matchedRule?: string
}

export function explainClassification(
  signals: InterfaceSignals,
  config: ClassifierConfig = DEFAULT_CLASSIFIER_CONFIG,
  rules: ReadonlyArray<{ name: string; rule: ClassificationRule }> = CLASSIFICATION_RULES
): Classification {
  for (const { name, rule } of rules) {
    const type = rule(signals, config)
    if (type !== null) {
      return { type, matchedRule: name }
    }
  }
  return { type: InterfaceType.Unknown }
}

export function classifyInterface(
  signals: InterfaceSignals,
  config: ClassifierConfig = DEFAULT_CLASSIFIER_CONFIG
): InterfaceType {
  return explainClassification(signals, config).type
}
