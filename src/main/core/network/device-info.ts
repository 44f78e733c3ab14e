import { dirname, join } from 'node:path'
import { logger } from '@infra/logging'
import { SYSFS_NET_PATH } from '@config/constants'
import { DataMarker, InterfaceType } from '@shared/interfaces/common'
import { sanitizeForLog } from '@shared/utils/validators'
import { runCommand } from './command-runner'
import { readSysfsDeviceInfo, readSysfsValue } from './interface-signals'

type HardwareIds = {
  vendor: string
  product: string
}

export const USB_DEVICE_FALLBACK = 'USB Device'

const NO_HARDWARE_TYPES: ReadonlySet<InterfaceType> = new Set([
  InterfaceType.Loopback,
  InterfaceType.Vpn,
  InterfaceType.Virtual,
  InterfaceType.Bridge
])

const HEX_ID = /^[0-9a-fA-F]{4}$/

async function readIdPair(
  directory: string,
  vendorFile: string,
  productFile: string
): Promise<HardwareIds | undefined> {
  const vendor = (await readSysfsValue(join(directory, vendorFile)))?.replace(/^0x/, '')
  const product = (await readSysfsValue(join(directory, productFile)))?.replace(/^0x/, '')

  if (!vendor || !product || !HEX_ID.test(vendor) || !HEX_ID.test(product)) {
    return undefined
  }
  return { vendor: vendor.toLowerCase(), product: product.toLowerCase() }
}

// the net device usually hangs off a USB interface node; the ids live one level up
async function readUsbIds(devicePath: string): Promise<HardwareIds | undefined> {
  return (
    (await readIdPair(devicePath, 'idVendor', 'idProduct')) ??
    (await readIdPair(dirname(devicePath), 'idVendor', 'idProduct'))
  )
}

// "00:1f.6 Ethernet controller: Intel Corporation Ethernet Connection I219-V"
export function parseLspciName(output: string): string | undefined {
  const firstLine = output.split(/\r?\n/)[0] ?? ''
  const separator = firstLine.indexOf(': ')
  if (separator === -1) return undefined

  const name = firstLine.slice(separator + 2).trim()
  return name.length > 0 ? name : undefined
}

// "Bus 001 Device 003: ID 18d1:4eeb Google Inc. Nexus/Pixel Device"
export function parseLsusbName(output: string): string | undefined {
  const match = output.match(/ID\s+[0-9a-f]{4}:[0-9a-f]{4}\s+(.+)$/im)
  return match?.[1].trim() || undefined
}

async function lookupPciName(ids: HardwareIds, iface: string): Promise<string | undefined> {
  const output = await runCommand('lspci', ['-d', `${ids.vendor}:${ids.product}`])
  if (!output) {
    logger.warn(`Failed to lookup PCI device name for ${sanitizeForLog(iface)}`)
    return undefined
  }
  return parseLspciName(output)
}

async function lookupUsbName(ids: HardwareIds, iface: string): Promise<string | undefined> {
  const output = await runCommand('lsusb', ['-d', `${ids.vendor}:${ids.product}`])
  if (!output) {
    logger.warn(`Failed to lookup USB device name for ${sanitizeForLog(iface)}`)
    return undefined
  }
  return parseLsusbName(output)
}

/**
 * Raw hardware label for an interface; cleanup for display happens in the
 * presentation layer. Interfaces without hardware get N/A.
 */
export async function getDeviceName(
  iface: string,
  type: InterfaceType,
  sysfsRoot: string = SYSFS_NET_PATH
): Promise<string> {
  if (NO_HARDWARE_TYPES.has(type)) {
    return DataMarker.NotAvailable
  }

  const device = await readSysfsDeviceInfo(iface, sysfsRoot)
  if (!device.devicePath) {
    return DataMarker.NotAvailable
  }

  if (device.isUsb) {
    const usbIds = await readUsbIds(device.devicePath)
    if (!usbIds) return DataMarker.NotAvailable
    return (await lookupUsbName(usbIds, iface)) ?? USB_DEVICE_FALLBACK
  }

  const pciIds = await readIdPair(device.devicePath, 'vendor', 'device')
  if (pciIds) {
    const name = await lookupPciName(pciIds, iface)
    if (name) return name
  }

  return DataMarker.NotAvailable
}
