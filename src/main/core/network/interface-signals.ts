import { access, readFile, realpath } from 'node:fs/promises'
import { basename, join } from 'node:path'
import { SYSFS_NET_PATH } from '@config/constants'
import type { InterfaceSignals } from '@shared/interfaces/common'
import { runCommand } from './command-runner'

export interface SysfsDeviceInfo {
  devicePath?: string
  driver?: string
  isUsb: boolean
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

async function resolveLink(path: string): Promise<string | undefined> {
  try {
    return await realpath(path)
  } catch {
    return undefined
  }
}

export async function readSysfsValue(path: string): Promise<string | undefined> {
  try {
    const value = (await readFile(path, 'utf8')).trim()
    return value.length > 0 ? value : undefined
  } catch {
    return undefined
  }
}

/**
 * Follows /sys/class/net/<if>/device and its `driver` link. Virtual interfaces
 * have no device link and come back with nothing set.
 */
export async function readSysfsDeviceInfo(
  iface: string,
  sysfsRoot: string = SYSFS_NET_PATH
): Promise<SysfsDeviceInfo> {
  const devicePath = await resolveLink(join(sysfsRoot, iface, 'device'))
  if (!devicePath) {
    return { isUsb: false }
  }

  const driverPath = await resolveLink(join(devicePath, 'driver'))

  return {
    devicePath,
    driver: driverPath ? basename(driverPath) : undefined,
    isUsb: devicePath.includes('/usb')
  }
}

export async function hasWirelessPhy(
  iface: string,
  sysfsRoot: string = SYSFS_NET_PATH
): Promise<boolean> {
  return pathExists(join(sysfsRoot, iface, 'phy80211'))
}

export async function readKernelLinkInfo(iface: string): Promise<string | undefined> {
  const output = await runCommand('ip', ['-d', 'link', 'show', iface])
  return output ?? undefined
}

/**
 * Gathers every classifier input for one interface. Lookups that fail leave
 * their signal absent.
 */
export async function collectInterfaceSignals(
  iface: string,
  modemDevicePaths: readonly string[],
  sysfsRoot: string = SYSFS_NET_PATH
): Promise<InterfaceSignals> {
  const device = await readSysfsDeviceInfo(iface, sysfsRoot)
  const wireless = await hasWirelessPhy(iface, sysfsRoot)
  const kernelLinkInfo = await readKernelLinkInfo(iface)

  return {
    name: iface,
    devicePath: device.devicePath,
    driver: device.driver,
    hasWirelessPhy: wireless,
    kernelLinkInfo,
    modemDevicePaths
  }
}
