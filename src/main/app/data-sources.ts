import type {
  EgressInfo,
  InterfaceDns,
  InterfaceSignals,
  InterfaceType,
  RoutingInfo,
  SocketTuple
} from '@shared/interfaces/common'
import { getDeviceName } from '@core/network/device-info'
import { getInterfaceDns } from '@core/network/dns-runner'
import { EgressLookupService } from '@core/network/egress-lookup'
import { collectInterfaceSignals } from '@core/network/interface-signals'
import {
  getActiveInterface,
  getAllIpv4Addresses,
  getAllIpv6Addresses,
  getInterfaceList,
  getRouteInfo
} from '@core/network/link-runner'
import { getActiveModemDevicePaths } from '@core/network/modem-runner'
import { collectSocketTuples } from '@core/network/socket-runner'

/**
 * Everything the orchestrator reads from the host. Implementations never throw
 * for a failed query; they return empty collections or markers instead.
 */
export interface NetworkDataSources {
  listInterfaces(): Promise<string[]>
  getActiveInterface(): Promise<string | undefined>
  getEgress(): Promise<EgressInfo>
  getIpv4Addresses(): Promise<Map<string, string>>
  getIpv6Addresses(): Promise<Map<string, string>>
  getModemDevicePaths(): Promise<string[]>
  getInterfaceSignals(iface: string, modemDevicePaths: readonly string[]): Promise<InterfaceSignals>
  getDeviceName(iface: string, type: InterfaceType): Promise<string>
  getInterfaceDns(iface: string): Promise<InterfaceDns>
  getRouteInfo(iface: string): Promise<RoutingInfo>
  getSocketTuples(): Promise<SocketTuple[]>
}

export function createSystemDataSources(
  egressService: EgressLookupService = new EgressLookupService()
): NetworkDataSources {
  return {
    listInterfaces: getInterfaceList,
    getActiveInterface,
    getEgress: () => egressService.lookup(),
    getIpv4Addresses: getAllIpv4Addresses,
    getIpv6Addresses: getAllIpv6Addresses,
    getModemDevicePaths: getActiveModemDevicePaths,
    getInterfaceSignals: (iface, modemDevicePaths) =>
      collectInterfaceSignals(iface, modemDevicePaths),
    getDeviceName: (iface, type) => getDeviceName(iface, type),
    getInterfaceDns,
    getRouteInfo,
    getSocketTuples: collectSocketTuples
  }
}
