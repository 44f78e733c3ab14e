import { DataMarker, type DefaultRoute, type MetricValue } from '@shared/interfaces/common'

export type MetricSortKey = readonly [category: number, value: number]

const DIGITS_ONLY = /^\d+$/

/*
  Route metric ordering shared by default-route and VPN carrier selection.

  category 0: explicit numeric metric, ascending by value
  category 1: DEFAULT, the kernel picks the value; never resolved to a number
              because that would mean guessing which destination to query
  category 2: NONE or anything else, no route at all
*/
export function metricSortKey(metric: MetricValue): MetricSortKey {
  if (DIGITS_ONLY.test(metric)) {
    return [0, Number.parseInt(metric, 10)]
  }
  if (metric === DataMarker.Default) {
    return [1, 0]
  }
  return [2, 0]
}

export function compareMetrics(a: MetricValue, b: MetricValue): number {
  const [categoryA, valueA] = metricSortKey(a)
  const [categoryB, valueB] = metricSortKey(b)

  if (categoryA !== categoryB) {
    return categoryA - categoryB
  }
  return valueA - valueB
}

/**
 * Orders items by their metric. Array#sort is stable, so items with equal keys
 * keep the order the OS reported them in.
 */
export function sortByMetric<T>(items: readonly T[], metricOf: (item: T) => MetricValue): T[] {
  return [...items].sort((a, b) => compareMetrics(metricOf(a), metricOf(b)))
}

/**
 * Picks the default route the host uses. When several routes share the best key
 * (typically all DEFAULT) the first one reported wins: that is the kernel's
 * choice and no tie-break is invented on top of it.
 */
export function selectBestDefaultRoute(routes: readonly DefaultRoute[]): DefaultRoute | undefined {
  return sortByMetric(routes, (route) => route.metric)[0]
}
