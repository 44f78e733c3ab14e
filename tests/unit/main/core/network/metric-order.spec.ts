import { describe, expect, it } from 'vitest'
import {
  compareMetrics,
  metricSortKey,
  selectBestDefaultRoute,
  sortByMetric
} from '@main/core/network/metric-order'

describe('metricSortKey', () => {
  it('puts numeric metrics in the first category', () => {
    expect(metricSortKey('100')).toEqual([0, 100])
    expect(metricSortKey('0')).toEqual([0, 0])
  })

  it('puts DEFAULT after every numeric metric', () => {
    expect(metricSortKey('DEFAULT')).toEqual([1, 0])
  })

  it('puts NONE and unrecognised values last', () => {
    expect(metricSortKey('NONE')).toEqual([2, 0])
    expect(metricSortKey('-5')).toEqual([2, 0])
    expect(metricSortKey('')).toEqual([2, 0])
  })
})

describe('compareMetrics', () => {
  it('orders numeric metrics by value, not lexically', () => {
    expect(compareMetrics('20', '100')).toBeLessThan(0)
    expect(compareMetrics('600', '50')).toBeGreaterThan(0)
  })

  it('ranks a large numeric metric ahead of DEFAULT', () => {
    expect(compareMetrics('99999', 'DEFAULT')).toBeLessThan(0)
    expect(compareMetrics('DEFAULT', 'NONE')).toBeLessThan(0)
  })

  it('treats equal keys as equal', () => {
    expect(compareMetrics('DEFAULT', 'DEFAULT')).toBe(0)
    expect(compareMetrics('NONE', 'garbage')).toBe(0)
  })
})

describe('sortByMetric', () => {
  it('sorts numeric, then DEFAULT, then NONE without mutating the input', () => {
    const input = ['NONE', 'DEFAULT', '600', '100']

    expect(sortByMetric(input, (metric) => metric)).toEqual(['100', '600', 'DEFAULT', 'NONE'])
    expect(input).toEqual(['NONE', 'DEFAULT', '600', '100'])
  })

  it('keeps the original order of items with equal keys', () => {
    const items = [
      { name: 'a', metric: 'DEFAULT' },
      { name: 'b', metric: '100' },
      { name: 'c', metric: 'DEFAULT' },
      { name: 'd', metric: '100' }
    ]

    expect(sortByMetric(items, (item) => item.metric).map((item) => item.name)).toEqual([
      'b',
      'd',
      'a',
      'c'
    ])
  })
})

describe('selectBestDefaultRoute', () => {
  it('returns undefined without routes', () => {
    expect(selectBestDefaultRoute([])).toBeUndefined()
  })

  it('prefers the lowest numeric metric', () => {
    const best = selectBestDefaultRoute([
      { interfaceName: 'wlp2s0', metric: '600' },
      { interfaceName: 'enp3s0', metric: '100' }
    ])

    expect(best?.interfaceName).toBe('enp3s0')
  })

  it('keeps the first reported route when every metric is DEFAULT', () => {
    const best = selectBestDefaultRoute([
      { interfaceName: 'wg0', metric: 'DEFAULT' },
      { interfaceName: 'enp3s0', metric: 'DEFAULT' }
    ])

    expect(best?.interfaceName).toBe('wg0')
  })
})
