import { z } from 'zod'
import { logger } from '@infra/logging'
import {
  EGRESS_RETRY_ATTEMPTS,
  EGRESS_RETRY_BACKOFF_MS,
  HTTP_TIMEOUT_MS,
  IPINFO_IPV6_URL,
  IPINFO_URL
} from '@config/constants'
import { createFailedEgress, DataMarker, type EgressInfo } from '@shared/interfaces/common'

const ipv4ResponseSchema = z.object({
  ip: z.string().min(1),
  org: z.string().min(1),
  country: z.string().min(1)
})

const ipv6ResponseSchema = z.object({
  ip: z.string().min(1)
})

type FetchFn = (input: string, init?: { signal?: AbortSignal }) => Promise<Response>

export interface EgressLookupOptions {
  ipv4Url?: string
  ipv6Url?: string
  timeoutMs?: number
  retryAttempts?: number
  retryBackoffMs?: number
  fetchFn?: FetchFn
  sleep?: (ms: number) => Promise<void>
}

/**
 * External identity of the host as seen by ipinfo.io.
 *
 * IPv4 is retried with exponential backoff; IPv6 is optional and gets a single
 * attempt. Any IPv4 failure turns the whole record into QUERY FAILED.
 */
export class EgressLookupService {
  private readonly ipv4Url: string
  private readonly ipv6Url: string
  private readonly timeoutMs: number
  private readonly retryAttempts: number
  private readonly retryBackoffMs: number
  private readonly fetchFn: FetchFn
  private readonly sleep: (ms: number) => Promise<void>

  constructor(options: EgressLookupOptions = {}) {
    this.ipv4Url = options.ipv4Url ?? IPINFO_URL
    this.ipv6Url = options.ipv6Url ?? IPINFO_IPV6_URL
    this.timeoutMs = options.timeoutMs ?? HTTP_TIMEOUT_MS
    this.retryAttempts = options.retryAttempts ?? EGRESS_RETRY_ATTEMPTS
    this.retryBackoffMs = options.retryBackoffMs ?? EGRESS_RETRY_BACKOFF_MS
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init))
    this.sleep =
      options.sleep ?? ((ms) => new Promise<void>((resolve) => setTimeout(resolve, ms)))
  }

  async lookup(): Promise<EgressInfo> {
    logger.debug('Querying IPv4 egress...')
    const ipv4Body = await this.getWithRetry(this.ipv4Url)
    if (ipv4Body === undefined) {
      logger.error(`IPv4 egress query failed after ${this.retryAttempts} attempts`)
      return createFailedEgress()
    }

    const ipv4 = ipv4ResponseSchema.safeParse(ipv4Body)
    if (!ipv4.success) {
      logger.error('Egress API response missing required fields', {
        issues: ipv4.error.issues.map((issue) => issue.path.join('.'))
      })
      return createFailedEgress()
    }

    logger.debug('Querying IPv6 egress...')
    const ipv6Body = await this.getOnce(this.ipv6Url)
    const ipv6 = ipv6ResponseSchema.safeParse(ipv6Body)

    return {
      externalIp: ipv4.data.ip,
      externalIpv6: ipv6.success ? ipv6.data.ip : DataMarker.NotAvailable,
      // raw "AS12345 Name", cleaned for display only
      isp: ipv4.data.org,
      country: ipv4.data.country
    }
  }

  private async getWithRetry(url: string): Promise<unknown> {
    for (let attempt = 0; attempt < this.retryAttempts; attempt += 1) {
      const body = await this.getOnce(url)
      if (body !== undefined) return body

      if (attempt < this.retryAttempts - 1) {
        const delay = this.retryBackoffMs * 2 ** attempt
        logger.debug(`Request attempt ${attempt + 1} failed, retrying in ${delay}ms`)
        await this.sleep(delay)
      }
    }
    return undefined
  }

  private async getOnce(url: string): Promise<unknown> {
    try {
      const response = await this.fetchFn(url, { signal: AbortSignal.timeout(this.timeoutMs) })

      if (!response.ok) {
        logger.debug(`Egress request to ${url} failed: ${response.status}`)
        await response.body?.cancel()
        return undefined
      }

      const body: unknown = await response.json()
      return body
    } catch (error) {
      logger.debug(`Egress request to ${url} failed`, {
        error: error instanceof Error ? error.message : String(error)
      })
      return undefined
    }
  }
}
