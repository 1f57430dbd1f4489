import { Buffer } from 'node:buffer'
import axios, { type AxiosInstance } from 'axios'
import { AuthError, TransientError, formatAxiosError } from '../errors.js'
import createLogger from '../logger.js'
import type { DeviceStatus } from '../types/smartthings.js'

const logger = createLogger('smartthings')

const API_TIMEOUT_MS = 15_000
export const RAW_PAYLOAD_MAX_LENGTH = 4000
export const TRUNCATION_MARKER = '...(truncated)'

export type FetchResult =
  | { type: 'ok'; status: DeviceStatus }
  | { type: 'auth-error'; error: AuthError }
  | { type: 'transient-error'; error: TransientError }

/**
 * Cap a payload at `maxBytes` of UTF-8, cutting on a character boundary
 */
export function truncatePayload(body: string, maxBytes = RAW_PAYLOAD_MAX_LENGTH): string {
  const bytes = Buffer.from(body, 'utf8')
  if (bytes.length <= maxBytes) {
    return body
  }

  let cut = maxBytes
  // Step back over UTF-8 continuation bytes (10xxxxxx)
  while (cut > 0 && (bytes[cut] & 0xc0) === 0x80) {
    cut--
  }
  return `${bytes.subarray(0, cut).toString('utf8')}${TRUNCATION_MARKER}`
}

const isDeviceStatus = (value: unknown): value is DeviceStatus =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

/**
 * Reads `/v1/devices/{deviceId}/status` and classifies the outcome.
 * Never retries: a 401 or a failure is handed back to the caller for the next poll.
 */
export class ApplianceStatusFetcher {
  private readonly client: AxiosInstance

  constructor(readonly baseUrl: string) {
    this.client = axios.create({
      baseURL: baseUrl,
      timeout: API_TIMEOUT_MS,
      responseType: 'text',
      transformResponse: (data: unknown) => data,
      validateStatus: () => true,
    })
  }

  public async fetch(deviceId: string, accessToken: string): Promise<FetchResult> {
    const endpoint = `/v1/devices/${encodeURIComponent(deviceId)}/status`

    let status: number
    let body: string
    try {
      const response = await this.client.get<unknown>(endpoint, {
        headers: {
          Authorization: `Bearer ${accessToken}`,
          Accept: 'application/json',
        },
      })
      status = response.status
      body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data ?? '')
    } catch (error) {
      return { type: 'transient-error', error: new TransientError(formatAxiosError(error), { cause: error }) }
    }

    logger.debug(`[API RAW] GET ${endpoint} -> HTTP ${status}. Payload (truncated): ${truncatePayload(body)}`)

    if (status === 401) {
      return { type: 'auth-error', error: new AuthError(`HTTP 401 for ${endpoint}`) }
    }
    if (status !== 200) {
      return { type: 'transient-error', error: new TransientError(`HTTP ${status}`) }
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(body)
    } catch (error) {
      return {
        type: 'transient-error',
        error: new TransientError(`Invalid JSON in response: ${formatAxiosError(error)}`, { cause: error }),
      }
    }
    if (!isDeviceStatus(parsed)) {
      return { type: 'transient-error', error: new TransientError('Response is not a JSON object') }
    }
    return { type: 'ok', status: parsed }
  }
}
