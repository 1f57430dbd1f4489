import axios, { type AxiosInstance } from 'axios'
import { z } from 'zod'
import { formatAxiosError } from '../errors.js'
import createLogger from '../logger.js'
import type { TokenState, TokenStore } from './token-store.js'

const logger = createLogger('tokens')

const TOKEN_EXPIRY_SKEW_MS = 60_000 // Treat the access token as expired 60s early
const TOKEN_TIMEOUT_MS = 15_000

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  expires_in: z.number().positive().optional(),
})

export type TokenManagerOptions = {
  clientId: string
  clientSecret: string
  tokenUrl: string
}

const maskToken = (token: string | undefined) =>
  token ? `${token.slice(0, 6)}...token length ${token.length}...${token.slice(-4)}` : '(none)'

/**
 * Owns the OAuth token lifecycle: loading the persisted pair, handing out the cached
 * access token and exchanging the refresh token for a new pair.
 *
 * The cached access token is optimistic. A 401 from the API must be reported through
 * `invalidate()` so the next caller refreshes before reusing it.
 */
export class TokenManager {
  private state: TokenState = {}
  private loaded = false
  private refreshInFlight?: Promise<boolean>
  // Never more than half the lifetime of a freshly issued token
  private expirySkewMs = TOKEN_EXPIRY_SKEW_MS
  private readonly client: AxiosInstance

  constructor(
    private readonly options: TokenManagerOptions,
    private readonly store: TokenStore,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.client = axios.create({ timeout: TOKEN_TIMEOUT_MS })
  }

  /**
   * True once tokens were loaded from the store or obtained through a refresh
   */
  public get isLoaded(): boolean {
    return this.loaded
  }

  public loadTokens(): boolean {
    const result = this.store.load()
    if (!result.ok) {
      logger.error(`Failed to load tokens: ${result.error.message}`)
      return false
    }

    this.state = result.tokens
    this.expirySkewMs = TOKEN_EXPIRY_SKEW_MS
    this.loaded = true
    logger.info('Tokens loaded', {
      accessToken: maskToken(this.state.accessToken),
      refreshToken: maskToken(this.state.refreshToken),
      expiresAt: this.state.expiresAt?.toISOString() ?? '(unknown)',
    })
    return true
  }

  /**
   * The cached access token, or undefined when there is none or it is about to expire.
   * Never touches the network.
   */
  public getAccessToken(): string | undefined {
    const { accessToken, expiresAt } = this.state
    if (!accessToken) {
      return undefined
    }
    if (expiresAt && expiresAt.getTime() - this.now().getTime() <= this.expirySkewMs) {
      logger.debug('Access token expired or about to expire')
      return undefined
    }
    return accessToken
  }

  public invalidate(): void {
    if (this.state.accessToken) {
      logger.debug('Invalidating cached access token')
    }
    this.state = { ...this.state, accessToken: undefined }
  }

  /**
   * Exchange the refresh token for a new token pair and persist it.
   * Concurrent callers share the same request. On failure the previous state is kept.
   */
  public refreshAccessToken(): Promise<boolean> {
    if (!this.refreshInFlight) {
      this.refreshInFlight = this.performRefresh().finally(() => {
        this.refreshInFlight = undefined
      })
    }
    return this.refreshInFlight
  }

  private async performRefresh(): Promise<boolean> {
    const { refreshToken } = this.state
    if (!refreshToken) {
      logger.error('Cannot refresh access token: no refresh token available')
      return false
    }

    logger.info('Refreshing access token...')
    let data: unknown
    try {
      const body = new URLSearchParams({
        grant_type: 'refresh_token',
        client_id: this.options.clientId,
        refresh_token: refreshToken,
      })
      const response = await this.client.post(this.options.tokenUrl, body.toString(), {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded', Accept: 'application/json' },
        auth: { username: this.options.clientId, password: this.options.clientSecret },
      })
      if (response.status !== 200) {
        logger.error(`Error refreshing access token: unexpected HTTP ${response.status}`)
        return false
      }
      data = response.data
    } catch (error) {
      logger.error(`Error refreshing access token: ${formatAxiosError(error)}`)
      return false
    }

    const parsed = tokenResponseSchema.safeParse(data)
    if (!parsed.success) {
      logger.error('Error refreshing access token: malformed token response')
      return false
    }

    const { access_token, refresh_token, expires_in } = parsed.data
    this.state = {
      accessToken: access_token,
      refreshToken: refresh_token,
      expiresAt: expires_in === undefined ? undefined : new Date(this.now().getTime() + expires_in * 1000),
    }
    this.expirySkewMs =
      expires_in === undefined ? TOKEN_EXPIRY_SKEW_MS : Math.min(TOKEN_EXPIRY_SKEW_MS, (expires_in * 1000) / 2)
    this.loaded = true
    logger.info('Refreshed tokens', {
      accessToken: maskToken(access_token),
      refreshToken: maskToken(refresh_token),
      expiresAt: this.state.expiresAt?.toISOString() ?? '(unknown)',
    })

    try {
      this.store.save(this.state)
      logger.debug('Tokens saved to', this.store.filePath)
    } catch (error) {
      logger.warn(`Failed to persist tokens to ${this.store.filePath}: ${formatAxiosError(error)}`)
    }
    return true
  }
}
