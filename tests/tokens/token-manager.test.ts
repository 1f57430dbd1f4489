import { beforeEach, describe, expect, it, vi } from 'vitest'
import { TokenLoadError } from '../../src/errors.js'
import { TokenManager } from '../../src/tokens/token-manager.js'
import type { TokenLoadResult, TokenState } from '../../src/tokens/token-store.js'

const { post } = vi.hoisted(() => ({ post: vi.fn() }))

vi.mock('axios', () => ({
  default: {
    create: vi.fn(() => ({ post })),
    isAxiosError: (error: unknown) => typeof error === 'object' && error !== null && 'isAxiosError' in error,
  },
}))
vi.mock('../../src/logger.js', () => ({
  default: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}))

const NOW = new Date('2024-05-01T12:00:00.000Z')
const TOKEN_URL = 'https://auth.example.test/oauth/token'

const createStore = (result: TokenLoadResult) => ({
  filePath: '/tmp/tokens.json',
  load: vi.fn(() => result),
  save: vi.fn<(tokens: TokenState) => void>(),
})

const loaded = (tokens: TokenState): TokenLoadResult => ({ ok: true, tokens })

const createManager = (store: ReturnType<typeof createStore>) =>
  new TokenManager({ clientId: 'test-client', clientSecret: 'test-secret', tokenUrl: TOKEN_URL }, store, () => NOW)

const validTokens = {
  accessToken: 'test-access',
  refreshToken: 'test-refresh',
  expiresAt: new Date(NOW.getTime() + 3600_000),
}

describe('TokenManager', () => {
  beforeEach(() => {
    post.mockReset()
  })

  describe('loadTokens', () => {
    it('should cache the loaded access token', () => {
      const manager = createManager(createStore(loaded(validTokens)))

      expect(manager.isLoaded).toBe(false)
      expect(manager.getAccessToken()).toBeUndefined()
      expect(manager.loadTokens()).toBe(true)
      expect(manager.isLoaded).toBe(true)
      expect(manager.getAccessToken()).toBe('test-access')
      expect(post).not.toHaveBeenCalled()
    })

    it('should report a failed load without throwing', () => {
      const manager = createManager(
        createStore({ ok: false, error: new TokenLoadError('/tmp/tokens.json is missing', '/tmp/tokens.json') }),
      )

      expect(manager.loadTokens()).toBe(false)
      expect(manager.isLoaded).toBe(false)
      expect(manager.getAccessToken()).toBeUndefined()
    })
  })

  describe('getAccessToken', () => {
    it('should return undefined for a token that expires within a minute', () => {
      const manager = createManager(
        createStore(loaded({ ...validTokens, expiresAt: new Date(NOW.getTime() + 30_000) })),
      )
      manager.loadTokens()

      expect(manager.getAccessToken()).toBeUndefined()
    })

    it('should return a token without known expiry', () => {
      const manager = createManager(createStore(loaded({ accessToken: 'test-access', refreshToken: 'test-refresh' })))
      manager.loadTokens()

      expect(manager.getAccessToken()).toBe('test-access')
    })

    it('should return undefined after invalidate', () => {
      const manager = createManager(createStore(loaded(validTokens)))
      manager.loadTokens()
      manager.invalidate()

      expect(manager.getAccessToken()).toBeUndefined()
    })
  })

  describe('refreshAccessToken', () => {
    it('should exchange the refresh token and persist the new pair', async () => {
      post.mockResolvedValue({
        status: 200,
        data: { access_token: 'new-access', refresh_token: 'new-refresh', expires_in: 86400, token_type: 'bearer' },
      })
      const store = createStore(loaded(validTokens))
      const manager = createManager(store)
      manager.loadTokens()

      await expect(manager.refreshAccessToken()).resolves.toBe(true)

      expect(post).toHaveBeenCalledWith(
        TOKEN_URL,
        'grant_type=refresh_token&client_id=test-client&refresh_token=test-refresh',
        {
          headers: { 'Content-Type': 'application/x-www-form-urlencoded', Accept: 'application/json' },
          auth: { username: 'test-client', password: 'test-secret' },
        },
      )
      expect(manager.getAccessToken()).toBe('new-access')
      expect(store.save).toHaveBeenCalledWith({
        accessToken: 'new-access',
        refreshToken: 'new-refresh',
        expiresAt: new Date(NOW.getTime() + 86400_000),
      })
    })

    it('should hand out a short-lived token right after refreshing it', async () => {
      post.mockResolvedValue({ status: 200, data: { access_token: 'new', refresh_token: 'r2', expires_in: 30 } })
      const manager = createManager(createStore(loaded({ refreshToken: 'r1' })))
      manager.loadTokens()

      await expect(manager.refreshAccessToken()).resolves.toBe(true)
      expect(manager.getAccessToken()).toBe('new')
    })

    it('should expire a short-lived token once half its lifetime remains', async () => {
      post.mockResolvedValue({ status: 200, data: { access_token: 'new', refresh_token: 'r2', expires_in: 30 } })
      let clock = NOW
      const manager = new TokenManager(
        { clientId: 'test-client', clientSecret: 'test-secret', tokenUrl: TOKEN_URL },
        createStore(loaded({ refreshToken: 'r1' })),
        () => clock,
      )
      manager.loadTokens()
      await manager.refreshAccessToken()

      clock = new Date(NOW.getTime() + 14_000)
      expect(manager.getAccessToken()).toBe('new')
      clock = new Date(NOW.getTime() + 16_000)
      expect(manager.getAccessToken()).toBeUndefined()
    })

    it('should refresh even when the cached token was invalidated', async () => {
      post.mockResolvedValue({ status: 200, data: { access_token: 'new-access', refresh_token: 'new-refresh' } })
      const manager = createManager(createStore(loaded(validTokens)))
      manager.loadTokens()
      manager.invalidate()

      await expect(manager.refreshAccessToken()).resolves.toBe(true)
      expect(manager.getAccessToken()).toBe('new-access')
    })

    it('should keep the previous state on a network error', async () => {
      post.mockRejectedValue(new Error('socket hang up'))
      const store = createStore(loaded(validTokens))
      const manager = createManager(store)
      manager.loadTokens()

      await expect(manager.refreshAccessToken()).resolves.toBe(false)
      expect(manager.getAccessToken()).toBe('test-access')
      expect(store.save).not.toHaveBeenCalled()
    })

    it('should fail on a non-200 response', async () => {
      post.mockResolvedValue({ status: 204, data: '' })
      const manager = createManager(createStore(loaded(validTokens)))
      manager.loadTokens()

      await expect(manager.refreshAccessToken()).resolves.toBe(false)
      expect(manager.getAccessToken()).toBe('test-access')
    })

    it('should fail on a malformed token response', async () => {
      post.mockResolvedValue({ status: 200, data: { access_token: 'new-access' } })
      const store = createStore(loaded(validTokens))
      const manager = createManager(store)
      manager.loadTokens()

      await expect(manager.refreshAccessToken()).resolves.toBe(false)
      expect(manager.getAccessToken()).toBe('test-access')
      expect(store.save).not.toHaveBeenCalled()
    })

    it('should not call the token endpoint without a refresh token', async () => {
      const manager = createManager(createStore(loaded({ accessToken: 'test-access' })))
      manager.loadTokens()

      await expect(manager.refreshAccessToken()).resolves.toBe(false)
      expect(post).not.toHaveBeenCalled()
    })

    it('should still succeed when the tokens cannot be persisted', async () => {
      post.mockResolvedValue({ status: 200, data: { access_token: 'new-access', refresh_token: 'new-refresh' } })
      const store = createStore(loaded(validTokens))
      store.save.mockImplementation(() => {
        throw new Error('EACCES')
      })
      const manager = createManager(store)
      manager.loadTokens()

      await expect(manager.refreshAccessToken()).resolves.toBe(true)
      expect(manager.getAccessToken()).toBe('new-access')
    })

    it('should share one request between concurrent callers', async () => {
      let resolveResponse: (value: unknown) => void = () => {}
      post.mockReturnValue(
        new Promise((resolve) => {
          resolveResponse = resolve
        }),
      )
      const manager = createManager(createStore(loaded(validTokens)))
      manager.loadTokens()

      const first = manager.refreshAccessToken()
      const second = manager.refreshAccessToken()
      resolveResponse({ status: 200, data: { access_token: 'new-access', refresh_token: 'new-refresh' } })

      await expect(Promise.all([first, second])).resolves.toEqual([true, true])
      expect(post).toHaveBeenCalledTimes(1)

      post.mockResolvedValue({ status: 200, data: { access_token: 'newer-access', refresh_token: 'newer-refresh' } })
      await manager.refreshAccessToken()
      expect(post).toHaveBeenCalledTimes(2)
      expect(manager.getAccessToken()).toBe('newer-access')
    })
  })
})
