import type { BaseAppliance } from './appliances/base.js'
import { ApplianceFactory } from './appliances/factory.js'
import { Cache } from './cache.js'
import { ConfigError, formatAxiosError } from './errors.js'
import createLogger from './logger.js'
import { type PublishedState, formatFieldUpdates, reconcile } from './reconcile.js'
import type { DeviceRegistry } from './registry.js'
import { PollScheduler } from './scheduler.js'
import type { ApplianceStatusFetcher } from './smartthings/status-fetcher.js'
import type { TokenManager } from './tokens/token-manager.js'
import type { ApplianceConfig, ApplianceKind } from './types/normalized.js'

const logger = createLogger('engine')

export type TokenProvider = Pick<
  TokenManager,
  'isLoaded' | 'loadTokens' | 'getAccessToken' | 'invalidate' | 'refreshAccessToken'
>

export type StatusFetcher = Pick<ApplianceStatusFetcher, 'fetch'>

export type EngineDependencies = {
  registry: DeviceRegistry
  tokens: TokenProvider
  fetcher: StatusFetcher
  cache?: Cache
}

export type EngineConfig = {
  appliances: ApplianceConfig[]
  pollOnSeconds: number
  pollOffSeconds: number
  heartbeatSeconds: number
  showChanges: boolean
  // Only used for the startup diagnostic line
  apiUrl: string
  clientId: string
  clientSecret: string
}

export type PollResult = 'updated' | 'unchanged' | 'auth-error' | 'transient-error' | 'skipped'

export type PollOutcome = {
  kind: ApplianceKind
  result: PollResult
  updates: number
}

/**
 * Drives poll cycles from the host heartbeat: decides when to poll, keeps the
 * access token usable and reconciles normalized signals into the device registry.
 */
export class LaundryEngine {
  private appliances: BaseAppliance[] = []
  private scheduler?: PollScheduler
  private published: PublishedState = new Map()
  private showChanges = true
  private running = false
  private cycleInFlight = false
  private readonly cache: Cache

  constructor(private readonly deps: EngineDependencies) {
    this.cache = deps.cache ?? new Cache()
  }

  public get isRunning(): boolean {
    return this.running
  }

  public get enabledAppliances(): readonly BaseAppliance[] {
    return this.appliances
  }

  public start(config: EngineConfig): void {
    if (this.running) {
      logger.warn('Engine already started')
      return
    }

    this.appliances = ApplianceFactory.createEnabled(config.appliances)
    this.scheduler = new PollScheduler({
      pollOnSeconds: config.pollOnSeconds,
      pollOffSeconds: config.pollOffSeconds,
      tickSizeSeconds: config.heartbeatSeconds,
    })
    this.showChanges = config.showChanges
    this.published = new Map()

    const deviceIdLength = (kind: ApplianceKind) =>
      config.appliances.find((appliance) => appliance.kind === kind)?.deviceId?.length ?? 0

    logger.info(
      `Param diag: ApiUrlLen=${config.apiUrl.length} PollOn=${this.scheduler.pollOnSeconds} PollOff=${this.scheduler.pollOffSeconds} ` +
        `ClientIdLen=${config.clientId.length} SecretLen=${config.clientSecret.length} ` +
        `WasherIdLen=${deviceIdLength('washer')} DryerIdLen=${deviceIdLength('dryer')}`,
    )

    if (this.appliances.length === 0) {
      const error = new ConfigError('No washer or dryer device id set. Engine will stay idle until configured.')
      logger.error(error.message)
    }

    logger.info(
      `Poll ON: ${this.scheduler.pollOnSeconds}s, Poll OFF: ${this.scheduler.pollOffSeconds}s, Heartbeat: ${config.heartbeatSeconds}s`,
    )

    if (!this.deps.tokens.loadTokens()) {
      logger.error('Token file is missing or invalid; polling will retry loading it on every cycle.')
    }

    for (const appliance of this.appliances) {
      for (const definition of appliance.getDeviceDefinitions()) {
        if (!this.deps.registry.exists(definition.id)) {
          this.deps.registry.createDevice(definition.id, definition.kind, definition.name)
        }
      }
    }

    this.running = true
  }

  public stop(): void {
    if (!this.running) {
      return
    }
    this.running = false
    this.scheduler?.reset()
    logger.info('SmartThings laundry engine stopped.')
  }

  /**
   * Host heartbeat. Runs a poll cycle when the scheduler says one is due and
   * resolves with its outcomes, or with undefined when nothing was polled.
   * Ticks arriving while a cycle is still running are dropped.
   */
  public async tick(): Promise<PollOutcome[] | undefined> {
    if (!this.running || !this.scheduler || this.appliances.length === 0) {
      return undefined
    }
    if (this.cycleInFlight) {
      logger.debug('Previous poll cycle still running, skipping heartbeat')
      return undefined
    }

    const isOn = this.isAnyApplianceOn()
    if (!this.scheduler.advance(isOn)) {
      return undefined
    }

    this.cycleInFlight = true
    try {
      return await this.runPollCycle(isOn)
    } finally {
      this.cycleInFlight = false
    }
  }

  /**
   * Power state as last written to the registry, not re-derived from the API
   */
  public isAnyApplianceOn(): boolean {
    return this.appliances.some(
      (appliance) => this.deps.registry.readDevice(appliance.getPowerDeviceId())?.numericState === 1,
    )
  }

  private skipAll(): PollOutcome[] {
    return this.appliances.map((appliance): PollOutcome => ({ kind: appliance.kind, result: 'skipped', updates: 0 }))
  }

  private async obtainAccessToken(): Promise<string | undefined> {
    const { tokens } = this.deps
    const cached = tokens.getAccessToken()
    if (cached) {
      return cached
    }
    if (!(await tokens.refreshAccessToken())) {
      return undefined
    }
    return tokens.getAccessToken()
  }

  private async runPollCycle(isOn: boolean): Promise<PollOutcome[]> {
    logger.info(`Starting SmartThings query (isOn=${isOn})...`)
    const { tokens } = this.deps

    if (!tokens.isLoaded && !tokens.loadTokens()) {
      logger.error('Tokens are not available, skipping poll cycle.')
      return this.skipAll()
    }

    const token = await this.obtainAccessToken()
    if (!token) {
      logger.error('Token refresh failed.')
      return this.skipAll()
    }

    const outcomes: PollOutcome[] = []
    let refreshed = false
    let authFailed = false

    for (const appliance of this.appliances) {
      if (authFailed) {
        outcomes.push({ kind: appliance.kind, result: 'skipped', updates: 0 })
        continue
      }

      const outcome = await this.pollAppliance(appliance, tokens.getAccessToken() ?? token)
      outcomes.push(outcome)

      if (outcome.result !== 'auth-error') {
        continue
      }
      logger.error(`401 Unauthorized (${appliance.kind}), token refresh required.`)
      tokens.invalidate()
      if (refreshed) {
        continue
      }
      refreshed = true
      if (await tokens.refreshAccessToken()) {
        logger.info('Token refreshed, will retry on next poll.')
      } else {
        logger.error('Token refresh after 401 failed, ending poll cycle.')
        authFailed = true
      }
    }

    return outcomes
  }

  private async pollAppliance(appliance: BaseAppliance, accessToken: string): Promise<PollOutcome> {
    const { kind } = appliance
    try {
      const result = await this.deps.fetcher.fetch(appliance.getDeviceId(), accessToken)

      if (result.type === 'auth-error') {
        return { kind, result: 'auth-error', updates: 0 }
      }
      if (result.type === 'transient-error') {
        logger.error(`${appliance.getLabel()} request failed: ${result.error.message}`)
        return { kind, result: 'transient-error', updates: 0 }
      }
      return { kind, ...this.applyStatus(appliance, result.status) }
    } catch (error) {
      logger.error(`${appliance.getLabel()} processing error: ${formatAxiosError(error)}`)
      return { kind, result: 'transient-error', updates: 0 }
    }
  }

  private applyStatus(appliance: BaseAppliance, status: unknown): { result: PollResult; updates: number } {
    const label = appliance.getLabel()
    if (this.cache.matchByValue(this.cache.cacheKey(appliance.getDeviceId()).status, status)) {
      logger.debug(`${label} status document unchanged since last poll`)
    }

    const signal = appliance.normalizeState(status)
    logger.debug(
      `[${label.toUpperCase()}] Power=${signal.power}, Job=${appliance.describeCycleState(signal.cycleState)}, Remaining=${signal.remainingMinutes}`,
    )

    const { updates, published } = reconcile(appliance, signal, this.published)
    this.published = published

    if (updates.length === 0) {
      logger.debug(`${label} state checked, no changes detected`)
      return { result: 'unchanged', updates: 0 }
    }

    for (const update of updates) {
      this.deps.registry.updateDevice(update.deviceId, update.to.numericState, update.to.textState)
    }

    if (this.showChanges) {
      logger.info(`${label} state changed: ${formatFieldUpdates(updates)}`)
    } else {
      logger.info(`${label} state changed`)
    }
    return { result: 'updated', updates: updates.length }
  }
}
