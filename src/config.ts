import fs from 'node:fs'
import path from 'node:path'
import yaml from 'yaml'
import { z } from 'zod'

const DEFAULT_POLL_ON_SECONDS = 60
const DEFAULT_POLL_OFF_SECONDS = 600
const MIN_POLL_SECONDS = 10

export const DEFAULT_API_URL = 'https://api.smartthings.com'
export const DEFAULT_TOKEN_URL = 'https://auth-global.api.smartthings.com/oauth/token'

/**
 * Device ids are optional: empty strings and the literal "None" disable the appliance.
 */
export function normalizeDeviceId(value: unknown): string | undefined {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return undefined
  }
  const trimmed = String(value).trim()
  if (!trimmed || trimmed.toLowerCase() === 'none') {
    return undefined
  }
  return trimmed
}

/**
 * Poll intervals fall back to their default when they are not integers,
 * and never go below 10 seconds.
 */
export function normalizePollInterval(value: unknown, fallback: number): number {
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value.trim()) : value
  if (typeof parsed !== 'number' || !Number.isInteger(parsed)) {
    return fallback
  }
  return Math.max(MIN_POLL_SECONDS, parsed)
}

const deviceIdSchema = z.unknown().transform(normalizeDeviceId)

const pollIntervalSchema = (fallback: number) =>
  z.unknown().transform((value) => normalizePollInterval(value, fallback))

export const configSchema = z.object({
  mqtt: z.object({
    url: z.string().regex(/^mqtts?:\/\/.+/, 'mqtt.url must start with mqtt:// or mqtts://'),
    clientId: z.string().optional(),
    username: z.string(),
    password: z.string(),
    topicPrefix: z.string().default('smartthings_'),
    retain: z.boolean().default(true),
    qos: z.number().int().min(0).max(2).default(1),
  }),
  smartthings: z.object({
    apiUrl: z
      .string()
      .default(DEFAULT_API_URL)
      .transform((url) => url.trim().replace(/\/+$/, '')),
    tokenUrl: z.string().url().default(DEFAULT_TOKEN_URL),
    clientId: z.string().transform((value) => value.trim()),
    clientSecret: z.string().transform((value) => value.trim()),
    washerDeviceId: deviceIdSchema,
    dryerDeviceId: deviceIdSchema,
    pollOnInterval: pollIntervalSchema(DEFAULT_POLL_ON_SECONDS),
    pollOffInterval: pollIntervalSchema(DEFAULT_POLL_OFF_SECONDS),
    heartbeatInterval: z
      .number()
      .int()
      .min(10, 'smartthings.heartbeatInterval must be at least 10 seconds')
      .max(3600, 'smartthings.heartbeatInterval should not exceed 3600 seconds')
      .default(60),
    tokensFile: z.string().default('tokens.json'),
  }),
  homeAssistant: z
    .object({
      autoDiscovery: z.boolean(),
    })
    .default({ autoDiscovery: true }),
  logging: z
    .object({
      debug: z.boolean().default(false),
      showChanges: z.boolean().default(true),
    })
    .default({}),
})

export type AppConfig = z.infer<typeof configSchema>

const booleanEnv = (fallback: 'true' | 'false') =>
  z
    .string()
    .default(fallback)
    .transform((val) => val.toLowerCase() === 'true')

const envSchema = z.object({
  MQTT_URL: z.string(),
  MQTT_USERNAME: z.string(),
  MQTT_PASSWORD: z.string(),
  SMARTTHINGS_CLIENT_ID: z.string(),
  SMARTTHINGS_CLIENT_SECRET: z.string(),
  SMARTTHINGS_API_URL: z.string().default(DEFAULT_API_URL),
  SMARTTHINGS_WASHER_DEVICE_ID: z.string().default(''),
  SMARTTHINGS_DRYER_DEVICE_ID: z.string().default(''),
  SMARTTHINGS_POLL_ON_INTERVAL: z.string().default(String(DEFAULT_POLL_ON_SECONDS)),
  SMARTTHINGS_POLL_OFF_INTERVAL: z.string().default(String(DEFAULT_POLL_OFF_SECONDS)),
  MQTT_CLIENT_ID: z.string().default('smartthings-laundry'),
  MQTT_TOPIC_PREFIX: z.string().default('smartthings_'),
  HOME_ASSISTANT_AUTO_DISCOVERY: booleanEnv('true'),
  LOGGING_DEBUG: booleanEnv('false'),
  LOGGING_SHOW_CHANGES: booleanEnv('true'),
})

const isTestEnvironment = () => process.env.NODE_ENV === 'test' || Boolean(process.env.VITEST)

const reportIssues = (heading: string, error: z.ZodError) => {
  console.error(heading)
  for (const issue of error.issues) {
    console.error(`  - ${issue.path.join('.')}: ${issue.message}`)
  }
}

export const projectRoot = path.resolve(path.dirname(new URL(import.meta.url).pathname), '..')

export const getConfigPath = (): string =>
  path.resolve(projectRoot, process.env.CONFIG_FILE_OVERRIDE ?? 'config.yml')

/**
 * Render config.yml from environment variables.
 * Returns undefined when a mandatory variable is missing.
 */
export function renderConfigFromEnv(env: NodeJS.ProcessEnv): string | undefined {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    reportIssues('Environment variable validation failed:', result.error)
    return undefined
  }
  const envConfig = result.data

  const document = {
    mqtt: {
      clientId: envConfig.MQTT_CLIENT_ID,
      url: envConfig.MQTT_URL,
      username: envConfig.MQTT_USERNAME,
      password: envConfig.MQTT_PASSWORD,
      topicPrefix: envConfig.MQTT_TOPIC_PREFIX,
    },
    smartthings: {
      apiUrl: envConfig.SMARTTHINGS_API_URL,
      clientId: envConfig.SMARTTHINGS_CLIENT_ID,
      clientSecret: envConfig.SMARTTHINGS_CLIENT_SECRET,
      washerDeviceId: envConfig.SMARTTHINGS_WASHER_DEVICE_ID,
      dryerDeviceId: envConfig.SMARTTHINGS_DRYER_DEVICE_ID,
      pollOnInterval: normalizePollInterval(envConfig.SMARTTHINGS_POLL_ON_INTERVAL, DEFAULT_POLL_ON_SECONDS),
      pollOffInterval: normalizePollInterval(envConfig.SMARTTHINGS_POLL_OFF_INTERVAL, DEFAULT_POLL_OFF_SECONDS),
    },
    homeAssistant: {
      autoDiscovery: envConfig.HOME_ASSISTANT_AUTO_DISCOVERY,
    },
    logging: {
      debug: envConfig.LOGGING_DEBUG,
      showChanges: envConfig.LOGGING_SHOW_CHANGES,
    },
  }

  return yaml.stringify(document)
}

export function parseConfig(raw: unknown): AppConfig {
  const result = configSchema.safeParse(raw)
  if (!result.success) {
    reportIssues('Configuration validation failed:', result.error)
    throw result.error
  }
  return result.data
}

/**
 * Read and validate config.yml, creating it from the environment first when it does not exist.
 */
export function loadConfig(configPath = getConfigPath()): AppConfig {
  if (!fs.existsSync(configPath)) {
    console.info('Config file not found. Creating from environment variables...')
    const content = renderConfigFromEnv(process.env)
    if (content === undefined) {
      if (!isTestEnvironment()) {
        process.exit(1)
      }
      throw new Error(`Cannot create ${configPath} from environment variables`)
    }
    fs.writeFileSync(configPath, content, 'utf8')
    console.info('Config file created successfully.')
  }

  const file = fs.readFileSync(configPath, 'utf8')

  try {
    return parseConfig(yaml.parse(file))
  } catch (error) {
    if (error instanceof z.ZodError && !isTestEnvironment()) {
      process.exit(1)
    }
    throw error
  }
}

/**
 * Token file path: absolute paths are kept, relative ones resolve next to the config file.
 */
export function resolveTokensPath(config: AppConfig, configPath = getConfigPath()): string {
  const override = process.env.TOKENS_FILE_OVERRIDE
  return path.resolve(path.dirname(configPath), override ?? config.smartthings.tokensFile)
}
