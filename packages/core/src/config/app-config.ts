import { z } from 'zod/v4'
import { ConfigValidationError } from '../errors'
import type { LogLevel } from '../utils/logger'

/**
 * Default trading universe: 25 liquid NSE large caps. Symbol selection
 * trades the first SYMBOLS_PER_CYCLE of these.
 */
export const DEFAULT_UNIVERSE: readonly string[] = [
  'RELIANCE', 'TCS', 'HDFCBANK', 'INFY', 'ICICIBANK',
  'HINDUNILVR', 'ITC', 'SBIN', 'BHARTIARTL', 'KOTAKBANK',
  'LT', 'AXISBANK', 'ASIANPAINT', 'MARUTI', 'SUNPHARMA',
  'TITAN', 'BAJFINANCE', 'ULTRACEMCO', 'NESTLEIND', 'WIPRO',
  'HCLTECH', 'POWERGRID', 'NTPC', 'TATAMOTORS', 'ONGC',
]

function isValidTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value })
    return true
  } catch {
    return false
  }
}

const symbolList = z
  .string()
  .transform(value => value.split(',').map(s => s.trim().toUpperCase()).filter(Boolean))
  .pipe(z.array(z.string().regex(/^[A-Z0-9&._-]{1,20}$/)).min(1))

/**
 * Environment variables read once at startup
 */
const envSchema = z.object({
  BROKER_CLIENT_ID: z.string().min(1),
  BROKER_ACCESS_TOKEN: z.string().min(1),
  BROKER_BASE_URL: z.string().url(),
  BROKER_EXCHANGE: z.string().min(1).default('NSE'),
  BROKER_SEGMENT: z.string().min(1).default('EQ'),
  BROKER_PRODUCT: z.string().min(1).default('CNC'),
  BROKER_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  NOTIFY_EMAIL: z.string().email(),
  EMAIL_PASSWORD: z.string().min(1),
  SMTP_HOST: z.string().min(1).default('smtp.gmail.com'),
  SMTP_PORT: z.coerce.number().int().positive().default(465),

  DATABASE_PATH: z.string().min(1).default('./data/trading.db'),
  CACHE_DIR: z.string().min(1).default('./data/cache'),
  LOG_DIR: z.string().min(1).default('logs'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  TIMEZONE: z.string().default('Asia/Kolkata').refine(isValidTimeZone, { message: 'Unknown timezone' }),
  INITIAL_CAPITAL: z.coerce.number().positive().default(100_000),
  MAX_DAILY_LOSS_PCT: z.coerce.number().gt(0).lt(1).default(0.02),
  POSITION_SIZE_PCT: z.coerce.number().gt(0).max(1).default(0.2),
  SYMBOLS_PER_CYCLE: z.coerce.number().int().positive().default(5),
  UNIVERSE_SYMBOLS: symbolList.optional(),
})

export interface BrokerConfig {
  readonly baseUrl: string
  readonly clientId: string
  readonly accessToken: string
  readonly exchange: string
  readonly segment: string
  readonly product: string
  readonly timeoutMs: number
}

export interface NotificationConfig {
  readonly email: string
  readonly password: string
  readonly smtpHost: string
  readonly smtpPort: number
}

export interface StorageConfig {
  readonly databasePath: string
  readonly cacheDir: string
}

export interface LoggingConfig {
  readonly level: LogLevel
  readonly dir: string
}

export interface TradingConfig {
  /** Exchange timezone; defines market hours and the trading day */
  readonly timeZone: string
  /** Fixed portfolio value used for sizing and the loss limit */
  readonly initialCapital: number
  /** Fraction of capital the day may lose before trading halts */
  readonly maxDailyLossPct: number
  /** Fraction of capital allocated per cycle, split across symbols */
  readonly positionSizePct: number
  readonly symbolsPerCycle: number
  readonly universe: readonly string[]
}

/**
 * Immutable process configuration, built once and injected everywhere
 */
export interface AppConfig {
  readonly broker: BrokerConfig
  readonly notifications: NotificationConfig
  readonly storage: StorageConfig
  readonly logging: LoggingConfig
  readonly trading: TradingConfig
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (nested && typeof nested === 'object' && !Object.isFrozen(nested)) {
      deepFreeze(nested)
    }
  }
  return Object.freeze(value)
}

/**
 * Parse and validate the environment into an AppConfig
 *
 * @throws ConfigValidationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigValidationError(`Invalid configuration:\n  ${issues.join('\n  ')}`, issues)
  }

  const e = parsed.data
  return deepFreeze({
    broker: {
      baseUrl: e.BROKER_BASE_URL.replace(/\/+$/, ''),
      clientId: e.BROKER_CLIENT_ID,
      accessToken: e.BROKER_ACCESS_TOKEN,
      exchange: e.BROKER_EXCHANGE,
      segment: e.BROKER_SEGMENT,
      product: e.BROKER_PRODUCT,
      timeoutMs: e.BROKER_TIMEOUT_MS,
    },
    notifications: {
      email: e.NOTIFY_EMAIL,
      password: e.EMAIL_PASSWORD,
      smtpHost: e.SMTP_HOST,
      smtpPort: e.SMTP_PORT,
    },
    storage: {
      databasePath: e.DATABASE_PATH,
      cacheDir: e.CACHE_DIR,
    },
    logging: {
      level: e.LOG_LEVEL,
      dir: e.LOG_DIR,
    },
    trading: {
      timeZone: e.TIMEZONE,
      initialCapital: e.INITIAL_CAPITAL,
      maxDailyLossPct: e.MAX_DAILY_LOSS_PCT,
      positionSizePct: e.POSITION_SIZE_PCT,
      symbolsPerCycle: e.SYMBOLS_PER_CYCLE,
      universe: e.UNIVERSE_SYMBOLS ?? [...DEFAULT_UNIVERSE],
    },
  })
}
