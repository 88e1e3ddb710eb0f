import { z } from "zod"
import type { Logger } from "./logger"

export const DEFAULT_MIN_HANDLED_REQUESTS = 500
// 500 MiB of virtual memory
export const DEFAULT_MAX_MEMORY_BYTES = 524_288_000

export const TICK_STRATEGIES = ["modulus", "elapsed"] as const
export type TickStrategy = (typeof TICK_STRATEGIES)[number]

export interface WatchdogConfig {
  readonly active: boolean
  /** Requests between memory checks. 0 only when the watchdog is inactive and no interval was given. */
  readonly checkInterval: number
  readonly minHandledRequests: number
  readonly maxMemoryBytes: number
  readonly tickStrategy: TickStrategy
}

export interface WatchdogConfigInput {
  active?: unknown
  checkInterval?: unknown
  minHandledRequests?: unknown
  maxMemoryBytes?: unknown
  tickStrategy?: unknown
}

export class WatchdogConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "WatchdogConfigError"
  }
}

const TRUTHY = ["1", "true", "yes", "on"]
const FALSY = ["0", "false", "no", "off"]

const activeSchema = z.union([
  z.boolean(),
  z.number().transform((n) => n !== 0),
  z
    .string()
    .trim()
    .toLowerCase()
    .refine((s) => TRUTHY.includes(s) || FALSY.includes(s), "expected a boolean flag")
    .transform((s) => TRUTHY.includes(s)),
])

const positiveInt = z.coerce.number().int().positive()
const nonNegativeInt = z.coerce.number().int().nonnegative()
const tickStrategySchema = z.string().trim().toLowerCase().pipe(z.enum(TICK_STRATEGIES))

function isAbsent(raw: unknown): boolean {
  return raw === undefined || raw === null || (typeof raw === "string" && raw.trim() === "")
}

/**
 * Resolves a raw configuration into a frozen {@link WatchdogConfig}.
 *
 * Absent or malformed optional fields fall back to their defaults; a malformed
 * value is reported through `logger` when one is given. An active watchdog
 * without a usable `checkInterval` is rejected with {@link WatchdogConfigError}.
 */
export function resolveWatchdogConfig(input: WatchdogConfigInput = {}, logger?: Logger): WatchdogConfig {
  const pick = <T>(name: keyof WatchdogConfigInput, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T): T => {
    const raw = input[name]
    if (isAbsent(raw)) {
      return fallback
    }
    const parsed = schema.safeParse(raw)
    if (parsed.success) {
      return parsed.data
    }
    logger?.warn(`Ignoring invalid watchdog option "${name}", using default`, {
      value: raw,
      default: fallback,
      issue: parsed.error.issues[0]?.message,
    })
    return fallback
  }

  const active = pick("active", activeSchema, false)

  let checkInterval = 0
  if (!isAbsent(input.checkInterval)) {
    const parsed = positiveInt.safeParse(input.checkInterval)
    if (parsed.success) {
      checkInterval = parsed.data
    } else if (active) {
      throw new WatchdogConfigError(
        `checkInterval must be a positive integer, got ${JSON.stringify(input.checkInterval)}`,
      )
    } else {
      logger?.warn(`Ignoring invalid watchdog option "checkInterval", using default`, {
        value: input.checkInterval,
        default: 0,
        issue: parsed.error.issues[0]?.message,
      })
    }
  } else if (active) {
    throw new WatchdogConfigError("checkInterval is required when the watchdog is active")
  }

  return Object.freeze({
    active,
    checkInterval,
    minHandledRequests: pick("minHandledRequests", nonNegativeInt, DEFAULT_MIN_HANDLED_REQUESTS),
    maxMemoryBytes: pick("maxMemoryBytes", positiveInt, DEFAULT_MAX_MEMORY_BYTES),
    tickStrategy: pick<TickStrategy>("tickStrategy", tickStrategySchema, "modulus"),
  })
}

export function loadWatchdogConfig(env: NodeJS.ProcessEnv = process.env, logger?: Logger): WatchdogConfig {
  return resolveWatchdogConfig(
    {
      active: env.WATCHDOG_ACTIVE,
      checkInterval: env.WATCHDOG_CHECK_INTERVAL,
      minHandledRequests: env.WATCHDOG_MIN_HANDLED_REQUESTS,
      maxMemoryBytes: env.WATCHDOG_MAX_MEMORY_BYTES,
      tickStrategy: env.WATCHDOG_TICK_STRATEGY,
    },
    logger,
  )
}
