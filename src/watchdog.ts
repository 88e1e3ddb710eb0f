import type { WatchdogConfig } from "./config"
import type { Logger, LogMeta } from "./logger"
import { formatProcessInfo, type MemorySampler, type ProcessSnapshot } from "./memory-sampler"

export type WatchdogAction =
  | { type: "none" }
  | { type: "terminate"; snapshot: ProcessSnapshot; maxMemoryBytes: number }

export type WatchdogPhase = "disabled" | "warming-up" | "monitoring" | "terminating"

const NONE: WatchdogAction = Object.freeze({ type: "none" })

/** True once the process has handled more than `minHandledRequests` */
export function isWarmedUp(config: WatchdogConfig, count: number): boolean {
  return count > config.minHandledRequests
}

/** Exact-multiple tick test used by the `modulus` strategy */
export function isCheckTick(config: WatchdogConfig, count: number): boolean {
  return config.checkInterval > 0 && count % config.checkInterval === 0
}

export function decide(config: WatchdogConfig, snapshot: ProcessSnapshot | undefined): WatchdogAction {
  if (snapshot === undefined || snapshot.virtualBytes <= config.maxMemoryBytes) {
    return NONE
  }
  return { type: "terminate", snapshot, maxMemoryBytes: config.maxMemoryBytes }
}

/**
 * Samples memory once and decides. A `report` that throws is passed to
 * `onReportError` and never changes the decision.
 */
export function checkMemory(
  config: WatchdogConfig,
  sample: MemorySampler,
  report?: (snapshot: ProcessSnapshot) => void,
  onReportError?: (error: unknown) => void,
): WatchdogAction {
  const snapshot = sample()
  if (snapshot !== undefined && report) {
    try {
      report(snapshot)
    } catch (error) {
      onReportError?.(error)
    }
  }
  return decide(config, snapshot)
}

/**
 * Stateless evaluation for the `modulus` strategy: returns what the watchdog
 * should do after the request that brought the total to `count`.
 */
export function onRequestHandled(
  config: WatchdogConfig,
  count: number,
  sample: MemorySampler,
  report?: (snapshot: ProcessSnapshot) => void,
  onReportError?: (error: unknown) => void,
): WatchdogAction {
  if (!config.active || !isWarmedUp(config, count) || !isCheckTick(config, count)) {
    return NONE
  }
  return checkMemory(config, sample, report, onReportError)
}

export interface WatchdogOptions {
  sampler: MemorySampler
  logger?: Logger
}

/**
 * Per-process watchdog. Holds the check bookkeeping of the `elapsed`
 * strategy and latches into `terminating` after the first breach.
 */
export class Watchdog {
  private sampler: MemorySampler
  private logger?: Logger
  private lastCheckedAt: number
  private breach?: WatchdogAction
  private lastSnapshot?: ProcessSnapshot
  private checks = 0
  private reportFailures = 0

  constructor(
    readonly config: WatchdogConfig,
    options: WatchdogOptions,
  ) {
    this.sampler = options.sampler
    this.logger = options.logger
    this.lastCheckedAt = config.minHandledRequests
  }

  onRequestHandled(count: number): WatchdogAction {
    if (this.breach) {
      return this.breach
    }
    if (!this.config.active || !isWarmedUp(this.config, count) || !this.isDue(count)) {
      return NONE
    }

    this.lastCheckedAt = count
    this.checks += 1

    const action = checkMemory(
      this.config,
      () => this.sample(count),
      (snapshot) => this.logger?.warn(`Process info: ${formatProcessInfo(snapshot)}`, { ...snapshot }),
      () => {
        this.reportFailures += 1
      },
    )
    if (action.type === "terminate") {
      this.breach = action
      this.log(`${action.snapshot.virtualBytes} is bigger than ${action.maxMemoryBytes}, exiting now`, {
        pid: action.snapshot.pid,
      })
    }
    return action
  }

  phase(count: number): WatchdogPhase {
    if (!this.config.active) {
      return "disabled"
    }
    if (this.breach) {
      return "terminating"
    }
    return isWarmedUp(this.config, count) ? "monitoring" : "warming-up"
  }

  stats(): { checks: number; reportFailures: number; lastSnapshot: ProcessSnapshot | null } {
    return {
      checks: this.checks,
      reportFailures: this.reportFailures,
      lastSnapshot: this.lastSnapshot ?? null,
    }
  }

  private isDue(count: number): boolean {
    if (this.config.tickStrategy === "elapsed") {
      return count - this.lastCheckedAt >= this.config.checkInterval
    }
    return isCheckTick(this.config, count)
  }

  private sample(count: number): ProcessSnapshot | undefined {
    const snapshot = this.sampler()
    if (snapshot === undefined) {
      this.log("Memory check found no process table entry", { count })
    } else {
      this.lastSnapshot = snapshot
    }
    return snapshot
  }

  // diagnostics are best-effort and must not change the decision
  private log(message: string, meta: LogMeta): void {
    try {
      this.logger?.warn(message, meta)
    } catch {
      this.reportFailures += 1
    }
  }
}
