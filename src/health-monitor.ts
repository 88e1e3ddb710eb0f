import type { ProcessSnapshot } from "./memory-sampler"
import type { RequestCounter } from "./request-counter"
import type { Watchdog, WatchdogPhase } from "./watchdog"

export interface HealthReport {
  healthy: boolean
  uptime: number
  memory: {
    used: number
    total: number
    percentage: number
    rss: number
  }
  requests: number
  watchdog: {
    phase: WatchdogPhase
    checks: number
    lastSnapshot: ProcessSnapshot | null
  }
}

export class HealthMonitor {
  private startTime: number

  constructor(
    private counter: RequestCounter,
    private watchdog: Watchdog,
    private now: () => number = Date.now,
  ) {
    this.startTime = this.now()
  }

  getHealth(): HealthReport {
    const uptime = this.now() - this.startTime
    const memUsage = process.memoryUsage()
    const memUsed = memUsage.heapUsed
    const memTotal = memUsage.heapTotal
    const memPercentage = (memUsed / memTotal) * 100

    const requests = this.counter.current()
    const phase = this.watchdog.phase(requests)
    const { checks, lastSnapshot } = this.watchdog.stats()

    return {
      healthy: phase !== "terminating",
      uptime,
      memory: {
        used: memUsed,
        total: memTotal,
        percentage: memPercentage,
        rss: memUsage.rss,
      },
      requests,
      watchdog: { phase, checks, lastSnapshot },
    }
  }
}
