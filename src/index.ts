export {
  DEFAULT_MAX_MEMORY_BYTES,
  DEFAULT_MIN_HANDLED_REQUESTS,
  loadWatchdogConfig,
  resolveWatchdogConfig,
  WatchdogConfigError,
} from "./config"
export type { TickStrategy, WatchdogConfig, WatchdogConfigInput } from "./config"
export { HealthMonitor } from "./health-monitor"
export type { HealthReport } from "./health-monitor"
export { Logger } from "./logger"
export type { LogLevel, LogMeta, LoggerOptions } from "./logger"
export {
  createMemorySampler,
  defaultProcessTable,
  formatProcessInfo,
  ProcfsProcessTable,
  PsProcessTable,
} from "./memory-sampler"
export type { MemorySampler, ProcessSnapshot, ProcessTable } from "./memory-sampler"
export { createWatchdogMiddleware, exitProcess } from "./middleware"
export type { Terminator, WatchdogMiddlewareOptions } from "./middleware"
export { LocalRequestCounter, SharedRequestCounter } from "./request-counter"
export type { RequestCounter } from "./request-counter"
export { createServer } from "./server"
export type { ServerOptions, WatchdogServer } from "./server"
export { checkMemory, decide, isCheckTick, isWarmedUp, onRequestHandled, Watchdog } from "./watchdog"
export type { WatchdogAction, WatchdogPhase } from "./watchdog"
