import type { RequestHandler } from "express"
import type { RequestCounter } from "./request-counter"
import type { Watchdog, WatchdogAction } from "./watchdog"

export type Terminator = (code: number) => void

/** Exits immediately; buffered log output may be lost. */
export const exitProcess: Terminator = (code) => {
  process.exit(code)
}

export interface WatchdogMiddlewareOptions {
  counter: RequestCounter
  watchdog: Watchdog
  terminate?: Terminator
}

/**
 * Counts every request once its response has finished or its connection has
 * closed, whatever the outcome, and exits the process when the watchdog
 * reports a breach.
 */
export function createWatchdogMiddleware(options: WatchdogMiddlewareOptions): RequestHandler {
  const { counter, watchdog } = options
  const terminate = options.terminate ?? exitProcess

  const handleAction = (action: WatchdogAction): void => {
    if (action.type === "terminate") {
      terminate(0)
    }
  }

  return (req, res, next) => {
    let counted = false
    const onDone = () => {
      if (counted) {
        return
      }
      counted = true
      res.off("finish", onDone)
      res.off("close", onDone)
      handleAction(watchdog.onRequestHandled(counter.increment()))
    }

    res.once("finish", onDone)
    res.once("close", onDone)
    next()
  }
}
