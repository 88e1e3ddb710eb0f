import express, { type ErrorRequestHandler, type Express } from "express"
import { json } from "body-parser"
import rateLimit from "express-rate-limit"
import type { WatchdogConfig } from "./config"
import { HealthMonitor } from "./health-monitor"
import { Logger } from "./logger"
import { createMemorySampler, type MemorySampler } from "./memory-sampler"
import { createWatchdogMiddleware, type Terminator } from "./middleware"
import { LocalRequestCounter, type RequestCounter } from "./request-counter"
import { Watchdog } from "./watchdog"

export interface ServerOptions {
  config: WatchdogConfig
  logger?: Logger
  counter?: RequestCounter
  sampler?: MemorySampler
  terminate?: Terminator
  /** Requests per minute allowed on /status for each IP */
  statusRateLimit?: number
}

export interface WatchdogServer {
  app: Express
  counter: RequestCounter
  watchdog: Watchdog
  healthMonitor: HealthMonitor
}

function statusOf(error: unknown): number {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status
  }
  return 500
}

export function createServer(options: ServerOptions): WatchdogServer {
  const logger = options.logger ?? new Logger()
  const counter = options.counter ?? new LocalRequestCounter()
  const sampler = options.sampler ?? createMemorySampler({ logger })
  const watchdog = new Watchdog(options.config, { sampler, logger })
  const healthMonitor = new HealthMonitor(counter, watchdog)

  const app = express()

  // Must run first so every request is counted, including rejected ones
  app.use(createWatchdogMiddleware({ counter, watchdog, terminate: options.terminate }))
  app.use(json({ limit: "1mb" }))

  const statusLimiter = rateLimit({
    windowMs: 1 * 60 * 1000, // 1 minute
    limit: options.statusRateLimit ?? 60,
    message: { error: "Too many requests from this IP" },
    standardHeaders: true,
    legacyHeaders: false,
  })

  app.get("/", (req, res) => {
    res.json({ service: "request-watchdog", pid: process.pid })
  })

  app.get("/status", statusLimiter, (req, res) => {
    const health = healthMonitor.getHealth()
    res.json({
      ...health,
      config: watchdog.config,
      timestamp: new Date().toISOString(),
    })
  })

  app.post("/echo", (req, res) => {
    res.json({ received: req.body })
  })

  const errorHandler: ErrorRequestHandler = (error, req, res, _next) => {
    const message = error instanceof Error ? error.message : String(error)
    logger.error("Request failed", { method: req.method, path: req.path, error: message })
    const status = statusOf(error)
    res.status(status).json({ error: status === 500 ? "Internal server error" : message })
  }
  app.use(errorHandler)

  return { app, counter, watchdog, healthMonitor }
}
