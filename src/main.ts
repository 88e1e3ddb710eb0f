import { loadWatchdogConfig, type WatchdogConfig, WatchdogConfigError } from "./config"
import { isLogLevel, Logger } from "./logger"
import { createServer } from "./server"

const PORT = Number(process.env.PORT) || 3000
const LOG_LEVEL = (process.env.LOG_LEVEL ?? "info").toLowerCase()

const logger = new Logger({ level: isLogLevel(LOG_LEVEL) ? LOG_LEVEL : "info" })

function readConfig(): WatchdogConfig {
  try {
    return loadWatchdogConfig(process.env, logger)
  } catch (error) {
    if (error instanceof WatchdogConfigError) {
      logger.error("Invalid watchdog configuration", { error: error.message })
      process.exit(1)
    }
    throw error
  }
}

const config = readConfig()

// Global error handlers
process.on("uncaughtException", (error) => {
  logger.error("Uncaught Exception", { error: error.message, stack: error.stack })
})

process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled Rejection", { reason: reason instanceof Error ? reason.message : String(reason) })
})

const { app } = createServer({ config, logger })

const server = app.listen(PORT, () => {
  logger.info(`Server started on port ${PORT}`, { pid: process.pid, watchdog: config })
})

const gracefulShutdown = (signal: string) => {
  logger.info(`Received ${signal}, shutting down gracefully`)
  server.close(() => process.exit(0))
}

process.on("SIGTERM", () => gracefulShutdown("SIGTERM"))
process.on("SIGINT", () => gracefulShutdown("SIGINT"))
