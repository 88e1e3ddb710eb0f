import { describe, expect, it, vi } from "vitest"
import {
  DEFAULT_MAX_MEMORY_BYTES,
  DEFAULT_MIN_HANDLED_REQUESTS,
  loadWatchdogConfig,
  resolveWatchdogConfig,
  WatchdogConfigError,
} from "./config"
import { Logger } from "./logger"

describe("resolveWatchdogConfig", () => {
  it("fills in defaults", () => {
    expect(resolveWatchdogConfig({})).toEqual({
      active: false,
      checkInterval: 0,
      minHandledRequests: 500,
      maxMemoryBytes: 524288000,
      tickStrategy: "modulus",
    })
    expect(DEFAULT_MIN_HANDLED_REQUESTS).toBe(500)
    expect(DEFAULT_MAX_MEMORY_BYTES).toBe(524288000)
  })

  it("returns a frozen snapshot", () => {
    const config = resolveWatchdogConfig({ active: true, checkInterval: 20 })

    expect(Object.isFrozen(config)).toBe(true)
  })

  it("accepts string values", () => {
    expect(
      resolveWatchdogConfig({
        active: "1",
        checkInterval: "20",
        minHandledRequests: "150",
        maxMemoryBytes: "576716800",
        tickStrategy: " Elapsed ",
      }),
    ).toEqual({
      active: true,
      checkInterval: 20,
      minHandledRequests: 150,
      maxMemoryBytes: 576716800,
      tickStrategy: "elapsed",
    })
  })

  it.each([
    ["true", true],
    ["YES", true],
    ["on", true],
    ["0", false],
    ["false", false],
    ["off", false],
  ])("reads active=%s as %s", (raw, expected) => {
    expect(resolveWatchdogConfig({ active: raw, checkInterval: 10 }).active).toBe(expected)
  })

  it("allows a zero warm-up", () => {
    expect(resolveWatchdogConfig({ minHandledRequests: "0" }).minHandledRequests).toBe(0)
  })

  it("falls back to defaults for malformed values and warns", () => {
    const write = vi.fn()
    const logger = new Logger({ write })

    const config = resolveWatchdogConfig(
      { active: true, checkInterval: 10, minHandledRequests: "lots", maxMemoryBytes: -5, tickStrategy: "sometimes" },
      logger,
    )

    expect(config.minHandledRequests).toBe(500)
    expect(config.maxMemoryBytes).toBe(524288000)
    expect(config.tickStrategy).toBe("modulus")
    expect(write).toHaveBeenCalledTimes(3)
    expect(write.mock.calls[0][0]).toBe("warn")
    expect(write.mock.calls[0][1]).toContain('Ignoring invalid watchdog option "minHandledRequests", using default')
  })

  it("treats an unrecognised active flag as inactive", () => {
    expect(resolveWatchdogConfig({ active: "maybe" }).active).toBe(false)
  })

  it("treats blank strings as absent", () => {
    expect(resolveWatchdogConfig({ active: "", minHandledRequests: "  " })).toMatchObject({
      active: false,
      minHandledRequests: 500,
    })
  })

  it("requires checkInterval when active", () => {
    expect(() => resolveWatchdogConfig({ active: true })).toThrow(WatchdogConfigError)
    expect(() => resolveWatchdogConfig({ active: true })).toThrow("checkInterval is required when the watchdog is active")
  })

  it.each([0, -1, 2.5, "twenty"])("rejects checkInterval %s when active", (checkInterval) => {
    expect(() => resolveWatchdogConfig({ active: true, checkInterval })).toThrow(WatchdogConfigError)
  })

  it("ignores a bad checkInterval while inactive and warns", () => {
    const write = vi.fn()

    const config = resolveWatchdogConfig({ active: false, checkInterval: "twenty" }, new Logger({ write }))

    expect(config.checkInterval).toBe(0)
    expect(write).toHaveBeenCalledTimes(1)
    expect(write.mock.calls[0][0]).toBe("warn")
    expect(write.mock.calls[0][1]).toContain('Ignoring invalid watchdog option "checkInterval", using default')
  })
})

describe("loadWatchdogConfig", () => {
  it("reads WATCHDOG_ environment variables", () => {
    const config = loadWatchdogConfig({
      WATCHDOG_ACTIVE: "true",
      WATCHDOG_CHECK_INTERVAL: "25",
      WATCHDOG_MIN_HANDLED_REQUESTS: "100",
      WATCHDOG_MAX_MEMORY_BYTES: "1048576",
      WATCHDOG_TICK_STRATEGY: "elapsed",
    })

    expect(config).toEqual({
      active: true,
      checkInterval: 25,
      minHandledRequests: 100,
      maxMemoryBytes: 1048576,
      tickStrategy: "elapsed",
    })
  })

  it("is inactive when nothing is set", () => {
    expect(loadWatchdogConfig({}).active).toBe(false)
  })
})
