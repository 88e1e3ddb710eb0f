import { execFileSync } from "node:child_process"
import { readFileSync } from "node:fs"
import path from "node:path"
import type { Logger } from "./logger"

export interface ProcessSnapshot {
  pid: number
  virtualBytes: number
  residentBytes: number
  commandLine: string
}

/** Looks up a single entry of the OS process table */
export interface ProcessTable {
  find(pid: number): ProcessSnapshot | undefined
}

export type MemorySampler = () => ProcessSnapshot | undefined

const KIB = 1024

function isMissingEntry(error: unknown): boolean {
  return error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ESRCH")
}

/**
 * Reads `/proc/<pid>/status` and `/proc/<pid>/cmdline` on Linux.
 */
export class ProcfsProcessTable implements ProcessTable {
  constructor(private procRoot = "/proc") {}

  find(pid: number): ProcessSnapshot | undefined {
    const dir = path.join(this.procRoot, String(pid))
    let status: string
    let cmdline: string
    try {
      status = readFileSync(path.join(dir, "status"), "utf8")
      cmdline = readFileSync(path.join(dir, "cmdline"), "utf8")
    } catch (error) {
      if (isMissingEntry(error)) {
        return undefined
      }
      throw error
    }

    const virtualKib = readStatusField(status, "VmSize")
    const residentKib = readStatusField(status, "VmRSS")
    // kernel threads carry no Vm* fields
    if (virtualKib === undefined || residentKib === undefined) {
      return undefined
    }

    return {
      pid,
      virtualBytes: virtualKib * KIB,
      residentBytes: residentKib * KIB,
      commandLine: cmdline.split("\0").filter(Boolean).join(" "),
    }
  }
}

function readStatusField(status: string, field: string): number | undefined {
  const match = new RegExp(`^${field}:\\s*(\\d+)\\s*kB$`, "m").exec(status)
  return match ? Number(match[1]) : undefined
}

export type CommandRunner = (file: string, args: string[]) => string

const runCommand: CommandRunner = (file, args) =>
  execFileSync(file, args, { encoding: "utf8", stdio: ["ignore", "pipe", "ignore"], timeout: 5000 })

/**
 * Queries `ps` for systems without procfs. `vsz` and `rss` are reported in KiB.
 */
export class PsProcessTable implements ProcessTable {
  constructor(private run: CommandRunner = runCommand) {}

  find(pid: number): ProcessSnapshot | undefined {
    let output: string
    try {
      output = this.run("ps", ["-o", "pid=,vsz=,rss=,args=", "-p", String(pid)])
    } catch (error) {
      // ps exits with status 1 when no process matches
      if (error instanceof Error && "status" in error && error.status === 1) {
        return undefined
      }
      throw error
    }

    for (const line of output.split("\n")) {
      const match = /^\s*(\d+)\s+(\d+)\s+(\d+)\s*(.*)$/.exec(line)
      if (!match || Number(match[1]) !== pid) {
        continue
      }
      return {
        pid,
        virtualBytes: Number(match[2]) * KIB,
        residentBytes: Number(match[3]) * KIB,
        commandLine: match[4].trim(),
      }
    }
    return undefined
  }
}

export function defaultProcessTable(platform: NodeJS.Platform = process.platform): ProcessTable {
  return platform === "linux" ? new ProcfsProcessTable() : new PsProcessTable()
}

export interface MemorySamplerOptions {
  table?: ProcessTable
  pid?: number
  logger?: Logger
}

/**
 * Builds the sampler the watchdog calls on each check. A failed lookup is
 * logged and reported as no sample, never thrown.
 */
export function createMemorySampler(options: MemorySamplerOptions = {}): MemorySampler {
  const table = options.table ?? defaultProcessTable()
  const pid = options.pid ?? process.pid

  return function sampleCurrentProcessMemory() {
    try {
      return table.find(pid)
    } catch (error) {
      options.logger?.warn("Process table lookup failed", {
        pid,
        error: error instanceof Error ? error.message : String(error),
      })
      return undefined
    }
  }
}

function formatMiB(bytes: number): string {
  return `${(bytes / (KIB * KIB)).toFixed(1)} MiB`
}

export function formatProcessInfo(snapshot: ProcessSnapshot): string {
  return [
    `PID ${snapshot.pid}`,
    `VIRT ${formatMiB(snapshot.virtualBytes)}`,
    `RES ${formatMiB(snapshot.residentBytes)}`,
    `COMMAND ${snapshot.commandLine}`,
  ].join(" | ")
}
