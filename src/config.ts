/**
 * Application Configuration
 * Centralized configuration with schema validation.
 */

import { isAbsolute, join } from "node:path"
import { z } from "zod"

const LOG_LEVEL_VALUES = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const

export interface AppConfig {
  logLevel: string
  projectDir: string
  basePort: number
  maxAttempts: number
  recordFile: string
  probeHosts: string[]
  composeService: string
  containerPort: number
  shutdownTimeoutMs: number
  shutdownPollIntervalMs: number
  dockerQueryTimeoutMs: number
}

const DEFAULTS = {
  logLevel: "info",
  basePort: 3000,
  maxAttempts: 20,
  recordFile: ".dev-port",
  probeHosts: ["0.0.0.0", "::"],
  composeService: "app",
  containerPort: 3000,
  shutdownTimeoutMs: 30_000,
  shutdownPollIntervalMs: 100,
  dockerQueryTimeoutMs: 10_000,
} as const

const portNumber = z.number().int().min(1).max(65_535)

const AppConfigSchema = z
  .object({
    logLevel: z.enum(LOG_LEVEL_VALUES),
    projectDir: z.string().min(1),
    basePort: portNumber,
    maxAttempts: z.number().int().positive(),
    recordFile: z
      .string()
      .min(1)
      .refine((v) => !v.includes("/") && !v.includes("\\"), {
        message: "PORT_FILE must be a file name, not a path",
      }),
    probeHosts: z.array(z.string().min(1)).min(1),
    composeService: z.string().min(1),
    containerPort: portNumber,
    shutdownTimeoutMs: z.number().int().positive(),
    shutdownPollIntervalMs: z.number().int().positive(),
    dockerQueryTimeoutMs: z.number().int().positive(),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.shutdownPollIntervalMs > cfg.shutdownTimeoutMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["shutdownPollIntervalMs"],
        message: "SHUTDOWN_POLL_INTERVAL_MS cannot exceed SHUTDOWN_TIMEOUT_MS",
      })
    }
  })

function envInt(value: string | undefined, fallback: number): number {
  if (!value || value.trim().length === 0) return fallback
  // NaN and fractions fail the schema's int check
  return Number(value.trim())
}

function envString(value: string | undefined, fallback: string): string {
  return value?.trim() || fallback
}

function envList(value: string | undefined, fallback: readonly string[]): string[] {
  const items = (value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
  return items.length > 0 ? items : [...fallback]
}

function resolvePath(cwd: string, value: string): string {
  return isAbsolute(value) ? value : join(cwd, value)
}

export function loadConfig(): AppConfig {
  const cwd = process.cwd()
  const env = process.env

  const candidate: AppConfig = {
    logLevel: envString(env.LOG_LEVEL, DEFAULTS.logLevel),
    projectDir: resolvePath(cwd, envString(env.PROJECT_DIR, ".")),
    basePort: envInt(env.PORT, DEFAULTS.basePort),
    maxAttempts: envInt(env.PORT_MAX_ATTEMPTS, DEFAULTS.maxAttempts),
    recordFile: envString(env.PORT_FILE, DEFAULTS.recordFile),
    probeHosts: envList(env.PROBE_HOST, DEFAULTS.probeHosts),
    composeService: envString(env.COMPOSE_SERVICE, DEFAULTS.composeService),
    containerPort: envInt(env.CONTAINER_PORT, DEFAULTS.containerPort),
    shutdownTimeoutMs: envInt(env.SHUTDOWN_TIMEOUT_MS, DEFAULTS.shutdownTimeoutMs),
    shutdownPollIntervalMs: envInt(env.SHUTDOWN_POLL_INTERVAL_MS, DEFAULTS.shutdownPollIntervalMs),
    dockerQueryTimeoutMs: envInt(env.DOCKER_QUERY_TIMEOUT_MS, DEFAULTS.dockerQueryTimeoutMs),
  }

  return AppConfigSchema.parse(candidate)
}
