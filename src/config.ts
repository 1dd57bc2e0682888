/**
 * Courier configuration resolution.
 * Merges a raw config object with defaults.
 *
 * Two loading modes:
 *   1. Embedded:    resolveCourierConfig(raw) — host passes its own config
 *   2. Standalone:  loadCourierConfig() — reads from file / env directly
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import type { CourierLogLevel } from "./logger.js";

/** What clearWaitResponsesBefore does with a tag that is not an integer. */
export type NonNumericTagPolicy = "skip" | "fail";

export interface CourierConfig {
  /**
   * Timeout applied by sendMsg when the caller gives none.
   * null = unbounded (the envelope never expires).
   */
  defaultTimeoutMs: number | null;
  /** Interval of the response-timeout sweep. Kept below the 500ms timeout floor. */
  sweepIntervalMs: number;
  /** Interval of the outbound pump. */
  flushIntervalMs: number;
  /**
   * Outbound queue bound per session. null = unbounded, which is the
   * default: there is no backpressure unless this is set.
   */
  maxQueueSize: number | null;
  nonNumericTags: NonNumericTagPolicy;
  logLevel: CourierLogLevel;
}

const DEFAULT_SWEEP_INTERVAL_MS = 250;
const DEFAULT_FLUSH_INTERVAL_MS = 50;
/** Sweep must run more often than the shortest allowed timeout. */
const MAX_SWEEP_INTERVAL_MS = 499;

const LOG_LEVELS: readonly CourierLogLevel[] = ["debug", "info", "warn", "error"];

function isPositiveInt(v: unknown): v is number {
  return typeof v === "number" && Number.isInteger(v) && v > 0;
}

function isLogLevel(v: unknown): v is CourierLogLevel {
  return typeof v === "string" && (LOG_LEVELS as readonly string[]).includes(v);
}

export function resolveCourierConfig(raw?: Record<string, unknown> | null): CourierConfig {
  const r = raw ?? {};

  const sweepIntervalMs = (
    isPositiveInt(r.sweepIntervalMs) && r.sweepIntervalMs <= MAX_SWEEP_INTERVAL_MS
  ) ? r.sweepIntervalMs : DEFAULT_SWEEP_INTERVAL_MS;

  const nonNumericTags: NonNumericTagPolicy = r.nonNumericTags === "fail" ? "fail" : "skip";

  return {
    defaultTimeoutMs: isPositiveInt(r.defaultTimeoutMs) ? r.defaultTimeoutMs : null,
    sweepIntervalMs,
    flushIntervalMs: isPositiveInt(r.flushIntervalMs) ? r.flushIntervalMs : DEFAULT_FLUSH_INTERVAL_MS,
    maxQueueSize: isPositiveInt(r.maxQueueSize) ? r.maxQueueSize : null,
    nonNumericTags,
    logLevel: isLogLevel(r.logLevel) ? r.logLevel : "info",
  };
}

/**
 * Default config file search paths (highest priority first):
 *   1. $COURIER_CONFIG env
 *   2. ./courier.json (cwd)
 *   3. ~/.courier/courier.json
 */
function resolveConfigPath(): string | null {
  if (process.env.COURIER_CONFIG) {
    return process.env.COURIER_CONFIG;
  }
  const cwdPath = path.resolve("courier.json");
  if (fs.existsSync(cwdPath)) return cwdPath;

  const homePath = path.join(os.homedir(), ".courier", "courier.json");
  if (fs.existsSync(homePath)) return homePath;

  return null;
}

/**
 * Load Courier config from the file system.
 * Falls back to defaults if no config file is found.
 */
export function loadCourierConfig(): CourierConfig {
  const configPath = resolveConfigPath();
  if (!configPath) {
    return resolveCourierConfig({});
  }

  const raw: unknown = JSON.parse(fs.readFileSync(configPath, "utf8"));
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error(`Invalid courier config at ${configPath}: expected a JSON object`);
  }
  return resolveCourierConfig(raw as Record<string, unknown>);
}
