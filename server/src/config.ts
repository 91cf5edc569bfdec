/**
 * Server Configuration
 *
 * Environment variables with typed defaults. Importable by any module that
 * needs config without pulling in the full server.
 */

import * as path from "path";
import * as os from "os";
import { isLogLevel, type LogLevel } from "@docprime/shared/logging";

export interface ServerConfig {
  port: number;
  corsOrigins: string[];

  /** Idle time after which a session is evicted */
  sessionTimeoutMs: number;
  /** How often the sweeper scans for idle sessions */
  sweepIntervalMs: number;

  /** Upper bound on the estimated tokens fed to the context builder */
  maxContextTokens: number;
  /** Deadline for a single context rebuild */
  buildTimeoutMs: number;

  chunkSize: number;
  chunkOverlap: number;

  engine: {
    baseUrl: string;
    model: string;
    apiKey: string;
  };

  dbDir: string;
  logDir: string;
  logLevel?: LogLevel;

  /** Folder of .md/.txt files ingested at startup, if set */
  knowledgeDir?: string;
}

export interface LoadedConfig {
  config: ServerConfig;
  /** Problems found while parsing; logged once logging is up */
  warnings: string[];
}

type Env = Record<string, string | undefined>;

// ============================================
// DEFAULTS
// ============================================

export const DEFAULTS = {
  PORT: 11435,
  SESSION_TIMEOUT_S: 86_400,
  SWEEP_INTERVAL_S: 3_600,
  CONTEXT_TOKEN_LIMIT: 8_192,
  BUILD_TIMEOUT_MS: 120_000,
  CHUNK_SIZE: 512,
  CHUNK_OVERLAP: 128,
  ENGINE_URL: "http://localhost:8000/v1",
  ENGINE_MODEL: "default",
} as const;

// ============================================
// PARSING
// ============================================

function positiveInt(env: Env, key: string, fallback: number, warnings: string[]): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    warnings.push(`${key}=${raw} is not a positive integer, using ${fallback}`);
    return fallback;
  }
  return value;
}

/** Longest delay setTimeout/setInterval accept; Node fires anything larger after 1ms */
export const MAX_TIMER_MS = 2_147_483_647;

/** A positive integer in `unitMs` units, converted to ms and capped at MAX_TIMER_MS */
function timerMs(env: Env, key: string, fallback: number, unitMs: number, warnings: string[]): number {
  const ms = positiveInt(env, key, fallback, warnings) * unitMs;
  if (ms > MAX_TIMER_MS) {
    warnings.push(`${key}=${env[key]} exceeds the longest timer delay of ${MAX_TIMER_MS}ms, using ${MAX_TIMER_MS}ms`);
    return MAX_TIMER_MS;
  }
  return ms;
}

export function loadConfig(env: Env = process.env): LoadedConfig {
  const warnings: string[] = [];
  const home = os.homedir();

  const chunkSize = positiveInt(env, "CHUNK_SIZE", DEFAULTS.CHUNK_SIZE, warnings);
  let chunkOverlap: number = DEFAULTS.CHUNK_OVERLAP;
  if (env.CHUNK_OVERLAP !== undefined && env.CHUNK_OVERLAP.trim() !== "") {
    const overlap = Number(env.CHUNK_OVERLAP);
    if (Number.isInteger(overlap) && overlap >= 0) {
      chunkOverlap = overlap;
    } else {
      warnings.push(`CHUNK_OVERLAP=${env.CHUNK_OVERLAP} is not a non-negative integer, using ${DEFAULTS.CHUNK_OVERLAP}`);
    }
  }
  if (chunkOverlap >= chunkSize) {
    const clamped = Math.floor(chunkSize / 4);
    warnings.push(`CHUNK_OVERLAP (${chunkOverlap}) must be smaller than CHUNK_SIZE (${chunkSize}), using ${clamped}`);
    chunkOverlap = clamped;
  }

  let logLevel: LogLevel | undefined;
  if (env.LOG_LEVEL) {
    const level = env.LOG_LEVEL.toLowerCase();
    if (isLogLevel(level)) {
      logLevel = level;
    } else {
      warnings.push(`LOG_LEVEL=${env.LOG_LEVEL} is not a log level, using the default`);
    }
  }

  const config: ServerConfig = {
    port: positiveInt(env, "PORT", DEFAULTS.PORT, warnings),
    corsOrigins: (env.CORS_ORIGINS || "*").split(",").map(o => o.trim()).filter(Boolean),

    sessionTimeoutMs: positiveInt(env, "SESSION_TIMEOUT", DEFAULTS.SESSION_TIMEOUT_S, warnings) * 1000,
    sweepIntervalMs: timerMs(env, "SWEEP_INTERVAL", DEFAULTS.SWEEP_INTERVAL_S, 1000, warnings),

    maxContextTokens: positiveInt(env, "CONTEXT_TOKEN_LIMIT", DEFAULTS.CONTEXT_TOKEN_LIMIT, warnings),
    buildTimeoutMs: timerMs(env, "BUILD_TIMEOUT_MS", DEFAULTS.BUILD_TIMEOUT_MS, 1, warnings),

    chunkSize,
    chunkOverlap,

    engine: {
      baseUrl: (env.ENGINE_URL || DEFAULTS.ENGINE_URL).replace(/\/+$/, ""),
      model: env.ENGINE_MODEL || DEFAULTS.ENGINE_MODEL,
      apiKey: env.ENGINE_API_KEY || "",
    },

    dbDir: env.DB_DIR || path.join(home, ".docprime", "data"),
    logDir: env.LOG_DIR || path.join(home, ".docprime", "logs"),
    logLevel,
    knowledgeDir: env.KNOWLEDGE_DIR || undefined,
  };

  return { config, warnings };
}
