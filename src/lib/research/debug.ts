/**
 * Debug logging utilities for the research engine
 *
 * Mirrors messages to the console and, when enabled, appends them to a
 * debug log file.
 *
 * Environment:
 * - RE_DEBUG_LOG_FILE=true enables the file (off by default)
 * - RE_DEBUG_LOG_PATH overrides the file location (default ./debug-research.log)
 *
 * @module research/debug
 */

import * as fs from "node:fs";
import * as path from "node:path";

// ============================================================================
// CONFIGURATION
// ============================================================================

const DEBUG_LOG_MAX_DATA_CHARS = 8000;

function debugLogPath(): string {
  return process.env.RE_DEBUG_LOG_PATH || path.join(process.cwd(), "debug-research.log");
}

function fileLoggingEnabled(): boolean {
  return (process.env.RE_DEBUG_LOG_FILE ?? "false").toLowerCase() === "true";
}

// ============================================================================
// DEBUG LOGGING FUNCTIONS
// ============================================================================

export function formatDebugLine(message: string, data?: unknown, timestamp = new Date().toISOString()): string {
  let logLine = `[${timestamp}] ${message}`;

  if (data !== undefined) {
    let payload: string;
    try {
      payload = typeof data === "string" ? data : JSON.stringify(data, null, 2);
    } catch {
      payload = "[unserializable]";
    }
    if (payload.length > DEBUG_LOG_MAX_DATA_CHARS) {
      payload = payload.slice(0, DEBUG_LOG_MAX_DATA_CHARS) + "…[truncated]";
    }
    logLine += ` | ${payload}`;
  }
  return logLine;
}

/**
 * Log a message to the debug file and console
 */
export function debugLog(message: string, data?: unknown): void {
  const logLine = formatDebugLine(message, data);

  if (fileLoggingEnabled()) {
    fs.promises.appendFile(debugLogPath(), `${logLine}\n`).catch((err: unknown) => {
      console.warn(`[Debug] Could not append to ${debugLogPath()}: ${err instanceof Error ? err.message : String(err)}`);
    });
  }

  console.log(logLine);
}
