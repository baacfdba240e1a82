/**
 * Debug logging for analysis runs.
 *
 * Lines go to the console and, unless disabled, are appended to a log file.
 * Settings are read from the environment on each call:
 *   CB_DEBUG_LOG_PATH            file path (default ./debug-analyzer.log)
 *   CB_DEBUG_LOG_FILE            "false" disables the file
 *   CB_DEBUG_LOG_CLEAR_ON_START  "true" lets clearDebugLog() truncate the file
 *
 * @module analyzer/debug
 */

import * as fs from "fs";
import * as path from "path";

const DEBUG_LOG_MAX_DATA_CHARS = 8000;

function getDebugLogPath(): string {
  return process.env.CB_DEBUG_LOG_PATH || path.join(process.cwd(), "debug-analyzer.log");
}

function isFileLoggingEnabled(): boolean {
  return (process.env.CB_DEBUG_LOG_FILE ?? "true").toLowerCase() === "true";
}

function reportWriteFailure(err: unknown): void {
  const reason = err instanceof Error ? err.message : String(err);
  console.warn(`[Debug] Could not write ${getDebugLogPath()}: ${reason}`);
}

/** Serialize a payload for the log, truncated to keep single lines readable. */
export function formatDebugPayload(data: unknown): string {
  let payload: string;
  try {
    payload = typeof data === "string" ? data : JSON.stringify(data, null, 2) ?? String(data);
  } catch {
    payload = "[unserializable]";
  }
  if (payload.length > DEBUG_LOG_MAX_DATA_CHARS) {
    payload = payload.slice(0, DEBUG_LOG_MAX_DATA_CHARS) + "…[truncated]";
  }
  return payload;
}

/**
 * Log a message to the debug file and console
 */
export function debugLog(message: string, data?: unknown): void {
  const timestamp = new Date().toISOString();
  let logLine = `[${timestamp}] ${message}`;
  if (data !== undefined) {
    logLine += ` | ${formatDebugPayload(data)}`;
  }
  logLine += "\n";

  if (isFileLoggingEnabled()) {
    fs.promises.appendFile(getDebugLogPath(), logLine).catch(reportWriteFailure);
  }

  console.log(logLine.trim());
}

/**
 * Clear the debug log file at startup
 */
export function clearDebugLog(): void {
  if (!isFileLoggingEnabled()) return;
  if ((process.env.CB_DEBUG_LOG_CLEAR_ON_START ?? "false").toLowerCase() !== "true") return;

  fs.promises
    .writeFile(getDebugLogPath(), `=== Corroborate Debug Log Started at ${new Date().toISOString()} ===\n`)
    .catch(reportWriteFailure);
}
