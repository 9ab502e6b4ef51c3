/**
 * Logging for the translation pipeline
 *
 * Every line goes to stderr. When a log file is configured the same line is
 * appended there as well, so long unattended batches leave a trace on disk.
 */

import * as fs from 'fs';
import * as path from 'path';

const LOG_TAG = 'dialogue-tl';

let logFile: string | null = null;

/**
 * Set (or clear) the file that log lines are appended to.
 * Creates the parent directory if needed.
 */
export function setLogFile(filePath: string | null): void {
  logFile = filePath;
  if (!filePath) return;

  const dir = path.dirname(filePath);
  try {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  } catch (error) {
    console.error(`[${LOG_TAG}] Failed to create log directory:`, error);
  }
}

/**
 * Format a log line: `[timestamp] [dialogue-tl] message arg1 arg2`
 * Extra arguments are JSON-encoded.
 */
export function formatLogLine(message: string, args: unknown[], now: Date = new Date()): string {
  const formattedMessage = `[${now.toISOString()}] [${LOG_TAG}] ${message}`;
  return args.length > 0
    ? `${formattedMessage} ${args.map(a => JSON.stringify(a)).join(' ')}`
    : formattedMessage;
}

/**
 * Log to stderr and, when configured, to the log file
 */
export function log(message: string, ...args: unknown[]): void {
  const fullMessage = formatLogLine(message, args);

  console.error(fullMessage);

  if (!logFile) return;

  try {
    fs.appendFileSync(logFile, fullMessage + '\n', 'utf-8');
  } catch (error) {
    // Don't fail the batch if we can't write to the log file
    console.error(`[${LOG_TAG}] Failed to write to log file:`, error);
  }
}
