// Debug log - timestamped session events written to a file
// The terminal belongs to the TUI while it runs, so nothing here goes to stdout

import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Kinds of events recorded in the debug log
 */
export type DebugLogType = 'system' | 'input' | 'cursor' | 'render' | 'error';

/**
 * Log entry interface for all loggable events
 */
export interface DebugLogEntry {
  timestamp: Date;
  type: DebugLogType;
  text: string;
  details?: Record<string, unknown>;
}

/**
 * Formats a Date to "[HH:MM:SS]" format
 * @param date - The date to format
 * @returns Formatted timestamp string like "[12:34:01]"
 */
export function formatTimestamp(date: Date): string {
  const hours = date.getHours().toString().padStart(2, '0');
  const minutes = date.getMinutes().toString().padStart(2, '0');
  const seconds = date.getSeconds().toString().padStart(2, '0');
  return `[${hours}:${minutes}:${seconds}]`;
}

/**
 * Formats one entry as it appears in the file
 */
export function formatEntry(entry: DebugLogEntry): string {
  let line = `${formatTimestamp(entry.timestamp)} [${entry.type}] ${entry.text}`;
  if (entry.details) {
    line += `\n    DETAILS: ${JSON.stringify(entry.details, null, 2).split('\n').join('\n    ')}`;
  }
  return `${line}\n`;
}

/**
 * Appends session events to a log file.
 *
 * The file is truncated when the log is opened. If a write fails the log
 * stops writing and keeps the error in `failure` so the caller can report it
 * once the terminal is back in a usable state.
 */
export class DebugLog {
  private readonly logFilePath: string | null;
  private writeError: Error | null = null;

  /**
   * @param logFilePath - File to write, or null for a log that records nothing
   */
  constructor(logFilePath: string | null) {
    this.logFilePath = logFilePath;
  }

  /**
   * Creates the log directory if needed and writes the session header
   */
  open(): void {
    this.write((filePath) => {
      const dir = path.dirname(filePath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
      fs.writeFileSync(filePath, `=== gridpick session ${new Date().toISOString()} ===\n\n`);
    });
  }

  log(type: DebugLogType, text: string, details?: Record<string, unknown>): void {
    const line = formatEntry({ timestamp: new Date(), type, text, details });
    this.write((filePath) => {
      fs.appendFileSync(filePath, line);
    });
  }

  /** The write error that disabled the log, if any */
  get failure(): Error | null {
    return this.writeError;
  }

  private write(action: (filePath: string) => void): void {
    if (this.logFilePath === null || this.writeError) return;
    try {
      action(this.logFilePath);
    } catch (err) {
      this.writeError = err instanceof Error ? err : new Error(String(err));
    }
  }
}
