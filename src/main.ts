// Session runner: builds the configuration, takes over the terminal and runs the App loop
// Process hooks and the exit call live in index.ts so this module can be imported

import { App } from './app.js';
import { type AppConfigInput, createConfig } from './config.js';
import { DebugLog } from './debug-log.js';
import { describeError } from './errors.js';
import { cleanupTerminal, openTerminal, type Terminal } from './tui/index.js';

/**
 * A terminal the session owns and must give back
 */
export interface SessionTerminal extends Terminal {
  close(): void;
}

export interface MainOptions {
  config?: AppConfigInput;
  openTerminal?: () => SessionTerminal;
}

/**
 * Runs one session. Resolves with the process exit code: 0 after a quit key,
 * 1 when startup or input fails. The terminal is restored before any error is
 * reported on stderr.
 */
export async function main(options: MainOptions = {}): Promise<number> {
  const open = options.openTerminal ?? openTerminal;
  let log: DebugLog | null = null;
  let terminal: SessionTerminal | null = null;

  try {
    const config = createConfig(options.config);
    log = new DebugLog(config.debugLogPath);
    log.open();

    terminal = open();
    await new App(config, log).run(terminal);
    return 0;
  } catch (error) {
    log?.log('error', describeError(error));
    // Restore before writing, otherwise the message lands on the alternate screen
    terminal?.close();
    cleanupTerminal();
    process.stderr.write(`Error: ${describeError(error)}\n`);
    return 1;
  } finally {
    terminal?.close();
    if (log?.failure) {
      process.stderr.write(`Debug log disabled: ${log.failure.message}\n`);
    }
  }
}
