// Startup configuration
// Built once by the entry point and handed to the App; nothing reads it globally

import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { PALETTE_NAMES } from './tui/palettes.js';

/** Debug log location (temporary, cleared each session) */
export const DEFAULT_DEBUG_LOG_PATH = path.join(os.tmpdir(), 'gridpick.tmp.log');

export const AppConfigSchema = z.object({
  title: z.string().min(1).default('You VS Bot').describe('Text shown above the table'),
  palette: z.enum(PALETTE_NAMES).default('blue').describe('Accent palette for highlights'),
  debugLogPath: z
    .string()
    .min(1)
    .nullable()
    .default(DEFAULT_DEBUG_LOG_PATH)
    .describe('Where to write the debug log, or null to disable it'),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;

/**
 * Validates a partial configuration and fills in defaults.
 * Throws a ZodError when a field is invalid.
 */
export function createConfig(input: unknown = {}): AppConfig {
  return AppConfigSchema.parse(input);
}
