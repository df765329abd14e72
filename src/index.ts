#!/usr/bin/env node
/**
 * agecal - interactive age calculator and Gregorian/Jalali converter
 *
 * **Usage:**
 * - `agecal` (after `npm run build`)
 *
 * **Environment Variables:**
 * - AGECAL_LANG: `fa` (default) or `en`
 * - AGECAL_JALALI_BACKEND: `arithmetic` (default), `jalaali-js` or `none`
 * - AGECAL_TIME_SOURCE_URLS: comma-separated endpoints tried when the clock is implausible
 * - AGECAL_TIME_SOURCE_TIMEOUT_MS: per-endpoint timeout (default 3000)
 * - LOG_LEVEL / NODE_ENV: logging, see shared/logger
 * - NO_COLOR: disable colors
 */

import { createCliApp } from './adapters/primary/cli/createCliApp';
import { ReadlinePrompter, StreamOutput } from './adapters/primary/cli/io/ReadlinePrompter';
import { logger } from './shared/logger';

async function main(): Promise<void> {
  const prompter = new ReadlinePrompter();
  process.once('SIGINT', () => prompter.interrupt());

  const app = createCliApp({ prompter, output: new StreamOutput() });
  await app.run();
}

main().then(
  () => {
    process.exitCode = 0;
  },
  (error: unknown) => {
    logger.fatal({
      msg: 'agecal terminated with an unexpected error',
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exitCode = 1;
  }
);
