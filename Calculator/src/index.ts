/**
 * Tally calculator entry point
 *
 * Usage:
 *   npm start
 *   TALLY_LOG_PATH=~/calc.log npm start
 */

import { loadEnvSafely } from '@tally/shared/Utils/env.js';

// Runs after the static imports below have loaded; loggers re-read LOG_LEVEL in main()
loadEnvSafely(import.meta.url);

import { Logger, logger as sharedLogger } from '@tally/shared/Utils/logger.js';
import { getConfig } from './config.js';
import { ReadlinePrompter } from './input/prompter.js';
import { LogStore } from './log/store.js';
import { SessionController } from './session/controller.js';

const logger = new Logger('calc', { fallbackLevel: 'warn' });

async function main(): Promise<void> {
  sharedLogger.reloadLevel();
  logger.reloadLevel();
  const config = getConfig();
  logger.info('Starting calculator', { logPath: config.logPath, trianglePath: config.trianglePath });

  const prompter = new ReadlinePrompter();
  // Non-TTY stdin gets the signal instead of readline
  process.on('SIGINT', () => prompter.close());

  try {
    const session = new SessionController({
      store: new LogStore(config.logPath),
      prompter,
      trianglePath: config.trianglePath,
      fractionResults: config.fractionResults,
      maxDenominator: config.maxDenominator,
    });
    const summary = await session.run();
    logger.info('Session finished', summary);
  } finally {
    prompter.close();
  }
}

main().catch((error) => {
  logger.error('Fatal error', error);
  process.exit(1);
});
