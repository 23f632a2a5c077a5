#!/usr/bin/env node
/**
 * sound-events-play - command-line entry point
 */

import { hideBin } from 'yargs/helpers';
import { CanberraBackend } from '../backend/CanberraBackend';
import { SoundContext } from '../context/SoundContext';
import { isSoundError } from '../types/errors';
import { createLogger } from './logger';
import { parsePlayArgs, runPlay } from './play';

const logger = createLogger({ command: 'sound-events-play' });

async function main(): Promise<void> {
  const options = parsePlayArgs(hideBin(process.argv));

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.info('Interrupted, cancelling playback');
    controller.abort();
  });

  const context = SoundContext.create({
    backend: new CanberraBackend({ command: options.player }),
    applicationName: 'sound-events-play',
    driver: options.driver,
  });

  try {
    await runPlay(options, { context, logger, signal: controller.signal });
  } finally {
    context.destroy();
  }
}

main().catch((error: unknown) => {
  if (isSoundError(error)) {
    logger.error({ code: error.code, context: error.context }, error.message);
  } else {
    logger.error({ err: error }, 'Unexpected failure');
  }
  process.exit(1);
});
