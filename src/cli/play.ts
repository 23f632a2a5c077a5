/**
 * The `sound-events-play` command
 *
 * Plays (or caches) one event sound, optionally several times in a row.
 */

import yargs from 'yargs';
import { SoundAttr } from '../attributes/attrs';
import type { SoundContext } from '../context/SoundContext';
import { InvalidArgumentError } from '../types/errors';
import type { AttributeList } from '../types/attributes';
import { validate } from '../utils/validation';
import { PlayCommandOptionsSchema } from '../utils/validators';
import type { PlayCommandOptions } from '../utils/validators';
import type { CliLogger } from './logger';

export type { PlayCommandOptions };

/**
 * Parse and validate command-line arguments (without the node/script prefix)
 *
 * @throws InvalidArgumentError for unknown flags or invalid values
 */
export function parsePlayArgs(args: string[]): PlayCommandOptions {
  const argv = yargs(args)
    .scriptName('sound-events-play')
    .usage('$0 [options]')
    .option('id', { alias: 'i', type: 'string', describe: 'Event sound identifier' })
    .option('file', { alias: 'f', type: 'string', describe: 'Play file' })
    .option('description', { alias: 'd', type: 'string', describe: 'Event sound description' })
    .option('cache-control', {
      alias: 'c',
      type: 'string',
      describe: 'Cache control (permanent, volatile, never)',
    })
    .option('volume', { alias: 'V', type: 'string', describe: 'A floating point dB value' })
    .option('loop', { alias: 'l', type: 'number', default: 1, describe: 'Play this many times' })
    .option('property', {
      alias: 'p',
      type: 'string',
      array: true,
      default: [],
      describe: 'An arbitrary property, as KEY=VALUE',
    })
    .option('driver', { type: 'string', describe: 'Backend driver to use' })
    .option('player', {
      type: 'string',
      default: 'canberra-gtk-play',
      describe: 'Player command',
    })
    .option('cache', { type: 'boolean', default: false, describe: 'Only cache the sound' })
    .strict()
    .exitProcess(false)
    .fail((message: string | undefined, error: Error | undefined) => {
      throw error ?? new InvalidArgumentError(message ?? 'Invalid arguments');
    })
    .help()
    .parseSync();

  return validate(
    PlayCommandOptionsSchema,
    {
      id: argv.id,
      file: argv.file,
      description: argv.description,
      cacheControl: argv['cache-control'],
      volume: argv.volume,
      loop: argv.loop,
      property: argv.property,
      driver: argv.driver,
      player: argv.player,
      cache: argv.cache,
    },
    'command line'
  );
}

/**
 * Split a `KEY=VALUE` property argument
 */
export function parseProperty(spec: string): [string, string] {
  const separator = spec.indexOf('=');
  if (separator <= 0) {
    throw new InvalidArgumentError(`Property "${spec}" is not of the form KEY=VALUE`, undefined, {
      property: spec,
    });
  }
  return [spec.slice(0, separator), spec.slice(separator + 1)];
}

/**
 * Attribute list for the parsed options, flags first, then `--property` values in order
 */
export function buildAttributes(options: PlayCommandOptions): AttributeList {
  const attrs: string[] = [];
  const push = (key: string, value: string | undefined): void => {
    if (value !== undefined) {
      attrs.push(key, value);
    }
  };

  push(SoundAttr.EVENT_ID, options.id);
  push(SoundAttr.MEDIA_FILENAME, options.file);
  push(SoundAttr.EVENT_DESCRIPTION, options.description);
  push(SoundAttr.CANBERRA_CACHE_CONTROL, options.cacheControl);
  push(SoundAttr.CANBERRA_VOLUME, options.volume);
  for (const property of options.property) {
    attrs.push(...parseProperty(property));
  }
  return attrs;
}

export interface RunPlayDeps {
  context: SoundContext;
  logger: CliLogger;
  signal?: AbortSignal;
}

/**
 * Cache the sound, or play it `loop` times one after the other
 */
export async function runPlay(options: PlayCommandOptions, deps: RunPlayDeps): Promise<void> {
  const { context, logger, signal } = deps;
  const attrs = buildAttributes(options);

  if (options.cache) {
    context.cache(attrs);
    logger.info({ id: options.id }, 'Sound cached');
    return;
  }

  for (let round = 1; round <= options.loop; round++) {
    await context.play(attrs, { signal });
    logger.debug({ round, of: options.loop }, 'Sound finished');
  }
}
