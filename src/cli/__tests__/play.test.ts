/**
 * Tests for the sound-events-play command
 */

import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { buildAttributes, parsePlayArgs, parseProperty, runPlay } from '../play';
import { SoundContext } from '../../context/SoundContext';
import { MemoryBackend } from '../../backend/MemoryBackend';
import { InvalidArgumentError, SubmissionError } from '../../types/errors';
import { SoundErrorCode } from '../../types/codes';
import { PlayCommandOptionsSchema } from '../../utils/validators';

const logger = pino({ enabled: false });

describe('parsePlayArgs', () => {
  it('should parse flags and fill defaults', () => {
    const options = parsePlayArgs(['--id', 'bell', '-p', 'media.role=event', '--loop', '2']);

    expect(options).toMatchObject({
      id: 'bell',
      loop: 2,
      property: ['media.role=event'],
      player: 'canberra-gtk-play',
      cache: false,
    });
  });

  it('should read aliases', () => {
    const options = parsePlayArgs([
      '-f',
      '/tmp/bell.oga',
      '-d',
      'Bell',
      '-c',
      'volatile',
      '--volume=-3',
      '--driver',
      'null',
      '--cache',
    ]);

    expect(options).toMatchObject({
      file: '/tmp/bell.oga',
      description: 'Bell',
      cacheControl: 'volatile',
      volume: '-3',
      driver: 'null',
      cache: true,
    });
  });

  it('should require an id or a file', () => {
    expect(() => parsePlayArgs([])).toThrow(
      'Validation failed for command line: Either --id or --file is required'
    );
  });

  it('should reject invalid values', () => {
    expect(() => parsePlayArgs(['--id', 'bell', '--volume', 'loud'])).toThrow(
      InvalidArgumentError
    );
    expect(() => parsePlayArgs(['--id', 'bell', '--cache-control', 'sometimes'])).toThrow(
      InvalidArgumentError
    );
  });

  it('should reject unknown flags', () => {
    expect(() => parsePlayArgs(['--id', 'bell', '--bogus'])).toThrow('Unknown argument: bogus');
  });
});

describe('parseProperty', () => {
  it('should split at the first equals sign', () => {
    expect(parseProperty('media.role=event')).toEqual(['media.role', 'event']);
    expect(parseProperty('event.description=a=b')).toEqual(['event.description', 'a=b']);
    expect(parseProperty('window.x11.screen=')).toEqual(['window.x11.screen', '']);
  });

  it('should reject specs without a key', () => {
    expect(() => parseProperty('novalue')).toThrow(
      'Property "novalue" is not of the form KEY=VALUE'
    );
    expect(() => parseProperty('=value')).toThrow(InvalidArgumentError);
  });
});

describe('buildAttributes', () => {
  it('should put flags first and properties after', () => {
    const options = PlayCommandOptionsSchema.parse({
      id: 'bell',
      description: 'Bell',
      cacheControl: 'permanent',
      volume: '-3',
      property: ['media.role=event'],
    });

    expect(buildAttributes(options)).toEqual([
      'event.id',
      'bell',
      'event.description',
      'Bell',
      'canberra.cache-control',
      'permanent',
      'canberra.volume',
      '-3',
      'media.role',
      'event',
    ]);
  });
});

describe('runPlay', () => {
  it('should play the sound once per loop', async () => {
    const backend = new MemoryBackend({ autoComplete: SoundErrorCode.SUCCESS });
    const context = SoundContext.create({ backend });
    const options = PlayCommandOptionsSchema.parse({ id: 'bell', loop: 3 });

    await runPlay(options, { context, logger });

    expect(backend.callsOf('play')).toHaveLength(3);
    expect(backend.callsOf('play')[0].props).toEqual([['event.id', 'bell']]);
  });

  it('should only cache in cache mode', async () => {
    const backend = new MemoryBackend();
    const context = SoundContext.create({ backend });
    const options = PlayCommandOptionsSchema.parse({ id: 'bell', cache: true });

    await runPlay(options, { context, logger });

    expect(backend.callsOf('cache')).toHaveLength(1);
    expect(backend.callsOf('play')).toHaveLength(0);
  });

  it('should stop at the first failure', async () => {
    const backend = new MemoryBackend({ autoComplete: SoundErrorCode.SUCCESS });
    backend.failNext('play', SoundErrorCode.NOT_FOUND);
    const context = SoundContext.create({ backend });
    const options = PlayCommandOptionsSchema.parse({ id: 'bell', loop: 2 });

    await expect(runPlay(options, { context, logger })).rejects.toBeInstanceOf(SubmissionError);
    expect(backend.callsOf('play')).toHaveLength(1);
  });

  it('should end with CANCELED when aborted', async () => {
    const backend = new MemoryBackend();
    const context = SoundContext.create({ backend });
    const controller = new AbortController();
    const options = PlayCommandOptionsSchema.parse({ id: 'bell' });

    const running = runPlay(options, { context, logger, signal: controller.signal });
    controller.abort();

    await expect(running).rejects.toMatchObject({ code: SoundErrorCode.CANCELED });
  });
});
