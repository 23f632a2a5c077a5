/**
 * Tests for CanberraBackend
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';
import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import {
  CanberraBackend,
  CanberraHandle,
  buildPlayerArgs,
  exitCodeToResult,
} from '../CanberraBackend';
import type { SpawnedProcess, Spawner } from '../CanberraBackend';
import { PropList } from '../PropList';
import { SoundErrorCode } from '../../types/codes';

class FakeProcess extends EventEmitter implements SpawnedProcess {
  readonly stderr = new PassThrough();
  readonly killedWith: Array<NodeJS.Signals | undefined> = [];

  kill(signal?: NodeJS.Signals): boolean {
    this.killedWith.push(signal);
    return true;
  }

  close(code: number | null, signal: NodeJS.Signals | null = null): void {
    this.emit('close', code, signal);
  }
}

function propsOf(record: Record<string, string>): PropList {
  const props = new PropList();
  for (const [key, value] of Object.entries(record)) {
    props.set(key, value);
  }
  return props;
}

function createHandle(backend: CanberraBackend): CanberraHandle {
  const result = backend.create();
  if (!(result.handle instanceof CanberraHandle)) {
    throw new Error(`create failed with ${result.code}`);
  }
  return result.handle;
}

const flushStreams = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe('buildPlayerArgs', () => {
  it('should map known properties to flags and the rest to --property', () => {
    const handleProps = propsOf({ 'event.id': 'bell', 'application.name': 'test-app' });
    const props = propsOf({
      'event.id': 'dialog-error',
      'canberra.volume': '-6',
      'media.role': 'event',
    });

    expect(buildPlayerArgs(handleProps, props)).toEqual([
      '--id=dialog-error',
      '--property=application.name=test-app',
      '--volume=-6',
      '--property=media.role=event',
    ]);
  });

  it('should leave both input lists untouched', () => {
    const handleProps = propsOf({ 'event.id': 'bell' });
    const props = propsOf({ 'media.filename': '/tmp/bell.oga' });

    buildPlayerArgs(handleProps, props);

    expect(handleProps.entries()).toEqual([['event.id', 'bell']]);
    expect(props.entries()).toEqual([['media.filename', '/tmp/bell.oga']]);
  });
});

describe('exitCodeToResult', () => {
  it('should treat a clean exit as success', () => {
    expect(exitCodeToResult(0, null, '', false)).toBe(SoundErrorCode.SUCCESS);
  });

  it('should read the failure text from stderr', () => {
    const stderr = 'Failed to play sound: File or data not found\n';
    expect(exitCodeToResult(1, null, stderr, false)).toBe(SoundErrorCode.NOT_FOUND);
  });

  it('should fall back to SYSTEM for unrecognized failures', () => {
    expect(exitCodeToResult(1, null, 'Segmentation fault\n', false)).toBe(SoundErrorCode.SYSTEM);
    expect(exitCodeToResult(1, null, 'Failed to play sound: Bogus\n', false)).toBe(
      SoundErrorCode.SYSTEM
    );
  });

  it('should report a killed, cancelled process as CANCELED', () => {
    expect(exitCodeToResult(null, 'SIGTERM', '', true)).toBe(SoundErrorCode.CANCELED);
    expect(exitCodeToResult(null, 'SIGTERM', '', false)).toBe(SoundErrorCode.SYSTEM);
  });
});

describe('CanberraBackend', () => {
  let proc: FakeProcess;
  let spawner: Mock<Spawner>;
  let backend: CanberraBackend;

  beforeEach(() => {
    proc = new FakeProcess();
    spawner = vi.fn<Spawner>(() => proc);
    backend = new CanberraBackend({ command: 'fake-player', spawner, env: { PATH: '/bin' } });
  });

  it('should create handles', () => {
    const result = backend.create();
    expect(result.code).toBe(SoundErrorCode.SUCCESS);
    expect(result.handle).toBeInstanceOf(CanberraHandle);
    expect(backend.errorText(SoundErrorCode.NOT_FOUND)).toBe('File or data not found');
  });

  describe('play', () => {
    it('should spawn the player and report a clean exit', () => {
      const handle = createHandle(backend);
      const onFinished = vi.fn();

      expect(handle.play(7, propsOf({ 'event.id': 'bell' }), onFinished)).toBe(
        SoundErrorCode.SUCCESS
      );
      expect(spawner).toHaveBeenCalledWith('fake-player', ['--id=bell'], { PATH: '/bin' });
      expect(onFinished).not.toHaveBeenCalled();
      expect(handle.runningCount).toBe(1);

      proc.close(0);
      expect(onFinished).toHaveBeenCalledWith(7, SoundErrorCode.SUCCESS);
      expect(handle.runningCount).toBe(0);
    });

    it('should pass the driver through the environment', () => {
      const handle = createHandle(backend);
      expect(handle.setDriver('null')).toBe(SoundErrorCode.SUCCESS);

      handle.play(1, propsOf({ 'event.id': 'bell' }));

      expect(spawner).toHaveBeenCalledWith('fake-player', ['--id=bell'], {
        PATH: '/bin',
        CANBERRA_DRIVER: 'null',
      });
    });

    it('should include handle properties', () => {
      const handle = createHandle(backend);
      handle.changeProps(propsOf({ 'application.name': 'test-app' }));

      handle.play(1, propsOf({ 'event.id': 'bell' }));

      expect(spawner).toHaveBeenCalledWith(
        'fake-player',
        ['--property=application.name=test-app', '--id=bell'],
        { PATH: '/bin' }
      );
    });

    it('should map the failure printed on stderr', async () => {
      const handle = createHandle(backend);
      const onFinished = vi.fn();
      handle.play(3, propsOf({ 'event.id': 'missing' }), onFinished);

      proc.stderr.write('Failed to play sound: File or data not found\n');
      await flushStreams();
      proc.close(1);

      expect(onFinished).toHaveBeenCalledWith(3, SoundErrorCode.NOT_FOUND);
    });

    it('should report NOT_AVAILABLE once when the player cannot start', () => {
      const handle = createHandle(backend);
      const onFinished = vi.fn();
      handle.play(4, propsOf({ 'event.id': 'bell' }), onFinished);

      proc.emit('error', new Error('spawn fake-player ENOENT'));
      proc.close(-2);

      expect(onFinished).toHaveBeenCalledTimes(1);
      expect(onFinished).toHaveBeenCalledWith(4, SoundErrorCode.NOT_AVAILABLE);
    });

    it('should return INVALID when the player cannot be spawned with the arguments', () => {
      spawner.mockImplementation(() => {
        throw new TypeError("The argument 'args[0]' must be a string without null bytes");
      });
      const handle = createHandle(backend);
      const onFinished = vi.fn();

      expect(handle.play(8, propsOf({ 'event.id': 'bell\0x' }), onFinished)).toBe(
        SoundErrorCode.INVALID
      );
      expect(spawner).toHaveBeenCalledWith('fake-player', ['--id=bell\0x'], { PATH: '/bin' });
      expect(handle.runningCount).toBe(0);
      expect(onFinished).not.toHaveBeenCalled();
    });

    it('should refuse requests without a sound name', () => {
      const handle = createHandle(backend);
      expect(handle.play(1, propsOf({ 'media.role': 'event' }))).toBe(SoundErrorCode.INVALID);
      expect(spawner).not.toHaveBeenCalled();
    });

    it('should report an unknown driver when opening', () => {
      const handle = createHandle(backend);
      expect(handle.setDriver('bogus')).toBe(SoundErrorCode.SUCCESS);
      expect(handle.play(1, propsOf({ 'event.id': 'bell' }))).toBe(SoundErrorCode.NO_DRIVER);
      expect(spawner).not.toHaveBeenCalled();
    });
  });

  describe('open', () => {
    it('should open once and then refuse driver changes', () => {
      const handle = createHandle(backend);
      expect(handle.open()).toBe(SoundErrorCode.SUCCESS);
      expect(handle.open()).toBe(SoundErrorCode.STATE);
      expect(handle.setDriver('pulse')).toBe(SoundErrorCode.STATE);
    });
  });

  describe('cancel', () => {
    it('should kill the player and complete with CANCELED', () => {
      const handle = createHandle(backend);
      const onFinished = vi.fn();
      handle.play(5, propsOf({ 'event.id': 'bell' }), onFinished);

      expect(handle.cancel(5)).toBe(SoundErrorCode.SUCCESS);
      expect(proc.killedWith).toEqual(['SIGTERM']);

      proc.close(null, 'SIGTERM');
      expect(onFinished).toHaveBeenCalledWith(5, SoundErrorCode.CANCELED);
    });

    it('should accept ids with nothing running', () => {
      const handle = createHandle(backend);
      expect(handle.cancel(99)).toBe(SoundErrorCode.SUCCESS);
    });
  });

  describe('cache', () => {
    it('should remember cacheable event sounds', () => {
      const handle = createHandle(backend);

      expect(handle.cache(propsOf({ 'event.id': 'bell' }))).toBe(SoundErrorCode.SUCCESS);
      expect(handle.isCached('bell')).toBe(true);
      expect(handle.cache(propsOf({ 'media.filename': '/tmp/bell.oga' }))).toBe(
        SoundErrorCode.INVALID
      );
      expect(spawner).not.toHaveBeenCalled();
    });
  });

  describe('destroy', () => {
    it('should stop running players and complete them with DESTROYED', () => {
      const handle = createHandle(backend);
      const onFinished = vi.fn();
      handle.play(6, propsOf({ 'event.id': 'bell' }), onFinished);

      expect(handle.destroy()).toBe(SoundErrorCode.SUCCESS);
      expect(proc.killedWith).toEqual(['SIGTERM']);
      expect(onFinished).toHaveBeenCalledWith(6, SoundErrorCode.DESTROYED);
      expect(handle.runningCount).toBe(0);

      proc.close(null, 'SIGTERM');
      expect(onFinished).toHaveBeenCalledTimes(1);
    });

    it('should refuse everything afterwards', () => {
      const handle = createHandle(backend);
      handle.destroy();

      expect(handle.destroy()).toBe(SoundErrorCode.DESTROYED);
      expect(handle.play(1, propsOf({ 'event.id': 'bell' }))).toBe(SoundErrorCode.DESTROYED);
      expect(handle.cancel(1)).toBe(SoundErrorCode.DESTROYED);
    });
  });
});
