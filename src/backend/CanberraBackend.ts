/**
 * CanberraBackend - plays event sounds through the `canberra-gtk-play` command
 *
 * Every play request runs one player process. The process exit status is the
 * completion code: a clean exit is SUCCESS, a failure is mapped back from
 * the "Failed to play sound: <text>" line the player prints on stderr.
 */

import { spawn } from 'child_process';
import type { BackendCreateResult, BackendHandle, PlayCompletionCallback, SoundBackend } from './types';
import { PropList } from './PropList';
import { checkCacheable, checkDriverChange, checkDriverOpen, checkPlayable } from './checks';
import { SoundErrorCode, codeFromErrorText, describeErrorCode } from '../types/codes';
import { SoundAttr } from '../attributes/attrs';
import { SDKLogger } from '../utils/logger';

const logger = SDKLogger.child('CanberraBackend');

const FAILURE_PREFIX = 'Failed to play sound:';

/**
 * The part of a child process the backend relies on
 */
export interface SpawnedProcess {
  readonly stderr: NodeJS.ReadableStream | null;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
  kill(signal?: NodeJS.Signals): boolean;
}

export type Spawner = (
  command: string,
  args: readonly string[],
  env: NodeJS.ProcessEnv
) => SpawnedProcess;

export interface CanberraBackendOptions {
  /** Player command, `canberra-gtk-play` by default */
  command?: string;
  /** Process launcher, `child_process.spawn` by default */
  spawner?: Spawner;
  /** Base environment for player processes */
  env?: NodeJS.ProcessEnv;
}

const defaultSpawner: Spawner = (command, args, env) =>
  spawn(command, [...args], { env, stdio: ['ignore', 'ignore', 'pipe'] });

/**
 * Properties that have a dedicated player flag
 */
const FLAG_FOR_PROPERTY: Record<string, string> = {
  [SoundAttr.EVENT_ID]: '--id',
  [SoundAttr.MEDIA_FILENAME]: '--file',
  [SoundAttr.EVENT_DESCRIPTION]: '--description',
  [SoundAttr.CANBERRA_CACHE_CONTROL]: '--cache-control',
  [SoundAttr.CANBERRA_VOLUME]: '--volume',
};

/**
 * Command line for one request; request properties override handle ones
 */
export function buildPlayerArgs(handleProps: PropList, props: PropList): string[] {
  const merged = handleProps.clone();
  merged.merge(props);

  const args: string[] = [];
  for (const [key, value] of merged.entries()) {
    const flag = FLAG_FOR_PROPERTY[key];
    args.push(flag ? `${flag}=${value}` : `--property=${key}=${value}`);
  }
  merged.destroy();
  return args;
}

/**
 * Completion code for a finished player process
 */
export function exitCodeToResult(
  code: number | null,
  signal: NodeJS.Signals | null,
  stderr: string,
  cancelled: boolean
): SoundErrorCode {
  if (cancelled && signal !== null) {
    return SoundErrorCode.CANCELED;
  }
  if (code === 0) {
    return SoundErrorCode.SUCCESS;
  }

  const failureLine = stderr.split('\n').find((line) => line.startsWith(FAILURE_PREFIX));
  if (failureLine) {
    return codeFromErrorText(failureLine.slice(FAILURE_PREFIX.length)) ?? SoundErrorCode.SYSTEM;
  }
  return SoundErrorCode.SYSTEM;
}

interface RunningRequest {
  process: SpawnedProcess;
  cancelled: boolean;
  settle: (code: SoundErrorCode) => void;
}

export class CanberraBackend implements SoundBackend {
  readonly name = 'canberra';
  private readonly command: string;
  private readonly spawner: Spawner;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: CanberraBackendOptions = {}) {
    this.command = options.command ?? 'canberra-gtk-play';
    this.spawner = options.spawner ?? defaultSpawner;
    this.env = options.env ?? process.env;
  }

  create(): BackendCreateResult {
    return {
      code: SoundErrorCode.SUCCESS,
      handle: new CanberraHandle(this.command, this.spawner, this.env),
    };
  }

  errorText(code: number): string {
    return describeErrorCode(code);
  }
}

export class CanberraHandle implements BackendHandle {
  private readonly props = new PropList();
  private readonly cached = new Set<string>();
  private readonly running = new Map<number, Set<RunningRequest>>();
  private driver: string | null = null;
  private opened = false;
  private destroyed = false;

  constructor(
    private readonly command: string,
    private readonly spawner: Spawner,
    private readonly env: NodeJS.ProcessEnv
  ) {}

  open(): SoundErrorCode {
    if (this.destroyed) {
      return SoundErrorCode.DESTROYED;
    }
    if (this.opened) {
      return SoundErrorCode.STATE;
    }
    return this.openNow();
  }

  setDriver(driver: string): SoundErrorCode {
    if (this.destroyed) {
      return SoundErrorCode.DESTROYED;
    }
    const code = checkDriverChange(driver, this.opened);
    if (code === SoundErrorCode.SUCCESS) {
      this.driver = driver;
    }
    return code;
  }

  changeProps(props: PropList): SoundErrorCode {
    if (this.destroyed) {
      return SoundErrorCode.DESTROYED;
    }
    return this.props.merge(props);
  }

  play(id: number, props: PropList, onFinished?: PlayCompletionCallback): SoundErrorCode {
    if (this.destroyed) {
      return SoundErrorCode.DESTROYED;
    }
    const opened = this.ensureOpen();
    if (opened !== SoundErrorCode.SUCCESS) {
      return opened;
    }
    const playable = checkPlayable(this.props, props);
    if (playable !== SoundErrorCode.SUCCESS) {
      return playable;
    }

    const args = buildPlayerArgs(this.props, props);
    const env = this.driver === null ? this.env : { ...this.env, CANBERRA_DRIVER: this.driver };
    let child: SpawnedProcess;
    try {
      child = this.spawner(this.command, args, env);
    } catch (error) {
      // spawn() throws synchronously for arguments it cannot pass, such as NUL bytes
      logger.warn('Player could not be spawned', {
        id,
        command: this.command,
        error: error instanceof Error ? error.message : String(error),
      });
      return SoundErrorCode.INVALID;
    }
    logger.debug('Spawned player', { id, command: this.command, args });

    let stderr = '';
    child.stderr?.setEncoding('utf-8');
    child.stderr?.on('data', (chunk: string | Buffer) => {
      stderr += chunk.toString();
    });

    let settled = false;
    const request: RunningRequest = {
      process: child,
      cancelled: false,
      settle: (code) => {
        if (settled) return;
        settled = true;
        this.forget(id, request);
        logger.debug('Player finished', { id, code });
        onFinished?.(id, code);
      },
    };
    this.track(id, request);

    child.once('close', (code, signal) => {
      request.settle(exitCodeToResult(code, signal, stderr, request.cancelled));
    });
    child.once('error', (error) => {
      logger.warn('Player could not be started', { id, command: this.command, error: error.message });
      request.settle(SoundErrorCode.NOT_AVAILABLE);
    });

    return SoundErrorCode.SUCCESS;
  }

  /**
   * The player keeps no sample cache, so a cache request is checked and
   * remembered only
   */
  cache(props: PropList): SoundErrorCode {
    if (this.destroyed) {
      return SoundErrorCode.DESTROYED;
    }
    const opened = this.ensureOpen();
    if (opened !== SoundErrorCode.SUCCESS) {
      return opened;
    }
    const code = checkCacheable(props);
    const eventId = props.get(SoundAttr.EVENT_ID);
    if (code === SoundErrorCode.SUCCESS && eventId !== undefined) {
      this.cached.add(eventId);
    }
    return code;
  }

  cancel(id: number): SoundErrorCode {
    if (this.destroyed) {
      return SoundErrorCode.DESTROYED;
    }
    for (const request of this.running.get(id) ?? []) {
      request.cancelled = true;
      request.process.kill('SIGTERM');
    }
    return SoundErrorCode.SUCCESS;
  }

  destroy(): SoundErrorCode {
    if (this.destroyed) {
      return SoundErrorCode.DESTROYED;
    }
    this.destroyed = true;

    for (const requests of [...this.running.values()]) {
      for (const request of [...requests]) {
        request.process.kill('SIGTERM');
        request.settle(SoundErrorCode.DESTROYED);
      }
    }
    this.props.destroy();
    return SoundErrorCode.SUCCESS;
  }

  isCached(eventId: string): boolean {
    return this.cached.has(eventId);
  }

  get runningCount(): number {
    let count = 0;
    for (const requests of this.running.values()) {
      count += requests.size;
    }
    return count;
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private ensureOpen(): SoundErrorCode {
    return this.opened ? SoundErrorCode.SUCCESS : this.openNow();
  }

  private openNow(): SoundErrorCode {
    const code = checkDriverOpen(this.driver);
    if (code === SoundErrorCode.SUCCESS) {
      this.opened = true;
    }
    return code;
  }

  private track(id: number, request: RunningRequest): void {
    const requests = this.running.get(id) ?? new Set<RunningRequest>();
    requests.add(request);
    this.running.set(id, requests);
  }

  private forget(id: number, request: RunningRequest): void {
    const requests = this.running.get(id);
    if (!requests) return;
    requests.delete(request);
    if (requests.size === 0) {
      this.running.delete(id);
    }
  }
}
