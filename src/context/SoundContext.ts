/**
 * SoundContext - plays event sounds through one backend handle
 *
 * Features:
 * - Two-phase construction (`new` + `init()`, or `SoundContext.create()`)
 * - Context-level attributes applied to every later request
 * - Fire-and-forget plays and awaitable plays backed by PlayTask
 * - AbortSignal cancellation forwarded to the backend
 * - Sample caching
 *
 * @example
 * ```typescript
 * const ctx = SoundContext.create({ applicationName: 'mail-notifier' });
 *
 * // Fire and forget
 * ctx.playSimple({ [SoundAttr.EVENT_ID]: 'message-new-email' });
 *
 * // Wait for the sound to finish, giving up after two seconds
 * await ctx.play([SoundAttr.EVENT_ID, 'bell'], { signal: AbortSignal.timeout(2000) });
 * ```
 */

import type { BackendHandle, SoundBackend } from '../backend/types';
import { CanberraBackend } from '../backend/CanberraBackend';
import { PropList } from '../backend/PropList';
import { marshalAttributes, fromAttributeMap } from '../attributes/marshal';
import { SoundAttr } from '../attributes/attrs';
import { PlayTask } from './PlayTask';
import type { AttributeInput } from '../types/attributes';
import type {
  ContextState,
  PlayFullOptions,
  PlayOptions,
  SoundContextEvents,
  SoundContextOptions,
} from '../types/context';
import { SoundErrorCode } from '../types/codes';
import {
  InvalidArgumentError,
  PlaybackError,
  SoundError,
  SubmissionError,
  isSoundError,
} from '../types/errors';
import { EventEmitter } from '../utils/events';
import { SDKLogger } from '../utils/logger';
import { validate } from '../utils/validation';
import { DriverNameSchema, SoundContextOptionsSchema } from '../utils/validators';

const logger = SDKLogger.child('SoundContext');

/** Request ids are unsigned 32-bit values; 0 is never handed out */
const MAX_REQUEST_ID = 0xffffffff;

export class SoundContext extends EventEmitter<SoundContextEvents> {
  private readonly options: SoundContextOptions;
  private readonly backend: SoundBackend;
  private handle: BackendHandle | null = null;
  private currentState: ContextState = 'uninitialized';
  private initError: SoundError | null = null;
  private nextRequestId = 1;

  // Abort listeners by request id, removed on completion or destroy
  private readonly cancelBindings = new Map<number, () => void>();
  private readonly pendingTasks = new Map<number, PlayTask>();

  constructor(options: SoundContextOptions = {}) {
    super();
    validate(SoundContextOptionsSchema, options, 'SoundContextOptions');

    this.options = options;
    this.backend = options.backend ?? new CanberraBackend();

    if (options.debug) {
      SDKLogger.enable();
      SDKLogger.setLevel('debug');
    }
  }

  /**
   * Create and initialize a context
   *
   * @throws SubmissionError if the backend cannot be set up
   */
  static create(options?: SoundContextOptions): SoundContext {
    const context = new SoundContext(options);
    context.init();
    return context;
  }

  get state(): ContextState {
    return this.currentState;
  }

  /**
   * Create the backend handle and apply the configured driver and
   * attributes. Does nothing on an open context; a failed context
   * rethrows its original error.
   */
  init(): void {
    if (this.currentState === 'open') {
      return;
    }
    if (this.currentState === 'destroyed') {
      throw this.stateError();
    }
    if (this.initError !== null) {
      throw this.initError;
    }

    const created = this.backend.create();
    if (created.code !== SoundErrorCode.SUCCESS) {
      throw this.recordInitFailure(
        new SubmissionError(this.backend.errorText(created.code), created.code, {
          operation: 'create',
        })
      );
    }

    const handle = created.handle;
    try {
      this.configureHandle(handle);
    } catch (error) {
      if (!isSoundError(error)) {
        throw error;
      }
      handle.destroy();
      throw this.recordInitFailure(error);
    }

    this.handle = handle;
    this.setState('open');
    logger.debug('Initialized', { backend: this.backend.name });
  }

  /**
   * Open the output device now instead of on the first play
   */
  open(): void {
    const handle = this.requireHandle();
    this.check(handle.open(), 'open');
  }

  /**
   * Choose the backend driver; only possible before the device opens
   */
  setDriver(driver: string): void {
    validate(DriverNameSchema, driver, 'driver');
    const handle = this.requireHandle();
    this.check(handle.setDriver(driver), 'setDriver');
  }

  /**
   * Merge attributes into the set applied to every later request
   */
  changeAttrs(attrs: AttributeInput): void {
    const handle = this.requireHandle();
    this.withPropList(attrs, 'changeAttrs', (props) => handle.changeProps(props));
  }

  /**
   * Ask the backend to keep a sound ready for low-latency playback
   */
  cache(attrs: AttributeInput): void {
    const handle = this.requireHandle();
    this.withPropList(attrs, 'cache', (props) => handle.cache(props));
  }

  /**
   * Submit a sound and return once the backend has accepted it
   *
   * Nothing reports when a fire-and-forget play ends, so the abort listener
   * added for `options.signal` stays registered until the signal aborts or
   * the context is destroyed. Reusing one long-lived signal for many plays
   * adds one listener per play.
   *
   * @returns The request id
   * @throws InvalidArgumentError | MarshalError for bad attributes
   * @throws SubmissionError if the backend refuses the request
   */
  playSimple(attrs: AttributeInput, options: PlayOptions = {}): number {
    const handle = this.requireHandle();
    const props = new PropList();
    try {
      marshalAttributes(attrs, props);

      const id = this.allocateRequestId();
      this.check(handle.play(id, props), 'play');
      this.bindCancellation(handle, id, options.signal);
      this.emit('submitted', { id, mode: 'simple' });
      return id;
    } finally {
      props.destroy();
    }
  }

  /**
   * Submit a sound and get a task that settles when it has finished playing
   *
   * Never throws: every failure, including bad attributes or an unusable
   * context, settles the returned task.
   */
  playFull(attrs: AttributeInput, options: PlayFullOptions = {}): PlayTask {
    const task = new PlayTask(this.allocateRequestId(), this, options.signal);
    this.pendingTasks.set(task.id, task);

    const callback = options.callback;
    if (callback) {
      void task
        .outcomePromise()
        .then(() => callback(this, task))
        .catch((error: unknown) => {
          logger.error('Play callback failed', { id: task.id, error });
        });
    }

    const handle = this.handle;
    if (handle === null) {
      this.settleTask(task, this.stateError());
      return task;
    }

    const props = new PropList();
    try {
      marshalAttributes(attrs, props);

      const code = handle.play(task.id, props, (_id, result) => this.onPlayFinished(task, result));
      if (code !== SoundErrorCode.SUCCESS) {
        this.settleTask(
          task,
          new SubmissionError(this.backend.errorText(code), code, { operation: 'play', id: task.id })
        );
        return task;
      }

      this.emit('submitted', { id: task.id, mode: 'full' });
      if (!task.completed) {
        this.bindCancellation(handle, task.id, options.signal);
      }
    } catch (error) {
      this.settleTask(task, isSoundError(error) ? error : this.unexpectedError(error, task.id));
    } finally {
      props.destroy();
    }

    return task;
  }

  /**
   * Wait for a task returned by playFull()
   *
   * @throws InvalidArgumentError if the task belongs to another context
   */
  async playFullFinish(task: PlayTask): Promise<void> {
    if (!task.isOwnedBy(this)) {
      throw new InvalidArgumentError('Task was not created by this context', undefined, {
        id: task.id,
      });
    }
    await task.wait();
  }

  /**
   * playFull() followed by playFullFinish()
   */
  play(attrs: AttributeInput, options: PlayOptions = {}): Promise<void> {
    return this.playFullFinish(this.playFull(attrs, options));
  }

  /**
   * Release the backend handle. Safe to call more than once.
   */
  destroy(): void {
    if (this.currentState === 'destroyed') {
      return;
    }

    for (const unbind of this.cancelBindings.values()) {
      unbind();
    }
    this.cancelBindings.clear();

    const handle = this.handle;
    this.handle = null;
    if (handle !== null) {
      const code = handle.destroy();
      if (code !== SoundErrorCode.SUCCESS) {
        logger.warn('Backend reported an error while destroying', {
          code,
          text: this.backend.errorText(code),
        });
      }
    }

    for (const task of [...this.pendingTasks.values()]) {
      this.settleTask(
        task,
        new PlaybackError('Context destroyed before the sound finished', SoundErrorCode.DESTROYED, {
          id: task.id,
        })
      );
    }

    this.setState('destroyed');
    this.emit('destroyed', undefined);
    logger.debug('Destroyed');
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private configureHandle(handle: BackendHandle): void {
    if (this.options.driver !== undefined) {
      this.check(handle.setDriver(this.options.driver), 'setDriver');
    }

    const props = new PropList();
    try {
      if (this.options.applicationName !== undefined) {
        props.set(SoundAttr.APPLICATION_NAME, this.options.applicationName);
      }
      if (this.options.applicationId !== undefined) {
        props.set(SoundAttr.APPLICATION_ID, this.options.applicationId);
      }
      if (this.options.attributes !== undefined) {
        fromAttributeMap(this.options.attributes, props);
      }
      this.check(handle.changeProps(props), 'changeProps');
    } finally {
      props.destroy();
    }
  }

  private recordInitFailure(error: SoundError): SoundError {
    this.initError = error;
    this.setState('failed');
    logger.error('Initialization failed', error.toJSON());
    return error;
  }

  private withPropList(
    attrs: AttributeInput,
    operation: string,
    submit: (props: PropList) => SoundErrorCode
  ): void {
    const props = new PropList();
    try {
      marshalAttributes(attrs, props);
      this.check(submit(props), operation);
    } finally {
      props.destroy();
    }
  }

  private unexpectedError(error: unknown, id: number): SoundError {
    logger.error('Unexpected failure while submitting', { id, error });
    const message = error instanceof Error ? error.message : String(error);
    return new SoundError(message, SoundErrorCode.INTERNAL, error, { operation: 'play', id });
  }

  private onPlayFinished(task: PlayTask, code: SoundErrorCode): void {
    const error =
      code === SoundErrorCode.SUCCESS
        ? null
        : new PlaybackError(this.backend.errorText(code), code, { id: task.id });
    this.settleTask(task, error);
  }

  private settleTask(task: PlayTask, error: SoundError | null): void {
    if (!task.settle(error)) {
      return;
    }
    this.pendingTasks.delete(task.id);
    this.unbindCancellation(task.id);
    logger.debug('Play finished', { id: task.id, code: error?.code ?? SoundErrorCode.SUCCESS });
    this.emit('finished', { id: task.id, error });
  }

  private bindCancellation(handle: BackendHandle, id: number, signal?: AbortSignal): void {
    if (!signal) {
      return;
    }

    const onAbort = (): void => {
      this.unbindCancellation(id);
      const code = handle.cancel(id);
      if (code !== SoundErrorCode.SUCCESS) {
        logger.warn('Backend refused to cancel', { id, code, text: this.backend.errorText(code) });
        return;
      }
      this.emit('cancelled', { id });
    };

    if (signal.aborted) {
      onAbort();
      return;
    }

    signal.addEventListener('abort', onAbort, { once: true });
    this.cancelBindings.set(id, () => signal.removeEventListener('abort', onAbort));
  }

  private unbindCancellation(id: number): void {
    const unbind = this.cancelBindings.get(id);
    if (unbind) {
      this.cancelBindings.delete(id);
      unbind();
    }
  }

  private allocateRequestId(): number {
    const id = this.nextRequestId;
    this.nextRequestId = id >= MAX_REQUEST_ID ? 1 : id + 1;
    return id;
  }

  private requireHandle(): BackendHandle {
    if (this.handle === null) {
      throw this.stateError();
    }
    return this.handle;
  }

  private stateError(): SubmissionError {
    if (this.currentState === 'destroyed') {
      return new SubmissionError('Context has been destroyed', SoundErrorCode.DESTROYED);
    }
    return new SubmissionError('Context is not initialized', SoundErrorCode.STATE, {
      state: this.currentState,
    });
  }

  private check(code: SoundErrorCode, operation: string): void {
    if (code !== SoundErrorCode.SUCCESS) {
      throw new SubmissionError(this.backend.errorText(code), code, { operation });
    }
  }

  private setState(state: ContextState): void {
    if (this.currentState === state) {
      return;
    }
    this.currentState = state;
    this.emit('statechange', state);
  }
}
