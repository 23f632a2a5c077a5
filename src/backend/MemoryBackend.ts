/**
 * MemoryBackend - in-process backend that plays nothing
 *
 * Records every call together with a snapshot of the properties it was
 * given. Failures can be scripted per operation, and completions are either
 * delivered by hand through `complete()` or automatically on a microtask.
 * Useful wherever sound output is unwanted, tests in particular.
 */

import type { BackendCreateResult, BackendHandle, PlayCompletionCallback, SoundBackend } from './types';
import { PropList } from './PropList';
import { checkCacheable, checkDriverChange, checkDriverOpen, checkPlayable } from './checks';
import { SoundErrorCode, describeErrorCode } from '../types/codes';
import type { SoundFailureCode } from '../types/codes';
import { SoundAttr } from '../attributes/attrs';

export type BackendOperation =
  | 'create'
  | 'open'
  | 'setDriver'
  | 'changeProps'
  | 'play'
  | 'cache'
  | 'cancel'
  | 'destroy';

export interface BackendCall {
  operation: BackendOperation;
  /** Code the call returned */
  code: SoundErrorCode;
  id?: number;
  driver?: string;
  /** Snapshot of the request properties */
  props?: Array<[string, string]>;
  /** The list itself, to check it was released after the call */
  propList?: PropList;
  hasCallback?: boolean;
}

export interface MemoryBackendOptions {
  /**
   * Complete accepted plays on a microtask with this code.
   * Off by default: tests call `complete()` themselves.
   */
  autoComplete?: SoundErrorCode | false;
}

export class MemoryBackend implements SoundBackend {
  readonly name = 'memory';
  readonly calls: BackendCall[] = [];
  readonly handles: MemoryHandle[] = [];
  private readonly failures = new Map<BackendOperation, SoundFailureCode>();

  constructor(private readonly options: MemoryBackendOptions = {}) {}

  /**
   * Make the next call of `operation` fail with `code`
   */
  failNext(operation: BackendOperation, code: SoundFailureCode): this {
    this.failures.set(operation, code);
    return this;
  }

  consumeFailure(operation: BackendOperation): SoundFailureCode | undefined {
    const code = this.failures.get(operation);
    this.failures.delete(operation);
    return code;
  }

  record(call: BackendCall): BackendCall {
    this.calls.push(call);
    return call;
  }

  callsOf(operation: BackendOperation): BackendCall[] {
    return this.calls.filter((call) => call.operation === operation);
  }

  get lastHandle(): MemoryHandle | undefined {
    return this.handles[this.handles.length - 1];
  }

  create(): BackendCreateResult {
    const failure = this.consumeFailure('create');
    if (failure !== undefined) {
      this.record({ operation: 'create', code: failure });
      return { code: failure };
    }

    const handle = new MemoryHandle(this, this.options.autoComplete ?? false);
    this.handles.push(handle);
    this.record({ operation: 'create', code: SoundErrorCode.SUCCESS });
    return { code: SoundErrorCode.SUCCESS, handle };
  }

  errorText(code: number): string {
    return describeErrorCode(code);
  }
}

export class MemoryHandle implements BackendHandle {
  readonly props = new PropList();
  readonly cached = new Set<string>();
  destroyCount = 0;

  private driver: string | null = null;
  private opened = false;
  private destroyed = false;
  private readonly pending = new Map<number, PlayCompletionCallback | null>();

  constructor(
    private readonly backend: MemoryBackend,
    private readonly autoComplete: SoundErrorCode | false
  ) {}

  get isOpen(): boolean {
    return this.opened;
  }

  get currentDriver(): string | null {
    return this.driver;
  }

  get pendingIds(): number[] {
    return [...this.pending.keys()];
  }

  /**
   * Finish a request with `code`. Returns false when nothing was pending
   * under `id`.
   */
  complete(id: number, code: SoundErrorCode = SoundErrorCode.SUCCESS): boolean {
    if (!this.pending.has(id)) {
      return false;
    }
    const callback = this.pending.get(id);
    this.pending.delete(id);
    callback?.(id, code);
    return true;
  }

  open(): SoundErrorCode {
    const call = this.backend.record({ operation: 'open', code: SoundErrorCode.SUCCESS });
    call.code = this.guard('open') ?? (this.opened ? SoundErrorCode.STATE : this.openNow());
    return call.code;
  }

  setDriver(driver: string): SoundErrorCode {
    const call = this.backend.record({ operation: 'setDriver', driver, code: SoundErrorCode.SUCCESS });
    call.code = this.guard('setDriver') ?? checkDriverChange(driver, this.opened);
    if (call.code === SoundErrorCode.SUCCESS) {
      this.driver = driver;
    }
    return call.code;
  }

  changeProps(props: PropList): SoundErrorCode {
    const call = this.backend.record({
      operation: 'changeProps',
      props: props.entries(),
      propList: props,
      code: SoundErrorCode.SUCCESS,
    });
    call.code = this.guard('changeProps') ?? this.props.merge(props);
    return call.code;
  }

  play(id: number, props: PropList, onFinished?: PlayCompletionCallback): SoundErrorCode {
    const call = this.backend.record({
      operation: 'play',
      id,
      props: props.entries(),
      propList: props,
      hasCallback: onFinished !== undefined,
      code: SoundErrorCode.SUCCESS,
    });

    const code = this.guard('play') ?? this.ensureOpen();
    call.code = code === SoundErrorCode.SUCCESS ? checkPlayable(this.props, props) : code;
    if (call.code !== SoundErrorCode.SUCCESS) {
      return call.code;
    }

    this.pending.set(id, onFinished ?? null);
    const autoComplete = this.autoComplete;
    if (autoComplete !== false) {
      queueMicrotask(() => {
        this.complete(id, autoComplete);
      });
    }
    return call.code;
  }

  cache(props: PropList): SoundErrorCode {
    const call = this.backend.record({
      operation: 'cache',
      props: props.entries(),
      propList: props,
      code: SoundErrorCode.SUCCESS,
    });

    const code = this.guard('cache') ?? this.ensureOpen();
    call.code = code === SoundErrorCode.SUCCESS ? checkCacheable(props) : code;
    const eventId = props.get(SoundAttr.EVENT_ID);
    if (call.code === SoundErrorCode.SUCCESS && eventId !== undefined) {
      this.cached.add(eventId);
    }
    return call.code;
  }

  cancel(id: number): SoundErrorCode {
    const call = this.backend.record({ operation: 'cancel', id, code: SoundErrorCode.SUCCESS });
    call.code = this.guard('cancel') ?? SoundErrorCode.SUCCESS;
    if (call.code === SoundErrorCode.SUCCESS) {
      this.complete(id, SoundErrorCode.CANCELED);
    }
    return call.code;
  }

  destroy(): SoundErrorCode {
    this.destroyCount++;
    const call = this.backend.record({ operation: 'destroy', code: SoundErrorCode.SUCCESS });
    if (this.destroyed) {
      call.code = SoundErrorCode.DESTROYED;
      return call.code;
    }

    this.destroyed = true;
    for (const id of this.pendingIds) {
      this.complete(id, SoundErrorCode.DESTROYED);
    }
    this.props.destroy();
    return call.code;
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  /**
   * Code for a destroyed handle or a scripted failure, if either applies
   */
  private guard(operation: BackendOperation): SoundErrorCode | undefined {
    if (this.destroyed) {
      return SoundErrorCode.DESTROYED;
    }
    return this.backend.consumeFailure(operation);
  }

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
}
