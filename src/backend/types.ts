/**
 * Backend contract
 *
 * A backend owns the connection to the platform sound service. Every call
 * reports a result code; play() reports whether the request was accepted and,
 * when given a callback, reports the final outcome through it exactly once.
 */

import type { SoundErrorCode, SoundFailureCode } from '../types/codes';
import type { PropList } from './PropList';

/**
 * Receives the request id given to play() and the final result code.
 * May run before play() has returned.
 */
export type PlayCompletionCallback = (id: number, code: SoundErrorCode) => void;

export type BackendCreateResult =
  | { code: 0; handle: BackendHandle }
  | { code: SoundFailureCode; handle?: undefined };

export interface SoundBackend {
  /** Driver family name, for logging */
  readonly name: string;
  create(): BackendCreateResult;
  errorText(code: number): string;
}

export interface BackendHandle {
  open(): SoundErrorCode;
  setDriver(driver: string): SoundErrorCode;
  /** Merge properties into the handle's own set */
  changeProps(props: PropList): SoundErrorCode;
  play(id: number, props: PropList, onFinished?: PlayCompletionCallback): SoundErrorCode;
  cache(props: PropList): SoundErrorCode;
  cancel(id: number): SoundErrorCode;
  destroy(): SoundErrorCode;
}
