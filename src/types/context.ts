/**
 * SoundContext types and interfaces
 */

import type { AttributeMap } from './attributes';
import type { SoundError } from './errors';
import type { SoundBackend } from '../backend/types';
import type { PlayTask } from '../context/PlayTask';
import type { SoundContext } from '../context/SoundContext';

/**
 * Context lifecycle state
 */
export type ContextState = 'uninitialized' | 'open' | 'failed' | 'destroyed';

/**
 * Context configuration
 */
export interface SoundContextOptions {
  /** Backend to drive; a CanberraBackend when omitted */
  backend?: SoundBackend;
  /** Written as `application.name` on initialization */
  applicationName?: string;
  /** Written as `application.id` on initialization */
  applicationId?: string;
  /** Backend driver, chosen before anything opens */
  driver?: string;
  /** Context-level attributes applied on initialization */
  attributes?: AttributeMap;
  /** Enable debug logging */
  debug?: boolean;
}

export interface PlayOptions {
  /** Aborting forwards a cancel request to the backend */
  signal?: AbortSignal;
}

export type PlayReadyCallback = (context: SoundContext, task: PlayTask) => void;

export interface PlayFullOptions extends PlayOptions {
  /** Runs asynchronously once the task has settled */
  callback?: PlayReadyCallback;
}

export type PlayMode = 'simple' | 'full';

/**
 * Context events
 */
export type SoundContextEvents = {
  /** Lifecycle state changed */
  statechange: ContextState;
  /** Backend accepted a play request */
  submitted: { id: number; mode: PlayMode };
  /** Awaitable play settled */
  finished: { id: number; error: SoundError | null };
  /** Cancellation forwarded to the backend */
  cancelled: { id: number };
  /** Backend handle released */
  destroyed: undefined;
};
