/**
 * sound-events
 *
 * Event sound playback with async completion, attribute management and
 * cancellation
 *
 * @packageDocumentation
 */

// Main context
export { SoundContext, PlayTask } from './context';
export type { PlayTaskOutcome } from './context';

// Attributes
export { SoundAttr, fromAttributeList, fromAttributeMap, marshalAttributes } from './attributes';
export type { SoundAttrName } from './attributes';

// Backends
export {
  PropList,
  CanberraBackend,
  CanberraHandle,
  MemoryBackend,
  MemoryHandle,
  KNOWN_DRIVERS,
} from './backend';
export type {
  BackendCall,
  BackendCreateResult,
  BackendHandle,
  BackendOperation,
  CanberraBackendOptions,
  MemoryBackendOptions,
  PlayCompletionCallback,
  SoundBackend,
  SpawnedProcess,
  Spawner,
} from './backend';

// Types
export type {
  AttributeList,
  AttributeMap,
  AttributeInput,
  ContextState,
  SoundContextOptions,
  PlayOptions,
  PlayFullOptions,
  PlayReadyCallback,
  PlayMode,
  SoundContextEvents,
  SoundFailureCode,
} from './types';

// Errors and codes
export {
  SoundErrorCode,
  describeErrorCode,
  SoundError,
  SubmissionError,
  PlaybackError,
  InvalidArgumentError,
  MarshalError,
  isSoundError,
} from './types';

// Utilities
export { SDKLogger, Logger, createLogger } from './utils/logger';
export type { LogLevel, LogEntry, LoggerConfig } from './utils/logger';
