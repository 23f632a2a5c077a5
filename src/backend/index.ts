/**
 * Backend Module
 *
 * The backend contract, the property list it consumes, and the bundled
 * backends
 */

export { PropList } from './PropList';
export { CanberraBackend, CanberraHandle, buildPlayerArgs, exitCodeToResult } from './CanberraBackend';
export type { CanberraBackendOptions, SpawnedProcess, Spawner } from './CanberraBackend';
export { MemoryBackend, MemoryHandle } from './MemoryBackend';
export type { BackendCall, BackendOperation, MemoryBackendOptions } from './MemoryBackend';
export { KNOWN_DRIVERS } from './checks';
export type {
  BackendCreateResult,
  BackendHandle,
  PlayCompletionCallback,
  SoundBackend,
} from './types';
