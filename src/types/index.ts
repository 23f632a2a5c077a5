/**
 * Core type definitions for sound-events
 */

// ============================================================================
// Result Codes (re-exported from codes.ts)
// ============================================================================

export { SoundErrorCode, describeErrorCode, isSoundErrorCode, codeFromErrorText } from './codes';
export type { SoundFailureCode } from './codes';

// ============================================================================
// Attribute Types (re-exported from attributes.ts)
// ============================================================================

export type { AttributeList, AttributeMap, AttributeInput } from './attributes';
export { isAttributeList } from './attributes';

// ============================================================================
// Context Types (re-exported from context.ts)
// ============================================================================

export type {
  ContextState,
  SoundContextOptions,
  PlayOptions,
  PlayFullOptions,
  PlayReadyCallback,
  PlayMode,
  SoundContextEvents,
} from './context';

// ============================================================================
// Error Types (re-exported from errors.ts)
// ============================================================================

export {
  SoundError,
  SubmissionError,
  PlaybackError,
  InvalidArgumentError,
  MarshalError,
  isSoundError,
} from './errors';
