/**
 * Context Module
 *
 * Playback session coordination: one backend handle, fire-and-forget and
 * awaitable plays, cancellation and caching
 */

export { SoundContext } from './SoundContext';
export { PlayTask } from './PlayTask';
export type { PlayTaskOutcome } from './PlayTask';
