/**
 * Result codes shared by every backend and by SoundError
 *
 * The numbering follows libcanberra so that codes reported by the native
 * player can be passed through untouched.
 */

export const SoundErrorCode = {
  SUCCESS: 0,
  NOT_SUPPORTED: -1,
  INVALID: -2,
  STATE: -3,
  OOM: -4,
  NO_DRIVER: -5,
  SYSTEM: -6,
  CORRUPT: -7,
  TOO_BIG: -8,
  NOT_FOUND: -9,
  DESTROYED: -10,
  CANCELED: -11,
  NOT_AVAILABLE: -12,
  ACCESS: -13,
  IO: -14,
  INTERNAL: -15,
  DISABLED: -16,
  FORKED: -17,
  DISCONNECTED: -18,
} as const;

export type SoundErrorCode = (typeof SoundErrorCode)[keyof typeof SoundErrorCode];

/**
 * Any code other than SUCCESS
 */
export type SoundFailureCode = Exclude<SoundErrorCode, typeof SoundErrorCode.SUCCESS>;

const ERROR_TEXT: Record<SoundErrorCode, string> = {
  [SoundErrorCode.SUCCESS]: 'Success',
  [SoundErrorCode.NOT_SUPPORTED]: 'Operation not supported',
  [SoundErrorCode.INVALID]: 'Invalid argument',
  [SoundErrorCode.STATE]: 'Invalid state',
  [SoundErrorCode.OOM]: 'Out of memory',
  [SoundErrorCode.NO_DRIVER]: 'No such driver',
  [SoundErrorCode.SYSTEM]: 'System error',
  [SoundErrorCode.CORRUPT]: 'File or data corrupt',
  [SoundErrorCode.TOO_BIG]: 'File or data too large',
  [SoundErrorCode.NOT_FOUND]: 'File or data not found',
  [SoundErrorCode.DESTROYED]: 'Destroyed',
  [SoundErrorCode.CANCELED]: 'Canceled',
  [SoundErrorCode.NOT_AVAILABLE]: 'Not available',
  [SoundErrorCode.ACCESS]: 'Access forbidden',
  [SoundErrorCode.IO]: 'IO error',
  [SoundErrorCode.INTERNAL]: 'Internal error',
  [SoundErrorCode.DISABLED]: 'Sound disabled',
  [SoundErrorCode.FORKED]: 'Process forked',
  [SoundErrorCode.DISCONNECTED]: 'Disconnected',
};

const ALL_CODES = Object.values(SoundErrorCode);

/**
 * Narrow an arbitrary number to a known code
 */
export function isSoundErrorCode(value: number): value is SoundErrorCode {
  return ALL_CODES.some((code) => code === value);
}

/**
 * Human readable text for a result code
 */
export function describeErrorCode(code: number): string {
  return isSoundErrorCode(code) ? ERROR_TEXT[code] : 'Unknown error';
}

/**
 * Reverse lookup of describeErrorCode(), used to recover a code from the
 * text printed by the native player
 */
export function codeFromErrorText(text: string): SoundErrorCode | null {
  const needle = text.trim();
  for (const code of ALL_CODES) {
    if (ERROR_TEXT[code] === needle) {
      return code;
    }
  }
  return null;
}
