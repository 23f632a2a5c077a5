/**
 * Request checks shared by every backend
 */

import { SoundErrorCode } from '../types/codes';
import { CacheControlSchema } from '../utils/validators';
import { SoundAttr } from '../attributes/attrs';
import type { PropList } from './PropList';

/**
 * Drivers a backend may be pointed at
 */
export const KNOWN_DRIVERS = ['pulse', 'alsa', 'oss', 'gstreamer', 'null', 'multi'] as const;

export function isKnownDriver(driver: string): boolean {
  return KNOWN_DRIVERS.some((known) => known === driver);
}

/**
 * A driver may only be chosen before the handle opens
 */
export function checkDriverChange(driver: string, opened: boolean): SoundErrorCode {
  if (opened) {
    return SoundErrorCode.STATE;
  }
  if (driver.length === 0) {
    return SoundErrorCode.INVALID;
  }
  return SoundErrorCode.SUCCESS;
}

/**
 * Unknown drivers are reported when the handle opens
 */
export function checkDriverOpen(driver: string | null): SoundErrorCode {
  if (driver !== null && !isKnownDriver(driver)) {
    return SoundErrorCode.NO_DRIVER;
  }
  return SoundErrorCode.SUCCESS;
}

function checkCacheControl(props: PropList): SoundErrorCode {
  const value = props.get(SoundAttr.CANBERRA_CACHE_CONTROL);
  if (value !== undefined && !CacheControlSchema.safeParse(value).success) {
    return SoundErrorCode.INVALID;
  }
  return SoundErrorCode.SUCCESS;
}

/**
 * A play request names a sound through `event.id` or `media.filename`,
 * either on the request or on the handle
 */
export function checkPlayable(handleProps: PropList, props: PropList): SoundErrorCode {
  const named = [props, handleProps].some(
    (list) => list.has(SoundAttr.EVENT_ID) || list.has(SoundAttr.MEDIA_FILENAME)
  );
  if (!named) {
    return SoundErrorCode.INVALID;
  }

  const cacheControl = checkCacheControl(props);
  if (cacheControl !== SoundErrorCode.SUCCESS) {
    return cacheControl;
  }

  const enable = props.get(SoundAttr.CANBERRA_ENABLE) ?? handleProps.get(SoundAttr.CANBERRA_ENABLE);
  if (enable === '0') {
    return SoundErrorCode.DISABLED;
  }

  return SoundErrorCode.SUCCESS;
}

/**
 * Only event sounds can be cached
 */
export function checkCacheable(props: PropList): SoundErrorCode {
  if (!props.has(SoundAttr.EVENT_ID)) {
    return SoundErrorCode.INVALID;
  }
  return checkCacheControl(props);
}
