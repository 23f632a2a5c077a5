/**
 * Attribute marshalling
 *
 * Turns caller attributes into a backend PropList. The list form stops at
 * the first problem and says which pair caused it. The map form always
 * inserts every entry and only reports failures in aggregate.
 */

import type { AttributeInput, AttributeList, AttributeMap } from '../types/attributes';
import { isAttributeList, isAttributeMapInstance } from '../types/attributes';
import { SoundErrorCode, describeErrorCode } from '../types/codes';
import { InvalidArgumentError, MarshalError } from '../types/errors';
import type { PropList } from '../backend/PropList';

/**
 * Insert `[key, value, key, value, ...]` pairs in order
 *
 * @throws InvalidArgumentError when a key has no value
 * @throws MarshalError when the list rejects a pair
 */
export function fromAttributeList(list: AttributeList, target: PropList): void {
  for (let index = 0; index < list.length; index += 2) {
    const key = list[index];
    if (key === null || key === undefined) {
      return;
    }

    const value = list[index + 1];
    if (value === null || value === undefined) {
      throw new InvalidArgumentError(`Attribute "${key}" has no value`, undefined, {
        key,
        position: index,
      });
    }

    const code = target.set(key, value);
    if (code !== SoundErrorCode.SUCCESS) {
      throw new MarshalError(`Cannot set attribute "${key}": ${describeErrorCode(code)}`, code, {
        key,
        position: index,
      });
    }
  }
}

/**
 * Insert every entry of a mapping
 *
 * @throws MarshalError once every entry was tried, if any was rejected
 */
export function fromAttributeMap(map: AttributeMap, target: PropList): void {
  const entries = isAttributeMapInstance(map) ? [...map.entries()] : Object.entries(map);

  let rejected = 0;
  let lastCode: SoundErrorCode = SoundErrorCode.SUCCESS;
  for (const [key, value] of entries) {
    const code = target.set(key, value);
    if (code !== SoundErrorCode.SUCCESS) {
      rejected++;
      lastCode = code;
    }
  }

  if (rejected > 0) {
    throw new MarshalError(`${rejected} of ${entries.length} attributes were rejected`, lastCode, {
      rejected,
      total: entries.length,
    });
  }
}

export function marshalAttributes(input: AttributeInput, target: PropList): void {
  if (isAttributeList(input)) {
    fromAttributeList(input, target);
  } else {
    fromAttributeMap(input, target);
  }
}
