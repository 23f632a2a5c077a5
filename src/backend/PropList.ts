/**
 * PropList - the property bag handed to a backend with every request
 *
 * Lists are built fresh for each operation and destroyed as soon as the
 * backend call returns. Backends that need the values later must copy them.
 */

import { SoundErrorCode } from '../types/codes';
import { PropertyNameSchema, PropertyValueSchema } from '../utils/validators';

export class PropList {
  private readonly props = new Map<string, string>();
  private destroyed = false;

  /**
   * Set a string property. A repeated key keeps its original position and
   * takes the new value.
   */
  set(key: string, value: string): SoundErrorCode {
    if (this.destroyed) {
      return SoundErrorCode.DESTROYED;
    }
    if (!PropertyNameSchema.safeParse(key).success) {
      return SoundErrorCode.INVALID;
    }
    if (!PropertyValueSchema.safeParse(value).success) {
      return SoundErrorCode.INVALID;
    }

    this.props.set(key, value);
    return SoundErrorCode.SUCCESS;
  }

  get(key: string): string | undefined {
    return this.props.get(key);
  }

  has(key: string): boolean {
    return this.props.has(key);
  }

  get size(): number {
    return this.props.size;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  /**
   * Entries in insertion order
   */
  entries(): Array<[string, string]> {
    return [...this.props.entries()];
  }

  /**
   * Copy every entry of `other` over this list
   */
  merge(other: PropList): SoundErrorCode {
    if (this.destroyed) {
      return SoundErrorCode.DESTROYED;
    }
    for (const [key, value] of other.entries()) {
      this.props.set(key, value);
    }
    return SoundErrorCode.SUCCESS;
  }

  clone(): PropList {
    const copy = new PropList();
    copy.merge(this);
    return copy;
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.props);
  }

  destroy(): void {
    this.props.clear();
    this.destroyed = true;
  }
}
