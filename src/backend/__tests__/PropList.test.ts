/**
 * Tests for PropList
 */

import { describe, it, expect } from 'vitest';
import { PropList } from '../PropList';
import { SoundErrorCode } from '../../types/codes';

describe('PropList', () => {
  describe('set', () => {
    it('should store string properties', () => {
      const props = new PropList();
      expect(props.set('event.id', 'bell')).toBe(SoundErrorCode.SUCCESS);
      expect(props.get('event.id')).toBe('bell');
      expect(props.has('event.id')).toBe(true);
      expect(props.size).toBe(1);
    });

    it('should keep the first position when a key is set again', () => {
      const props = new PropList();
      props.set('event.id', 'bell');
      props.set('media.role', 'event');
      props.set('event.id', 'dialog-error');

      expect(props.entries()).toEqual([
        ['event.id', 'dialog-error'],
        ['media.role', 'event'],
      ]);
    });

    it.each([[''], ['has space'], ['tab\tkey'], ['événement.id']])(
      'should reject the name %j',
      (key) => {
        const props = new PropList();
        expect(props.set(key, 'x')).toBe(SoundErrorCode.INVALID);
        expect(props.size).toBe(0);
      }
    );

    it('should accept empty values', () => {
      const props = new PropList();
      expect(props.set('event.description', '')).toBe(SoundErrorCode.SUCCESS);
    });
  });

  describe('merge', () => {
    it('should overlay the other list', () => {
      const base = new PropList();
      base.set('event.id', 'bell');
      base.set('application.name', 'test-app');

      const overlay = new PropList();
      overlay.set('event.id', 'dialog-error');
      overlay.set('media.role', 'event');

      expect(base.merge(overlay)).toBe(SoundErrorCode.SUCCESS);
      expect(base.entries()).toEqual([
        ['event.id', 'dialog-error'],
        ['application.name', 'test-app'],
        ['media.role', 'event'],
      ]);
    });
  });

  describe('clone', () => {
    it('should copy entries independently', () => {
      const original = new PropList();
      original.set('event.id', 'bell');

      const copy = original.clone();
      copy.set('event.id', 'other');

      expect(original.get('event.id')).toBe('bell');
      expect(copy.get('event.id')).toBe('other');
    });
  });

  describe('destroy', () => {
    it('should clear the list and refuse writes', () => {
      const props = new PropList();
      props.set('event.id', 'bell');
      props.destroy();

      expect(props.isDestroyed).toBe(true);
      expect(props.size).toBe(0);
      expect(props.set('event.id', 'bell')).toBe(SoundErrorCode.DESTROYED);
      expect(props.merge(new PropList())).toBe(SoundErrorCode.DESTROYED);
    });
  });
});
