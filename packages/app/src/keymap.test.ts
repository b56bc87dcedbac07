import { describe, it, expect } from 'vitest';
import { resolveKeyAction } from './keymap';

describe('resolveKeyAction', () => {
  it('should map the zoom keys', () => {
    expect(resolveKeyAction('+')).toBe('zoom-in');
    expect(resolveKeyAction('=')).toBe('zoom-in');
    expect(resolveKeyAction('-')).toBe('zoom-out');
    expect(resolveKeyAction('0')).toBe('zoom-actual');
    expect(resolveKeyAction('f')).toBe('zoom-fit');
    expect(resolveKeyAction('F', { shift: true })).toBe('zoom-fit');
  });

  it('should map Enter and Escape to the crop actions', () => {
    expect(resolveKeyAction('Enter')).toBe('apply-crop');
    expect(resolveKeyAction('Escape')).toBe('cancel-crop');
  });

  it('should leave other keys and accelerators alone', () => {
    expect(resolveKeyAction('x')).toBeNull();
    expect(resolveKeyAction('toString')).toBeNull();
    expect(resolveKeyAction('0', { shift: false, ctrl: true })).toBeNull();
    expect(resolveKeyAction('+', { shift: false, alt: true })).toBeNull();
  });
});
