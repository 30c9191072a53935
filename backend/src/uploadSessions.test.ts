import { describe, expect, it } from 'vitest';
import { SessionInUseError } from './errors';
import { UploadSessionRegistry } from './uploadSessions';

describe('UploadSessionRegistry', () => {
  it('begin() registers a session at zero progress', () => {
    const registry = new UploadSessionRegistry();
    registry.begin('abc', 2048);
    expect(registry.snapshot('abc')).toEqual({ total: 2048, uploaded: 0 });
    expect(registry.size).toBe(1);
  });

  it('begin() rejects an id that is already in use', () => {
    const registry = new UploadSessionRegistry();
    registry.begin('abc', 10);
    expect(() => registry.begin('abc', 20)).toThrow(SessionInUseError);
    expect(registry.snapshot('abc')).toEqual({ total: 10, uploaded: 0 });
  });

  it('begin() rejects negative and fractional sizes', () => {
    const registry = new UploadSessionRegistry();
    expect(() => registry.begin('neg', -1)).toThrow(RangeError);
    expect(() => registry.begin('frac', 1.5)).toThrow(RangeError);
    expect(registry.size).toBe(0);
  });

  it('advance() accumulates deltas', () => {
    const registry = new UploadSessionRegistry();
    registry.begin('abc', 100);
    registry.advance('abc', 30);
    registry.advance('abc', 25);
    expect(registry.snapshot('abc')).toEqual({ total: 100, uploaded: 55 });
  });

  it('advance() never passes totalSize', () => {
    const registry = new UploadSessionRegistry();
    registry.begin('abc', 100);
    registry.advance('abc', 80);
    registry.advance('abc', 80);
    expect(registry.snapshot('abc')).toEqual({ total: 100, uploaded: 100 });
  });

  it('advance() ignores negative deltas and unknown ids', () => {
    const registry = new UploadSessionRegistry();
    registry.begin('abc', 100);
    registry.advance('abc', 40);
    registry.advance('abc', -10);
    registry.advance('missing', 10);
    expect(registry.snapshot('abc')).toEqual({ total: 100, uploaded: 40 });
    expect(registry.snapshot('missing')).toBeUndefined();
  });

  it('end() removes the session and is idempotent', () => {
    const registry = new UploadSessionRegistry();
    registry.begin('abc', 100);
    registry.end('abc');
    registry.end('abc');
    registry.end('never-started');
    expect(registry.snapshot('abc')).toBeUndefined();
    expect(registry.size).toBe(0);
  });

  it('a zero-byte session can be registered and ended at once', () => {
    const registry = new UploadSessionRegistry();
    registry.begin('empty', 0);
    expect(registry.snapshot('empty')).toEqual({ total: 0, uploaded: 0 });
    registry.end('empty');
    expect(registry.snapshot('empty')).toBeUndefined();
  });

  it('an ended id can be reused for a new upload', () => {
    const registry = new UploadSessionRegistry();
    registry.begin('abc', 10);
    registry.end('abc');
    registry.begin('abc', 20);
    expect(registry.snapshot('abc')).toEqual({ total: 20, uploaded: 0 });
  });
});
