import { describe, it, expect } from 'vitest';
import { join } from 'node:path';

import { ValidationError } from '../../src/utils/errors.js';
import { PathOutsideRootError, resolveWithinRoot } from '../../src/utils/path-security.js';

const ROOT = join('/srv', 'backups');

describe('resolveWithinRoot', () => {
  it('resolves relative paths against the root', () => {
    expect(resolveWithinRoot(ROOT, '2024-q4')).toBe(join(ROOT, '2024-q4'));
    expect(resolveWithinRoot(ROOT, './a/../b')).toBe(join(ROOT, 'b'));
  });

  it('accepts the root itself', () => {
    expect(resolveWithinRoot(ROOT, '.')).toBe(ROOT);
  });

  it('accepts absolute paths inside the root', () => {
    expect(resolveWithinRoot(ROOT, join(ROOT, 'nested'))).toBe(join(ROOT, 'nested'));
  });

  it('accepts names that merely start with two dots', () => {
    expect(resolveWithinRoot(ROOT, '..archive')).toBe(join(ROOT, '..archive'));
  });

  it('rejects ../ escapes', () => {
    expect(() => resolveWithinRoot(ROOT, '../elsewhere')).toThrow(PathOutsideRootError);
    expect(() => resolveWithinRoot(ROOT, '..')).toThrow(PathOutsideRootError);
  });

  it('rejects absolute paths outside the root', () => {
    try {
      resolveWithinRoot(ROOT, '/etc');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(PathOutsideRootError);
      if (error instanceof PathOutsideRootError) {
        expect(error.requestedPath).toBe('/etc');
        expect(error.root).toBe(ROOT);
        expect(error.message).toBe(`Path is outside ${ROOT}: /etc`);
      }
    }
  });

  it('rejects control characters', () => {
    expect(() => resolveWithinRoot(ROOT, 'back\0ups')).toThrow(ValidationError);
  });
});
