import { isAbsolute, relative, resolve, sep } from 'node:path';

import { AssessmentError, ErrorCode, ValidationError } from './errors.js';

const CONTROL_CHARACTERS = /[\x00-\x1f]/;

export class PathOutsideRootError extends AssessmentError {
  constructor(
    public readonly requestedPath: string,
    public readonly root: string
  ) {
    super(`Path is outside ${root}: ${requestedPath}`, ErrorCode.PATH_OUTSIDE_ROOT, {
      details: { requestedPath, root },
    });
    this.name = 'PathOutsideRootError';
  }
}

/**
 * Resolve a caller-supplied directory against `root`, refusing anything
 * that lands outside it. Absolute paths are accepted when they stay inside.
 *
 * @example
 * resolveWithinRoot('/srv/backups', '2024-q4') // => '/srv/backups/2024-q4'
 * resolveWithinRoot('/srv/backups', '../etc') // throws PathOutsideRootError
 */
export function resolveWithinRoot(root: string, requestedPath: string): string {
  if (CONTROL_CHARACTERS.test(requestedPath)) {
    throw new ValidationError('Path contains control characters', [
      { path: 'directory', message: 'control characters are not allowed' },
    ]);
  }

  const base = resolve(root);
  const target = resolve(base, requestedPath);
  const rel = relative(base, target);

  if (rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw new PathOutsideRootError(requestedPath, base);
  }
  return target;
}
