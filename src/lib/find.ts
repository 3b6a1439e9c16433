import { MissingPathError } from './errors';

/**
 * Outcome of walking a dot-separated path.
 *
 * `absent` means a key was not there (or an intermediate was not an object);
 * `null` means the key was there and GitHub returned null for it, which is
 * how GraphQL reports a missing relation such as an unknown ref.
 */
export type Lookup =
  | { found: true; value: unknown }
  | { found: false; reason: 'absent' | 'null'; at: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Gets an element by dot separated path in a nested object.
 * Keys are matched literally.
 *
 * @example
 * ```typescript
 * findPath('repository.ref.target.oid', data);
 * // { found: false, reason: 'null', at: 'ref' } when the branch does not exist
 * ```
 */
export function findPath(path: string, json: unknown): Lookup {
  let current: unknown = json;
  for (const key of path.split('.')) {
    if (!isRecord(current) || !Object.prototype.hasOwnProperty.call(current, key)) {
      return { found: false, reason: 'absent', at: key };
    }
    const next = current[key];
    if (next === null || next === undefined) {
      return { found: false, reason: next === null ? 'null' : 'absent', at: key };
    }
    current = next;
  }
  return { found: true, value: current };
}

/**
 * Value at `path`, or undefined when any segment is absent or null
 */
export function find(path: string, json: unknown): unknown {
  const result = findPath(path, json);
  return result.found ? result.value : undefined;
}

/**
 * Value at `path`; throws MissingPathError when any segment is absent or null
 */
export function findExisting(path: string, json: unknown): unknown {
  const result = findPath(path, json);
  if (!result.found) {
    throw new MissingPathError(path, result.at);
  }
  return result.value;
}
