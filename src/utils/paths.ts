import path from 'path';
import { InvalidNameError } from '../services/errors.js';

const MAX_NAME_LENGTH = 100;
// Control characters, path separators and NUL
const FORBIDDEN_NAME_CHARS = /[\u0000-\u001f\u007f/\\]/;

/**
 * True when the value can be used as a single directory or file name.
 */
export function isSafeSegment(value: string): boolean {
    if (!value || value.length > MAX_NAME_LENGTH) return false;
    if (value === '.' || value === '..' || value.startsWith('.')) return false;
    if (value !== value.trim()) return false;
    return !FORBIDDEN_NAME_CHARS.test(value);
}

/**
 * Normalise an operator-supplied identity name, throwing when it cannot be
 * stored as a directory name.
 */
export function normalizeIdentityName(raw: string): string {
    const name = raw.trim();
    if (!isSafeSegment(name)) {
        throw new InvalidNameError(`Invalid name: "${raw}"`);
    }
    return name;
}

/**
 * Join segments under root and return null if the result escapes root.
 */
export function resolveWithin(root: string, ...segments: string[]): string | null {
    const base = path.resolve(root);
    const target = path.resolve(base, ...segments);
    const relative = path.relative(base, target);

    if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
        return null;
    }
    return target;
}
