import path from 'path';
import { isSafeSegment, normalizeIdentityName, resolveWithin } from '../../src/utils/paths.js';
import { InvalidNameError } from '../../src/services/errors.js';

describe('isSafeSegment', () => {
    it.each(['Alice', 'Mary Jane', "O'Brien", 'José', '20240102_030405_678901.jpg'])('accepts %j', (value) => {
        expect(isSafeSegment(value)).toBe(true);
    });

    it.each(['', '.', '..', '.hidden', '../x', 'a/b', 'a\\b', 'a\u0000b', 'tab\there', ' padded', 'x'.repeat(101)])(
        'rejects %j',
        (value) => {
            expect(isSafeSegment(value)).toBe(false);
        }
    );
});

describe('normalizeIdentityName', () => {
    it('trims surrounding whitespace', () => {
        expect(normalizeIdentityName('  Alice \n')).toBe('Alice');
    });

    it('throws for names that cannot be a directory', () => {
        expect(() => normalizeIdentityName('..')).toThrow(InvalidNameError);
        expect(() => normalizeIdentityName('   ')).toThrow(InvalidNameError);
    });
});

describe('resolveWithin', () => {
    const root = path.resolve('/data/faces');

    it('joins a child path', () => {
        expect(resolveWithin(root, 'known', 'Alice')).toBe(path.join(root, 'known', 'Alice'));
    });

    it('refuses paths that leave the root', () => {
        expect(resolveWithin(root, '..', 'etc')).toBeNull();
        expect(resolveWithin(root, 'known', '../../x')).toBeNull();
    });

    it('refuses the root itself', () => {
        expect(resolveWithin(root, '.')).toBeNull();
    });
});
