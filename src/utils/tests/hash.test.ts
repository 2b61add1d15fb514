import { describe, it, expect } from 'vitest';
import { generateHash, generatePlayerFingerprint } from '../hash';

describe('generateHash', () => {
    it('returns the first 16 hex characters of the sha256 digest', () => {
        // sha256('abc') = ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad
        expect(generateHash('abc')).toBe('ba7816bf8f01cfea');
    });

    it('honours a custom length', () => {
        expect(generateHash('abc', 8)).toBe('ba7816bf');
    });
});

describe('generatePlayerFingerprint', () => {
    it('ignores case and surrounding whitespace of the Riot ID', () => {
        expect(generatePlayerFingerprint(' AGreenFruit ', 'PEPE', 'user-1'))
            .toBe(generatePlayerFingerprint('agreenfruit', 'pepe', 'user-1'));
    });

    it('differs per owner', () => {
        expect(generatePlayerFingerprint('Foo', '123', 'user-1'))
            .not.toBe(generatePlayerFingerprint('Foo', '123', 'user-2'));
    });

    it('is 16 characters long', () => {
        expect(generatePlayerFingerprint('Foo', '123', 'user-1')).toHaveLength(16);
    });
});
