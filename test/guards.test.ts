import { describe, it, expect } from 'vitest';
import { EMPTY, emptyList, isEmpty, isNotEmpty } from '../src/guards';

describe('isEmpty', () => {
    it('treats absent values as empty', () => {
        expect(isEmpty(null)).toBe(true);
        expect(isEmpty(undefined)).toBe(true);
    });

    it('checks the length of strings, arrays and typed arrays', () => {
        expect(isEmpty('')).toBe(true);
        expect(isEmpty(EMPTY)).toBe(true);
        expect(isEmpty(' ')).toBe(false);
        expect(isEmpty([])).toBe(true);
        expect(isEmpty([0])).toBe(false);
        expect(isEmpty(new Uint8Array(0))).toBe(true);
        expect(isEmpty(new Uint8Array(2))).toBe(false);
    });

    it('checks the size of sets and maps', () => {
        expect(isEmpty(new Set())).toBe(true);
        expect(isEmpty(new Set([1]))).toBe(false);
        expect(isEmpty(new Map())).toBe(true);
        expect(isEmpty(new Map([['k', 1]]))).toBe(false);
    });

    it('treats other values as present', () => {
        expect(isEmpty(0)).toBe(false);
        expect(isEmpty(false)).toBe(false);
        expect(isEmpty({})).toBe(false);
    });
});

describe('isNotEmpty', () => {
    it('negates isEmpty', () => {
        expect(isNotEmpty('a')).toBe(true);
        expect(isNotEmpty([1])).toBe(true);
        expect(isNotEmpty('')).toBe(false);
        expect(isNotEmpty(null)).toBe(false);
    });

    it('leaves an empty list typed as a list when false', () => {
        const sizeWhenBlank = (list: readonly number[] | null): number | null =>
            isNotEmpty(list) ? null : list?.length ?? null;

        expect(sizeWhenBlank([])).toBe(0);
        expect(sizeWhenBlank(null)).toBeNull();
        expect(sizeWhenBlank([1])).toBeNull();
    });
});

describe('emptyList', () => {
    it('returns a fresh array each call', () => {
        const first = emptyList<number>();
        first.push(1);

        expect(emptyList<number>()).toEqual([]);
        expect(first).not.toBe(emptyList<number>());
    });
});
