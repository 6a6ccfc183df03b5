import { describe, it, expect } from 'vitest';
import { SafeMath } from '../../src/protocol/utils/safe-math.js';
import { MathError } from '../../src/protocol/errors.js';
import { MAX_UINT256 } from '../../src/protocol/params/pool.js';
import { thrown } from '../helpers.js';

describe('SafeMath', () => {
    it('adds within uint256', () => {
        expect(SafeMath.add(2n, 3n)).toBe(5n);
        expect(SafeMath.add(MAX_UINT256 - 1n, 1n)).toBe(MAX_UINT256);
    });
    it('rejects overflow', () => {
        expect(() => SafeMath.add(MAX_UINT256, 1n)).toThrow('Overflow in add');
        expect(thrown(() => SafeMath.mul(MAX_UINT256, 2n))).toMatchObject({ failure: 'OVERFLOW' });
    });
    it('rejects underflow', () => {
        expect(() => SafeMath.sub(1n, 2n)).toThrow(MathError);
        expect(thrown(() => SafeMath.sub(1n, 2n))).toMatchObject({ failure: 'UNDERFLOW', message: 'Underflow in sub' });
    });
    it('divides rounding down', () => {
        expect(SafeMath.div(7n, 2n)).toBe(3n);
        expect(SafeMath.div(0n, 5n)).toBe(0n);
    });
    it('rejects division by zero', () => {
        expect(() => SafeMath.div(1n, 0n)).toThrow('Division by zero');
    });
    it('takes the minimum', () => {
        expect(SafeMath.min(4n, 9n)).toBe(4n);
        expect(SafeMath.min(9n, 4n)).toBe(4n);
    });
    it('computes the integer square root', () => {
        expect(SafeMath.sqrt(0n)).toBe(0n);
        expect(SafeMath.sqrt(1n)).toBe(1n);
        expect(SafeMath.sqrt(15n)).toBe(3n);
        expect(SafeMath.sqrt(16n)).toBe(4n);
        expect(SafeMath.sqrt(10n ** 36n)).toBe(10n ** 18n);
    });
    it('rejects the square root of a negative number', () => {
        expect(thrown(() => SafeMath.sqrt(-1n))).toMatchObject({ failure: 'NEGATIVE_SQRT' });
    });
});
