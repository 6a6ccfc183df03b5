/**
 * Checked uint256 arithmetic over bigint.
 *
 * bigint never wraps, so underflow and overflow have to be detected
 * explicitly to keep the ledgers inside uint256 semantics.
 */

import { MathError } from '../errors.js';
import { MAX_UINT256 } from '../params/pool.js';

function assertRange(value: bigint, op: string): bigint {
    if (value < 0n) {
        throw new MathError('UNDERFLOW', `Underflow in ${op}`);
    }
    if (value > MAX_UINT256) {
        throw new MathError('OVERFLOW', `Overflow in ${op}`);
    }
    return value;
}

export const SafeMath = {
    add(a: bigint, b: bigint): bigint {
        return assertRange(a + b, 'add');
    },

    sub(a: bigint, b: bigint): bigint {
        return assertRange(a - b, 'sub');
    },

    mul(a: bigint, b: bigint): bigint {
        return assertRange(a * b, 'mul');
    },

    div(a: bigint, b: bigint): bigint {
        if (b === 0n) {
            throw new MathError('DIVISION_BY_ZERO', 'Division by zero');
        }
        return assertRange(a / b, 'div');
    },

    min(a: bigint, b: bigint): bigint {
        return a < b ? a : b;
    },

    /**
     * Integer square root, rounded down (Babylonian iteration).
     */
    sqrt(value: bigint): bigint {
        if (value < 0n) throw new MathError('NEGATIVE_SQRT', 'Square root of negative number');
        if (value === 0n) return 0n;

        let x = value;
        let y = (x + 1n) / 2n;
        while (y < x) {
            x = y;
            y = (x + value / x) / 2n;
        }
        return x;
    },
};
