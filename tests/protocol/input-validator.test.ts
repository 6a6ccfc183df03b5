import { describe, it, expect } from 'vitest';
import { InputValidator } from '../../src/protocol/security/input-validator.js';
import { InvalidInputError } from '../../src/protocol/errors.js';
import { MAX_UINT256, ZERO_ROOT } from '../../src/protocol/params/pool.js';

const validator = new InputValidator();

describe('Address validation', () => {
    it('accepts and lower-cases 20-byte hex addresses', () => {
        expect(validator.parseAddress(`0x${'AB'.repeat(20)}`)).toBe(`0x${'ab'.repeat(20)}`);
    });
    it('rejects malformed addresses', () => {
        expect(validator.validateAddress('0x1234')).toEqual({
            valid: false,
            error: 'address invalid format (expected 0x + 40 hex chars)',
        });
        expect(validator.validateAddress(42, 'to')).toEqual({ valid: false, error: 'to must be a string' });
        expect(() => validator.parseAddress('nope', 'from')).toThrow(InvalidInputError);
    });
});

describe('Amount parsing', () => {
    it('parses plain integers', () => {
        expect(validator.parseAmount('1000')).toBe(1000n);
        expect(validator.parseAmount('0')).toBe(0n);
    });
    it('parses n e k as n * 10^k', () => {
        expect(validator.parseAmount('2e18')).toBe(2n * 10n ** 18n);
        expect(validator.parseAmount('15e2')).toBe(1500n);
    });
    it('rejects negatives, fractions and junk', () => {
        for (const input of ['-1', '1.5', 'abc', '', '1e']) {
            expect(() => validator.parseAmount(input)).toThrow('amount must be a non-negative integer');
        }
    });
    it('rejects values beyond uint256', () => {
        expect(validator.parseAmount(MAX_UINT256.toString())).toBe(MAX_UINT256);
        expect(() => validator.parseAmount('1e78', 'max-in')).toThrow('max-in exceeds uint256');
    });
});

describe('Item id lists', () => {
    it('parses comma-separated ids in order', () => {
        expect(validator.parseItemIds('3, 1,2')).toEqual([3n, 1n, 2n]);
        expect(validator.parseItemIds('7,7')).toEqual([7n, 7n]);
    });
    it('rejects empty and malformed lists', () => {
        expect(() => validator.parseItemIds(' , ')).toThrow('ids must list at least one item id');
        expect(() => validator.parseItemIds('1,x')).toThrow('ids: invalid item id "x"');
        expect(() => validator.parseItemIds('-4')).toThrow(InvalidInputError);
    });
});

describe('Digests and proofs', () => {
    it('accepts 32-byte hex digests', () => {
        expect(validator.parseDigest(ZERO_ROOT.toUpperCase().replace('0X', '0x'))).toBe(ZERO_ROOT);
        expect(validator.validateDigest('0x12')).toEqual({ valid: false, error: 'digest must be 0x + 64 hex chars' });
    });
    it('parses comma-joined proofs', () => {
        const node = `0x${'11'.repeat(32)}`;
        expect(validator.parseProof('')).toEqual([]);
        expect(validator.parseProof(`${node},${ZERO_ROOT}`)).toEqual([node, ZERO_ROOT]);
        expect(() => validator.parseProof(`${node},0xzz`)).toThrow('proof[1] must be 0x + 64 hex chars');
    });
});

describe('String validation', () => {
    it('rejects control characters and empty strings', () => {
        expect(validator.validateString('Apes', 'name')).toEqual({ valid: true });
        expect(validator.validateString('Ap\x00es', 'name')).toEqual({ valid: false, error: 'name contains invalid characters' });
        expect(() => validator.parseString('', 'symbol')).toThrow('symbol must not be empty');
    });
});
