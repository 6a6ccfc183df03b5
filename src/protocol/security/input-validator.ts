/**
 * Input Validator
 * Validation of raw CLI/user input before it reaches a pair
 */

import { InvalidInputError } from '../errors.js';
import { MAX_UINT256 } from '../params/pool.js';
import { isDigest } from '../utils/crypto.js';
import { logger } from '../utils/logger.js';

// Maximum allowed lengths
const MAX_STRING_LENGTH = 256;
const MAX_ID_LIST_LENGTH = 100;

// Address format regex
const ADDRESS_REGEX = /^0x[a-fA-F0-9]{40}$/;
// plain integer, or <n>e<k> meaning n * 10^k
const AMOUNT_REGEX = /^(\d+)(?:e(\d+))?$/;
const ITEM_ID_REGEX = /^\d+$/;

export interface ValidationResult {
    valid: boolean;
    error?: string;
}

export class InputValidator {
    private log = logger.child('InputValidator');

    /**
     * Validate address format
     */
    validateAddress(address: unknown, fieldName: string = 'address'): ValidationResult {
        if (typeof address !== 'string') {
            return { valid: false, error: `${fieldName} must be a string` };
        }
        if (!ADDRESS_REGEX.test(address)) {
            return { valid: false, error: `${fieldName} invalid format (expected 0x + 40 hex chars)` };
        }
        return { valid: true };
    }

    /**
     * Validate a raw integer amount
     */
    validateAmount(amount: unknown, fieldName: string = 'amount'): ValidationResult {
        if (typeof amount !== 'string') {
            return { valid: false, error: `${fieldName} must be a string` };
        }
        const match = AMOUNT_REGEX.exec(amount.trim());
        if (!match) {
            return { valid: false, error: `${fieldName} must be a non-negative integer` };
        }
        const value = toAmount(match[1], match[2]);
        if (value > MAX_UINT256) {
            return { valid: false, error: `${fieldName} exceeds uint256` };
        }
        return { valid: true };
    }

    /**
     * Validate a 32-byte hex digest (allow-list roots and proof nodes)
     */
    validateDigest(digest: unknown, fieldName: string = 'digest'): ValidationResult {
        if (typeof digest !== 'string') {
            return { valid: false, error: `${fieldName} must be a string` };
        }
        if (!isDigest(digest)) {
            return { valid: false, error: `${fieldName} must be 0x + 64 hex chars` };
        }
        return { valid: true };
    }

    /**
     * Validate string with max length
     */
    validateString(str: unknown, fieldName: string, maxLength: number = MAX_STRING_LENGTH): ValidationResult {
        if (typeof str !== 'string') {
            return { valid: false, error: `${fieldName} must be a string` };
        }
        if (str.length === 0) {
            return { valid: false, error: `${fieldName} must not be empty` };
        }
        if (str.length > maxLength) {
            return { valid: false, error: `${fieldName} too long (max ${maxLength})` };
        }
        // Check for control characters (potential injection)
        if (/[\x00-\x1f\x7f]/.test(str)) {
            return { valid: false, error: `${fieldName} contains invalid characters` };
        }
        return { valid: true };
    }

    // ========== PARSERS (throw InvalidInputError) ==========

    parseAddress(input: string, fieldName: string = 'address'): string {
        this.require(this.validateAddress(input, fieldName));
        return input.toLowerCase();
    }

    parseAmount(input: string, fieldName: string = 'amount'): bigint {
        this.require(this.validateAmount(input, fieldName));
        const match = AMOUNT_REGEX.exec(input.trim());
        if (!match) {
            throw new InvalidInputError(`${fieldName} must be a non-negative integer`);
        }
        return toAmount(match[1], match[2]);
    }

    /**
     * "1,2,3" → [1n, 2n, 3n]. Order and duplicates are kept as given.
     */
    parseItemIds(input: string, fieldName: string = 'ids'): bigint[] {
        const parts = input
            .split(',')
            .map(part => part.trim())
            .filter(part => part.length > 0);
        if (parts.length === 0) {
            throw new InvalidInputError(`${fieldName} must list at least one item id`);
        }
        if (parts.length > MAX_ID_LIST_LENGTH) {
            throw new InvalidInputError(`${fieldName} too long (max ${MAX_ID_LIST_LENGTH})`);
        }
        return parts.map(part => {
            if (!ITEM_ID_REGEX.test(part)) {
                throw new InvalidInputError(`${fieldName}: invalid item id "${part}"`);
            }
            const id = BigInt(part);
            if (id > MAX_UINT256) {
                throw new InvalidInputError(`${fieldName}: item id ${part} exceeds uint256`);
            }
            return id;
        });
    }

    parseDigest(input: string, fieldName: string = 'digest'): string {
        this.require(this.validateDigest(input, fieldName));
        return input.toLowerCase();
    }

    /**
     * Proof nodes joined with commas; an empty string is the empty proof.
     */
    parseProof(input: string, fieldName: string = 'proof'): string[] {
        return input
            .split(',')
            .map(part => part.trim())
            .filter(part => part.length > 0)
            .map((node, i) => this.parseDigest(node, `${fieldName}[${i}]`));
    }

    parseString(input: string, fieldName: string): string {
        this.require(this.validateString(input, fieldName));
        return input;
    }

    private require(result: ValidationResult): void {
        if (!result.valid) {
            this.log.debug(`Rejected input: ${result.error}`);
            throw new InvalidInputError(result.error ?? 'Invalid input');
        }
    }
}

function toAmount(digits: string, exponent: string | undefined): bigint {
    return BigInt(digits) * 10n ** BigInt(exponent ?? '0');
}

export const inputValidator = new InputValidator();
