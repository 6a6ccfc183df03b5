/**
 * Pool Error Classes
 *
 * Every engine failure is one of these. A thrown PoolError aborts the whole
 * call and the execution boundary restores all state touched by it.
 */

export type PoolErrorCode =
    | 'INVALID_INPUT'
    | 'SLIPPAGE'
    | 'ALLOW_LIST'
    | 'ARITHMETIC'
    | 'UNAUTHORIZED'
    | 'TIMING'
    | 'CLOSED'
    | 'TRANSFER'
    | 'NOT_FOUND';

export abstract class PoolError extends Error {
    abstract readonly code: PoolErrorCode;

    constructor(message: string, cause?: unknown) {
        super(message);
        this.name = new.target.name;
        if (cause !== undefined) this.cause = cause;
    }
}

/**
 * Zero amounts, attached native value that does not match the declared amount,
 * malformed CLI input.
 */
export class InvalidInputError extends PoolError {
    readonly code = 'INVALID_INPUT';
}

/**
 * Quoted amount falls outside the caller's bound.
 */
export class SlippageError extends PoolError {
    readonly code = 'SLIPPAGE';

    constructor(
        public readonly bound: 'min' | 'max',
        public readonly label: string,
        public readonly limit: bigint,
        public readonly actual: bigint
    ) {
        super(`Slippage: ${label} ${actual} ${bound === 'min' ? 'below minimum' : 'above maximum'} ${limit}`);
    }
}

export class AllowListError extends PoolError {
    readonly code = 'ALLOW_LIST';

    constructor(public readonly itemId: bigint) {
        super(`Invalid allow-list proof for item #${itemId}`);
    }
}

export type MathFailure = 'DIVISION_BY_ZERO' | 'UNDERFLOW' | 'OVERFLOW' | 'NEGATIVE_SQRT';

export class MathError extends PoolError {
    readonly code = 'ARITHMETIC';

    constructor(public readonly failure: MathFailure, message: string) {
        super(message);
    }
}

export class UnauthorizedError extends PoolError {
    readonly code = 'UNAUTHORIZED';

    constructor(public readonly caller: string, action: string) {
        super(`${action}: caller ${caller} is not authorized`);
    }
}

export class TimingError extends PoolError {
    readonly code = 'TIMING';
}

/**
 * Operation not allowed once the pair has been closed.
 */
export class PoolClosedError extends PoolError {
    readonly code = 'CLOSED';
}

/**
 * Raised by the ledgers and the NFT collection (not owner, not approved,
 * insufficient balance or allowance).
 */
export class TransferError extends PoolError {
    readonly code = 'TRANSFER';
}

export class NotFoundError extends PoolError {
    readonly code = 'NOT_FOUND';
}

export function isPoolError(error: unknown): error is PoolError {
    return error instanceof PoolError;
}

export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
