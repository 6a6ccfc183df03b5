/**
 * Pool Parameters (Protocol Level)
 *
 * Deterministic constants shared by every pair instance.
 * These do NOT depend on node-local configuration and are never overridden
 * from the environment.
 */

// Fixed-point scale of the fractional ledger: one whole item = ONE units
export const ONE = 10n ** 18n;

// Swap fee: 0.3% charged on input (997 / 1000 kept)
export const FEE_NUMERATOR = 997n;
export const FEE_DENOMINATOR = 1000n;

// Delay between close() and the operator being allowed to withdraw items
export const CLOSE_GRACE_PERIOD = 7 * 24 * 60 * 60; // seconds

// Base asset sentinel for the native currency
export const NATIVE_ASSET = '0x0000000000000000000000000000000000000000';

// All-zero allow-list root: every item id is eligible
export const ZERO_ROOT = `0x${'00'.repeat(32)}`;

export const MAX_UINT256 = (1n << 256n) - 1n;

export const FRACTIONAL_DECIMALS = 18;

export function isNativeAsset(asset: string): boolean {
    return asset.toLowerCase() === NATIVE_ASSET;
}

export function isZeroRoot(root: string): boolean {
    return root.toLowerCase() === ZERO_ROOT;
}
