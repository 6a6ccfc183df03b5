/**
 * Reserve & Pricing Oracle
 *
 * Pure quote functions over a reserve snapshot. Integer math only, every
 * division rounds down. A zero denominator or a negative intermediate throws
 * MathError through SafeMath.
 *
 * Formula: x * y = k (Constant Product AMM)
 * Fee: 0.3% on input
 */

import { FEE_DENOMINATOR, FEE_NUMERATOR, ONE } from '../../protocol/params/pool.js';
import { SafeMath } from '../../protocol/utils/safe-math.js';

const { add, sub, mul, div, min, sqrt } = SafeMath;

export interface Reserves {
    base: bigint;
    fractional: bigint;
}

export interface RemoveQuote {
    baseTokenOutputAmount: bigint;
    fractionalTokenOutputAmount: bigint;
}

/**
 * Base units per ONE fractional unit.
 */
export function spotPrice(reserves: Reserves): bigint {
    return div(mul(reserves.base, ONE), reserves.fractional);
}

/**
 * Base input needed to take `outputAmount` fractional units out of the pool.
 */
export function quoteBuy(outputAmount: bigint, reserves: Reserves): bigint {
    const numerator = mul(mul(outputAmount, FEE_DENOMINATOR), reserves.base);
    const denominator = mul(sub(reserves.fractional, outputAmount), FEE_NUMERATOR);
    return div(numerator, denominator);
}

/**
 * Base output for putting `inputAmount` fractional units into the pool.
 */
export function quoteSell(inputAmount: bigint, reserves: Reserves): bigint {
    const inputAmountWithFee = mul(inputAmount, FEE_NUMERATOR);
    const numerator = mul(inputAmountWithFee, reserves.base);
    const denominator = add(mul(reserves.fractional, FEE_DENOMINATOR), inputAmountWithFee);
    return div(numerator, denominator);
}

/**
 * Share units minted for a deposit. An empty supply is seeded with the
 * geometric mean of the deposit; otherwise the smaller proportional share
 * wins so an unbalanced deposit cannot dilute existing holders.
 */
export function quoteAdd(
    baseTokenAmount: bigint,
    fractionalTokenAmount: bigint,
    reserves: Reserves,
    shareSupply: bigint
): bigint {
    if (shareSupply > 0n) {
        const baseShare = div(mul(baseTokenAmount, shareSupply), reserves.base);
        const fractionalShare = div(mul(fractionalTokenAmount, shareSupply), reserves.fractional);
        return min(baseShare, fractionalShare);
    }
    return sqrt(mul(baseTokenAmount, fractionalTokenAmount));
}

export function quoteRemove(shareAmount: bigint, reserves: Reserves, shareSupply: bigint): RemoveQuote {
    return {
        baseTokenOutputAmount: div(mul(reserves.base, shareAmount), shareSupply),
        fractionalTokenOutputAmount: div(mul(reserves.fractional, shareAmount), shareSupply),
    };
}
