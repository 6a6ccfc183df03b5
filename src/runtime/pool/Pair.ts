/**
 * Pair - fractional NFT / base asset AMM
 *
 * One instance per (collection, base asset, allow-list root). The pair is at
 * the same time:
 * - the constant-product market between the base asset and fractional units
 * - the ledger of those fractional units (wrap mints, unwrap burns)
 *
 * CONSTRAINTS:
 * - every quote is read before any transfer of the same operation
 * - fractional balances move only through the ledger's move() primitive
 * - state-changing methods expect to run inside Chain.execute, which credits
 *   the attached native value first and rolls everything back on a throw
 */

import { CLOSE_GRACE_PERIOD, FRACTIONAL_DECIMALS, ONE, isNativeAsset } from '../../protocol/params/pool.js';
import {
    AllowListError,
    InvalidInputError,
    PoolClosedError,
    SlippageError,
    TimingError,
    UnauthorizedError,
} from '../../protocol/errors.js';
import type { CallContext } from '../../protocol/chain/context.js';
import type { Journaled, Rollback } from '../../protocol/chain/Journal.js';
import { checkpointAll } from '../../protocol/chain/Journal.js';
import { deriveAddress } from '../../protocol/utils/crypto.js';
import { logger } from '../../protocol/utils/logger.js';
import { FungibleLedger, type FungibleLedgerData } from '../ledger/FungibleLedger.js';
import type { BaseAssetLedger } from '../ledger/FungibleLedger.js';
import { ShareToken } from '../ledger/ShareToken.js';
import type { NativeLedger } from '../ledger/NativeLedger.js';
import type { NFTCollection } from '../nft/NFTCollection.js';
import { isEligible, type Proof } from './AllowList.js';
import type { EventLog, PoolEvent } from './events.js';
import { quoteAdd, quoteBuy, quoteRemove, quoteSell, spotPrice, type Reserves, type RemoveQuote } from './pricing.js';

const log = logger.child('Pair');

// ========== INTERFACES ==========

/**
 * What a pair needs from the registry that created it.
 */
export interface PairRegistry {
    owner(): string;
    destroy(caller: string, nft: string, baseToken: string, merkleRoot: string): void;
}

export type BaseAsset =
    | { kind: 'native'; ledger: NativeLedger }
    | { kind: 'token'; ledger: BaseAssetLedger };

export interface PairDeps {
    base: BaseAsset;
    nft: NFTCollection;
    registry: PairRegistry;
    events: EventLog;
}

export interface PairIdentity {
    address: string;
    nft: string;
    baseToken: string;
    merkleRoot: string;
    name: string;
    symbol: string;
    lpName: string;
    lpSymbol: string;
}

export type PairStatus = 'open' | 'closing' | 'withdrawable';

export interface PairInfo {
    address: string;
    nft: string;
    baseToken: string;
    merkleRoot: string;
    lpToken: string;
    baseTokenReserves: bigint;
    fractionalTokenReserves: bigint;
    fractionalTokenSupply: bigint;
    lpTokenSupply: bigint;
    price: bigint | null;
    closeTimestamp: number;
    status: PairStatus;
}

export interface PairData {
    identity: PairIdentity;
    closeTimestamp: number;
    fractional: FungibleLedgerData;
    lpToken: FungibleLedgerData;
}

// ========== PAIR ==========

export class Pair implements Journaled {
    readonly address: string;
    readonly nft: string;
    readonly baseToken: string;
    readonly merkleRoot: string;
    readonly lpToken: ShareToken;

    private readonly identity: PairIdentity;
    private readonly deps: PairDeps;
    private readonly fractional: FungibleLedger;
    private closeTs: number = 0;

    constructor(identity: PairIdentity, deps: PairDeps) {
        if (isNativeAsset(identity.baseToken) !== (deps.base.kind === 'native')) {
            throw new InvalidInputError(`Base asset ${identity.baseToken} does not match the supplied ledger`);
        }

        this.identity = identity;
        this.deps = deps;
        this.address = identity.address;
        this.nft = identity.nft;
        this.baseToken = identity.baseToken;
        this.merkleRoot = identity.merkleRoot;
        this.fractional = new FungibleLedger({
            address: identity.address,
            name: identity.name,
            symbol: identity.symbol,
            decimals: FRACTIONAL_DECIMALS,
            minter: identity.address,
        });
        this.lpToken = new ShareToken(
            deriveAddress('lp', identity.address),
            identity.address,
            identity.lpName,
            identity.lpSymbol
        );
    }

    // ========== FRACTIONAL TOKEN VIEWS ==========

    get name(): string {
        return this.fractional.name;
    }

    get symbol(): string {
        return this.fractional.symbol;
    }

    get decimals(): number {
        return this.fractional.decimals;
    }

    totalSupply(): bigint {
        return this.fractional.totalSupply();
    }

    balanceOf(owner: string): bigint {
        return this.fractional.balanceOf(owner);
    }

    allowance(owner: string, spender: string): bigint {
        return this.fractional.allowance(owner, spender);
    }

    // ========== FRACTIONAL TOKEN TRANSFERS ==========

    transfer(ctx: CallContext, to: string, amount: bigint): boolean {
        this.requireNoValue(ctx);
        return this.fractional.transfer(ctx.sender, to, amount);
    }

    approve(ctx: CallContext, spender: string, amount: bigint): boolean {
        this.requireNoValue(ctx);
        return this.fractional.approve(ctx.sender, spender, amount);
    }

    transferFrom(ctx: CallContext, from: string, to: string, amount: bigint): boolean {
        this.requireNoValue(ctx);
        return this.fractional.transferFrom(ctx.sender, from, to, amount);
    }

    // ========== RESERVES & QUOTES ==========

    /**
     * Base asset held by the pair. `attachedValue` is the native value that
     * arrived with the current call and is not yet part of the reserves.
     */
    baseTokenReserves(attachedValue: bigint = 0n): bigint {
        const base = this.deps.base;
        if (base.kind === 'native') {
            return base.ledger.balanceOf(this.address) - attachedValue;
        }
        return base.ledger.balanceOf(this.address);
    }

    fractionalTokenReserves(): bigint {
        return this.fractional.balanceOf(this.address);
    }

    /**
     * Base units per ONE fractional unit. Throws on an empty fractional reserve.
     */
    price(): bigint {
        return spotPrice(this.reserves());
    }

    buyQuote(outputAmount: bigint): bigint {
        return quoteBuy(outputAmount, this.reserves());
    }

    sellQuote(inputAmount: bigint): bigint {
        return quoteSell(inputAmount, this.reserves());
    }

    addQuote(baseTokenAmount: bigint, fractionalTokenAmount: bigint): bigint {
        return quoteAdd(baseTokenAmount, fractionalTokenAmount, this.reserves(), this.lpToken.totalSupply());
    }

    removeQuote(lpTokenAmount: bigint): RemoveQuote {
        return quoteRemove(lpTokenAmount, this.reserves(), this.lpToken.totalSupply());
    }

    // ========== LIQUIDITY ==========

    /**
     * Deposit base asset and fractional units, receive share units.
     */
    add(ctx: CallContext, baseTokenAmount: bigint, fractionalTokenAmount: bigint, minLpTokenAmount: bigint): bigint {
        if (baseTokenAmount <= 0n || fractionalTokenAmount <= 0n) {
            throw new InvalidInputError('Input token amount is zero');
        }
        this.requireAttachedValue(ctx, baseTokenAmount);

        const lpTokenAmount = quoteAdd(
            baseTokenAmount,
            fractionalTokenAmount,
            this.reserves(ctx),
            this.lpToken.totalSupply()
        );
        if (lpTokenAmount < minLpTokenAmount) {
            throw new SlippageError('min', 'lp token amount out', minLpTokenAmount, lpTokenAmount);
        }

        this.fractional.move(ctx.sender, this.address, fractionalTokenAmount);

        this.lpToken.mint(this.address, ctx.sender, lpTokenAmount);
        if (this.deps.base.kind === 'token') {
            this.deps.base.ledger.transferFrom(this.address, ctx.sender, this.address, baseTokenAmount);
        }

        this.emit({ type: 'Add', baseTokenAmount, fractionalTokenAmount, lpTokenAmount });
        log.info(`➕ Add ${this.symbol}: ${baseTokenAmount} base + ${fractionalTokenAmount} fractional = ${lpTokenAmount} LP`);
        return lpTokenAmount;
    }

    /**
     * Burn share units, receive the proportional part of both reserves.
     */
    remove(
        ctx: CallContext,
        lpTokenAmount: bigint,
        minBaseTokenOutputAmount: bigint,
        minFractionalTokenOutputAmount: bigint
    ): RemoveQuote {
        this.requireNoValue(ctx);
        return this.doRemove(ctx, lpTokenAmount, minBaseTokenOutputAmount, minFractionalTokenOutputAmount);
    }

    // ========== SWAPS ==========

    /**
     * Buy exactly `outputAmount` fractional units for at most `maxInputAmount`
     * base. Native callers attach `maxInputAmount` and get the excess back.
     */
    buy(ctx: CallContext, outputAmount: bigint, maxInputAmount: bigint): bigint {
        this.requireAttachedValue(ctx, maxInputAmount);

        const inputAmount = quoteBuy(outputAmount, this.reserves(ctx));
        if (inputAmount > maxInputAmount) {
            throw new SlippageError('max', 'base token input', maxInputAmount, inputAmount);
        }

        this.fractional.move(this.address, ctx.sender, outputAmount);

        const base = this.deps.base;
        if (base.kind === 'native') {
            const refund = maxInputAmount - inputAmount;
            if (refund > 0n) base.ledger.transfer(this.address, ctx.sender, refund);
        } else {
            base.ledger.transferFrom(this.address, ctx.sender, this.address, inputAmount);
        }

        this.emit({ type: 'Buy', inputAmount, outputAmount });
        log.info(`💱 Buy ${this.symbol}: ${inputAmount} base → ${outputAmount} fractional`);
        return inputAmount;
    }

    /**
     * Sell exactly `inputAmount` fractional units for at least `minOutputAmount` base.
     */
    sell(ctx: CallContext, inputAmount: bigint, minOutputAmount: bigint): bigint {
        this.requireNoValue(ctx);
        return this.doSell(ctx, inputAmount, minOutputAmount);
    }

    // ========== WRAP / UNWRAP ==========

    /**
     * Deposit items, receive ONE fractional unit per item.
     * `proofs[i]` proves `itemIds[i]` against the allow-list root.
     */
    wrap(ctx: CallContext, itemIds: bigint[], proofs: Proof[] = []): bigint {
        this.requireNoValue(ctx);
        return this.doWrap(ctx, itemIds, proofs);
    }

    /**
     * Burn ONE fractional unit per item and take the items out.
     */
    unwrap(ctx: CallContext, itemIds: bigint[]): bigint {
        this.requireNoValue(ctx);
        return this.doUnwrap(ctx, itemIds);
    }

    // ========== NFT COMPOSITES ==========

    nftAdd(
        ctx: CallContext,
        baseTokenAmount: bigint,
        itemIds: bigint[],
        minLpTokenAmount: bigint,
        proofs: Proof[] = []
    ): bigint {
        const fractionalTokenAmount = this.doWrap(ctx, itemIds, proofs);
        return this.add(ctx, baseTokenAmount, fractionalTokenAmount, minLpTokenAmount);
    }

    nftRemove(ctx: CallContext, lpTokenAmount: bigint, minBaseTokenOutputAmount: bigint, itemIds: bigint[]): RemoveQuote {
        this.requireNoValue(ctx);
        const result = this.doRemove(ctx, lpTokenAmount, minBaseTokenOutputAmount, BigInt(itemIds.length) * ONE);
        this.doUnwrap(ctx, itemIds);
        return result;
    }

    nftBuy(ctx: CallContext, itemIds: bigint[], maxInputAmount: bigint): bigint {
        const inputAmount = this.buy(ctx, BigInt(itemIds.length) * ONE, maxInputAmount);
        this.doUnwrap(ctx, itemIds);
        return inputAmount;
    }

    nftSell(ctx: CallContext, itemIds: bigint[], minOutputAmount: bigint, proofs: Proof[] = []): bigint {
        this.requireNoValue(ctx);
        const inputAmount = this.doWrap(ctx, itemIds, proofs);
        return this.doSell(ctx, inputAmount, minOutputAmount);
    }

    // ========== EMERGENCY EXIT ==========

    /**
     * Start the exit: wrapping stops for good and the identity is released
     * in the registry. Items become withdrawable after the grace period.
     */
    close(ctx: CallContext): number {
        this.requireNoValue(ctx);
        if (ctx.sender !== this.deps.registry.owner()) {
            throw new UnauthorizedError(ctx.sender, 'Close');
        }
        if (this.closeTs !== 0) {
            throw new PoolClosedError(`Pair ${this.address} already closed at ${this.closeTs}`);
        }

        this.closeTs = ctx.timestamp + CLOSE_GRACE_PERIOD;
        this.deps.registry.destroy(this.address, this.nft, this.baseToken, this.merkleRoot);

        this.emit({ type: 'Close', closeTimestamp: this.closeTs });
        log.warn(`🔒 Pair ${this.symbol} closed, withdrawable from ${this.closeTs}`);
        return this.closeTs;
    }

    /**
     * Operator takes a stranded item out once the grace period has passed.
     */
    withdraw(ctx: CallContext, itemId: bigint): void {
        this.requireNoValue(ctx);
        if (ctx.sender !== this.deps.registry.owner()) {
            throw new UnauthorizedError(ctx.sender, 'Withdraw');
        }
        if (this.closeTs === 0) {
            throw new TimingError('Withdraw not initiated');
        }
        if (ctx.timestamp < this.closeTs) {
            throw new TimingError(`Not withdrawable yet: ${ctx.timestamp} < ${this.closeTs}`);
        }

        this.deps.nft.safeTransferFrom(this.address, this.address, ctx.sender, itemId, ctx.timestamp);

        this.emit({ type: 'Withdraw', tokenId: itemId });
        log.warn(`📤 Withdraw ${this.symbol}: item #${itemId} to operator`);
    }

    get closeTimestamp(): number {
        return this.closeTs;
    }

    status(now: number): PairStatus {
        if (this.closeTs === 0) return 'open';
        return now >= this.closeTs ? 'withdrawable' : 'closing';
    }

    info(now: number): PairInfo {
        const reserves = this.reserves();
        return {
            address: this.address,
            nft: this.nft,
            baseToken: this.baseToken,
            merkleRoot: this.merkleRoot,
            lpToken: this.lpToken.address,
            baseTokenReserves: reserves.base,
            fractionalTokenReserves: reserves.fractional,
            fractionalTokenSupply: this.fractional.totalSupply(),
            lpTokenSupply: this.lpToken.totalSupply(),
            price: reserves.fractional > 0n ? spotPrice(reserves) : null,
            closeTimestamp: this.closeTs,
            status: this.status(now),
        };
    }

    // ========== OPERATION BODIES ==========

    private doRemove(
        ctx: CallContext,
        lpTokenAmount: bigint,
        minBaseTokenOutputAmount: bigint,
        minFractionalTokenOutputAmount: bigint
    ): RemoveQuote {
        const quote = quoteRemove(lpTokenAmount, this.reserves(ctx), this.lpToken.totalSupply());
        if (quote.baseTokenOutputAmount < minBaseTokenOutputAmount) {
            throw new SlippageError('min', 'base token output', minBaseTokenOutputAmount, quote.baseTokenOutputAmount);
        }
        if (quote.fractionalTokenOutputAmount < minFractionalTokenOutputAmount) {
            throw new SlippageError(
                'min',
                'fractional token output',
                minFractionalTokenOutputAmount,
                quote.fractionalTokenOutputAmount
            );
        }

        this.fractional.move(this.address, ctx.sender, quote.fractionalTokenOutputAmount);

        this.lpToken.burn(this.address, ctx.sender, lpTokenAmount);
        this.pushBase(ctx.sender, quote.baseTokenOutputAmount);

        this.emit({
            type: 'Remove',
            baseTokenAmount: quote.baseTokenOutputAmount,
            fractionalTokenAmount: quote.fractionalTokenOutputAmount,
            lpTokenAmount,
        });
        log.info(
            `➖ Remove ${this.symbol}: ${lpTokenAmount} LP → ${quote.baseTokenOutputAmount} base + ${quote.fractionalTokenOutputAmount} fractional`
        );
        return quote;
    }

    private doSell(ctx: CallContext, inputAmount: bigint, minOutputAmount: bigint): bigint {
        const outputAmount = quoteSell(inputAmount, this.reserves(ctx));
        if (outputAmount < minOutputAmount) {
            throw new SlippageError('min', 'base token output', minOutputAmount, outputAmount);
        }

        this.fractional.move(ctx.sender, this.address, inputAmount);

        this.pushBase(ctx.sender, outputAmount);

        this.emit({ type: 'Sell', inputAmount, outputAmount });
        log.info(`💱 Sell ${this.symbol}: ${inputAmount} fractional → ${outputAmount} base`);
        return outputAmount;
    }

    private doWrap(ctx: CallContext, itemIds: bigint[], proofs: Proof[]): bigint {
        if (this.closeTs !== 0) {
            throw new PoolClosedError('Wrap: closed');
        }

        // validate the whole batch before anything moves
        itemIds.forEach((itemId, i) => {
            if (!isEligible(this.merkleRoot, itemId, proofs[i] ?? [])) {
                throw new AllowListError(itemId);
            }
        });

        const fractionalTokenAmount = BigInt(itemIds.length) * ONE;
        this.fractional.mint(this.address, ctx.sender, fractionalTokenAmount);

        // duplicates are not filtered: the second transfer of an id fails on ownership
        for (const itemId of itemIds) {
            this.deps.nft.safeTransferFrom(this.address, ctx.sender, this.address, itemId, ctx.timestamp);
        }

        this.emit({ type: 'Wrap', tokenIds: [...itemIds] });
        log.info(`🎁 Wrap ${this.symbol}: ${itemIds.length} item(s) [${itemIds.join(', ')}]`);
        return fractionalTokenAmount;
    }

    private doUnwrap(ctx: CallContext, itemIds: bigint[]): bigint {
        const fractionalTokenAmount = BigInt(itemIds.length) * ONE;
        this.fractional.burn(this.address, ctx.sender, fractionalTokenAmount);

        for (const itemId of itemIds) {
            this.deps.nft.safeTransferFrom(this.address, this.address, ctx.sender, itemId, ctx.timestamp);
        }

        this.emit({ type: 'Unwrap', tokenIds: [...itemIds] });
        log.info(`📦 Unwrap ${this.symbol}: ${itemIds.length} item(s) [${itemIds.join(', ')}]`);
        return fractionalTokenAmount;
    }

    // ========== INTERNALS ==========

    private reserves(ctx?: CallContext): Reserves {
        return {
            base: this.baseTokenReserves(ctx ? this.attachedValue(ctx) : 0n),
            fractional: this.fractionalTokenReserves(),
        };
    }

    private pushBase(to: string, amount: bigint): void {
        this.deps.base.ledger.transfer(this.address, to, amount);
    }

    private requireAttachedValue(ctx: CallContext, expected: bigint): void {
        const required = this.deps.base.kind === 'native' ? expected : 0n;
        if (this.attachedValue(ctx) !== required) {
            throw new InvalidInputError(`Invalid native input: attached ${ctx.value}, expected ${required}`);
        }
    }

    /**
     * Native value paid to this pair by the current call. Value sent to any
     * other account is rejected.
     */
    private attachedValue(ctx: CallContext): bigint {
        if (ctx.value !== 0n && ctx.target !== this.address) {
            throw new InvalidInputError(
                `Native value ${ctx.value} was sent to ${ctx.target ?? 'no account'}, not to pair ${this.address}`
            );
        }
        return ctx.value;
    }

    private requireNoValue(ctx: CallContext): void {
        if (ctx.value !== 0n) {
            throw new InvalidInputError(`Call does not accept native value (attached ${ctx.value})`);
        }
    }

    private emit(event: DistributiveOmit<PoolEvent, 'address'>): void {
        this.deps.events.emit({ ...event, address: this.address });
    }

    // ========== JOURNAL ==========

    checkpoint(): Rollback {
        const closeTs = this.closeTs;
        const ledgers = checkpointAll([this.fractional, this.lpToken]);
        return () => {
            ledgers();
            this.closeTs = closeTs;
        };
    }

    // ========== SERIALIZATION ==========

    toJSON(): PairData {
        return {
            identity: { ...this.identity },
            closeTimestamp: this.closeTs,
            fractional: this.fractional.toJSON(),
            lpToken: this.lpToken.toJSON(),
        };
    }

    static fromJSON(data: PairData, deps: PairDeps): Pair {
        const pair = new Pair(data.identity, deps);
        pair.closeTs = data.closeTimestamp;
        pair.fractional.loadData(data.fractional);
        pair.lpToken.loadData(data.lpToken);
        return pair;
    }
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;
