import { Chain } from '../src/protocol/chain/Chain.js';
import { ManualClock } from '../src/protocol/chain/Clock.js';
import type { CallContext } from '../src/protocol/chain/context.js';
import { MAX_UINT256, NATIVE_ASSET, ONE, ZERO_ROOT } from '../src/protocol/params/pool.js';
import type { FungibleLedger } from '../src/runtime/ledger/FungibleLedger.js';
import type { NFTCollection } from '../src/runtime/nft/NFTCollection.js';
import type { Pair } from '../src/runtime/pool/Pair.js';

export const OPERATOR = `0x${'0a'.repeat(20)}`;
export const CREATOR = `0x${'c0'.repeat(20)}`;
export const ALICE = `0x${'a1'.repeat(20)}`;
export const BOB = `0x${'b0'.repeat(20)}`;

export const START = 1_700_000_000;
export const FUNDS = 1000n * ONE;

export interface World {
    clock: ManualClock;
    chain: Chain;
    apes: NFTCollection;
    usd: FungibleLedger;
    pair: Pair;
}

/**
 * Chain with one collection (items 1..10 owned by ALICE), one open-mint
 * token, funded ALICE/BOB and a pair that both have approved for items
 * and tokens.
 */
export function createWorld(options: { root?: string; base?: 'native' | 'token' } = {}): World {
    const clock = new ManualClock(START);
    const chain = new Chain({ operator: OPERATOR, clock });
    const apes = chain.deployCollection('Apes', 'APE', CREATOR);
    const usd = chain.deployToken('Dollar', 'USD');

    chain.execute({ sender: CREATOR }, ctx => {
        for (let id = 1n; id <= 10n; id++) apes.mint(ctx.sender, ALICE, id, ctx.timestamp);
    });
    chain.native.credit(ALICE, FUNDS);
    chain.native.credit(BOB, FUNDS);
    chain.execute({ sender: ALICE }, ctx => {
        usd.mint(ctx.sender, ALICE, FUNDS);
        usd.mint(ctx.sender, BOB, FUNDS);
    });

    const baseToken = options.base === 'token' ? usd.address : NATIVE_ASSET;
    const root = options.root ?? ZERO_ROOT;
    const pair = chain.execute({ sender: ALICE }, ctx => chain.factory.create(ctx, apes.address, baseToken, root)).result;

    for (const holder of [ALICE, BOB]) {
        apes.setApprovalForAll(holder, pair.address, true);
        usd.approve(holder, pair.address, MAX_UINT256);
    }
    return { clock, chain, apes, usd, pair };
}

/**
 * One call against the world's pair, `value` attached as native currency.
 */
export function call<T>(world: World, sender: string, fn: (ctx: CallContext) => T, value: bigint = 0n) {
    return world.chain.execute({ sender, to: world.pair.address, value }, fn);
}

/**
 * Value each operation needs attached for the world's base asset.
 */
export function attach(world: World, amount: bigint): bigint {
    return world.pair.baseToken === NATIVE_ASSET ? amount : 0n;
}

/**
 * ALICE wraps item 1 and seeds the pool with 1000 base / 1000 fractional units.
 */
export function seed(world: World): void {
    call(world, ALICE, ctx => world.pair.wrap(ctx, [1n]));
    call(world, ALICE, ctx => world.pair.add(ctx, 1000n, 1000n, 0n), attach(world, 1000n));
}

export function thrown(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    throw new Error('Expected the call to throw');
}
