import { describe, it, expect, beforeEach } from 'vitest';
import {
    AllowListError,
    InvalidInputError,
    MathError,
    PoolClosedError,
    SlippageError,
    TimingError,
    TransferError,
    UnauthorizedError,
} from '../../src/protocol/errors.js';
import { CLOSE_GRACE_PERIOD, NATIVE_ASSET, ONE, ZERO_ROOT } from '../../src/protocol/params/pool.js';
import { AllowListTree } from '../../src/runtime/pool/AllowList.js';
import { ALICE, BOB, FUNDS, OPERATOR, START, type World, call, createWorld, seed, thrown } from '../helpers.js';

describe('Pair (native base)', () => {
    let world: World;

    beforeEach(() => {
        world = createWorld();
    });

    describe('liquidity', () => {
        it('mints sqrt(base * fractional) on an empty pool', () => {
            const { pair, chain } = world;
            call(world, ALICE, ctx => pair.wrap(ctx, [1n]));
            const receipt = call(world, ALICE, ctx => pair.add(ctx, 1000n, 1000n, 0n), 1000n);

            expect(receipt.result).toBe(1000n);
            expect(pair.lpToken.balanceOf(ALICE)).toBe(1000n);
            expect(pair.baseTokenReserves()).toBe(1000n);
            expect(pair.fractionalTokenReserves()).toBe(1000n);
            expect(chain.native.balanceOf(ALICE)).toBe(FUNDS - 1000n);
            expect(receipt.events).toEqual([
                { type: 'Add', address: pair.address, baseTokenAmount: 1000n, fractionalTokenAmount: 1000n, lpTokenAmount: 1000n },
            ]);
        });

        it('mints the smaller proportional share on later deposits', () => {
            const { pair } = world;
            seed(world);
            call(world, BOB, ctx => pair.buy(ctx, 100n, 111n), 111n);

            // reserves 1111 / 900, supply 1000: min(1111*1000/1111, 90*1000/900)
            const receipt = call(world, BOB, ctx => pair.add(ctx, 1111n, 90n, 0n), 1111n);
            expect(receipt.result).toBe(100n);
            expect(pair.lpToken.totalSupply()).toBe(1100n);
        });

        it('rejects a deposit under the minimum share output', () => {
            const { pair, chain } = world;
            seed(world);
            call(world, BOB, ctx => pair.buy(ctx, 100n, 111n), 111n);

            const error = thrown(() => call(world, BOB, ctx => pair.add(ctx, 1111n, 90n, 101n), 1111n));
            expect(error).toBeInstanceOf(SlippageError);
            expect(error).toMatchObject({ message: 'Slippage: lp token amount out 100 below minimum 101' });
            expect(chain.native.balanceOf(BOB)).toBe(FUNDS - 111n);
        });

        it('rejects zero amounts', () => {
            expect(() => call(world, ALICE, ctx => world.pair.add(ctx, 0n, 10n, 0n))).toThrow('Input token amount is zero');
        });

        it('requires the attached value to match the base amount', () => {
            call(world, ALICE, ctx => world.pair.wrap(ctx, [1n]));
            expect(() => call(world, ALICE, ctx => world.pair.add(ctx, 1000n, 1000n, 0n), 999n)).toThrow(
                'Invalid native input: attached 999, expected 1000'
            );
        });

        it('pays out both reserves on remove', () => {
            const { pair, chain } = world;
            seed(world);
            const receipt = call(world, ALICE, ctx => pair.remove(ctx, 500n, 0n, 0n));

            expect(receipt.result).toEqual({ baseTokenOutputAmount: 500n, fractionalTokenOutputAmount: 500n });
            expect(pair.lpToken.balanceOf(ALICE)).toBe(500n);
            expect(pair.baseTokenReserves()).toBe(500n);
            expect(pair.fractionalTokenReserves()).toBe(500n);
            expect(chain.native.balanceOf(ALICE)).toBe(FUNDS - 500n);
        });

        it('rejects a remove under the minimum base output', () => {
            seed(world);
            expect(() => call(world, ALICE, ctx => world.pair.remove(ctx, 500n, 501n, 0n))).toThrow(
                'Slippage: base token output 500 below minimum 501'
            );
            expect(world.pair.lpToken.balanceOf(ALICE)).toBe(1000n);
        });
    });

    describe('swaps', () => {
        beforeEach(() => {
            seed(world);
        });

        it('quotes and executes the reference buy', () => {
            const { pair, chain } = world;
            expect(pair.buyQuote(100n)).toBe(111n);

            const receipt = call(world, BOB, ctx => pair.buy(ctx, 100n, 111n), 111n);
            expect(receipt.result).toBe(111n);
            expect(pair.balanceOf(BOB)).toBe(100n);
            expect(chain.native.balanceOf(BOB)).toBe(FUNDS - 111n);
            expect(pair.baseTokenReserves()).toBe(1111n);
            expect(pair.fractionalTokenReserves()).toBe(900n);
        });

        it('refunds the exact difference between maxIn and the quote', () => {
            const { pair, chain } = world;
            call(world, BOB, ctx => pair.buy(ctx, 100n, 200n), 200n);
            expect(chain.native.balanceOf(BOB)).toBe(FUNDS - 111n);
            expect(pair.baseTokenReserves()).toBe(1111n);
        });

        it('rejects a buy above maxIn and restores the attached value', () => {
            const { pair, chain } = world;
            const error = thrown(() => call(world, BOB, ctx => pair.buy(ctx, 100n, 110n), 110n));

            expect(error).toBeInstanceOf(SlippageError);
            expect(error).toMatchObject({ bound: 'max', limit: 110n, actual: 111n });
            expect(chain.native.balanceOf(BOB)).toBe(FUNDS);
            expect(pair.baseTokenReserves()).toBe(1000n);
            expect(pair.balanceOf(BOB)).toBe(0n);
        });

        it('rejects a buy whose attached value differs from maxIn', () => {
            const error = thrown(() => call(world, BOB, ctx => world.pair.buy(ctx, 100n, 111n)));
            expect(error).toBeInstanceOf(InvalidInputError);
            expect(error).toMatchObject({ message: 'Invalid native input: attached 0, expected 111' });
        });

        it('rejects a buy whose value was paid to another account', () => {
            const { pair, chain } = world;
            const error = thrown(() =>
                chain.execute({ sender: BOB, to: BOB, value: 200n }, ctx => pair.buy(ctx, 100n, 200n))
            );

            expect(error).toBeInstanceOf(InvalidInputError);
            expect(error).toMatchObject({
                message: `Native value 200 was sent to ${BOB}, not to pair ${pair.address}`,
            });
            expect(chain.native.balanceOf(BOB)).toBe(FUNDS);
            expect(pair.balanceOf(BOB)).toBe(0n);
            expect(pair.baseTokenReserves()).toBe(1000n);
            expect(pair.fractionalTokenReserves()).toBe(1000n);
        });

        it('rejects a deposit whose value was paid to another account', () => {
            const { pair, chain } = world;
            const error = thrown(() =>
                chain.execute({ sender: ALICE, to: BOB, value: 1000n }, ctx => pair.add(ctx, 1000n, 1000n, 0n))
            );

            expect(error).toBeInstanceOf(InvalidInputError);
            expect(chain.native.balanceOf(BOB)).toBe(FUNDS);
            expect(pair.lpToken.totalSupply()).toBe(1000n);
            expect(pair.baseTokenReserves()).toBe(1000n);
        });

        it('sells with the fee applied to the input', () => {
            const { pair, chain } = world;
            expect(pair.sellQuote(100n)).toBe(90n);

            const receipt = call(world, ALICE, ctx => pair.sell(ctx, 100n, 90n));
            expect(receipt.result).toBe(90n);
            expect(chain.native.balanceOf(ALICE)).toBe(FUNDS - 1000n + 90n);
            expect(pair.balanceOf(ALICE)).toBe(ONE - 1100n);
            expect(pair.baseTokenReserves()).toBe(910n);
            expect(pair.fractionalTokenReserves()).toBe(1100n);
            expect(receipt.events).toEqual([{ type: 'Sell', address: pair.address, inputAmount: 100n, outputAmount: 90n }]);
        });

        it('rejects a sell under minOut', () => {
            expect(() => call(world, ALICE, ctx => world.pair.sell(ctx, 100n, 91n))).toThrow(
                'Slippage: base token output 90 below minimum 91'
            );
        });

        it('rejects native value on a sell', () => {
            expect(() => call(world, ALICE, ctx => world.pair.sell(ctx, 100n, 0n), 1n)).toThrow(InvalidInputError);
            expect(world.chain.native.balanceOf(ALICE)).toBe(FUNDS - 1000n);
        });

        it('fails a sell larger than the seller balance', () => {
            const error = thrown(() => call(world, BOB, ctx => world.pair.sell(ctx, 1n, 0n)));
            expect(error).toBeInstanceOf(MathError);
            expect(world.pair.baseTokenReserves()).toBe(1000n);
        });
    });

    describe('reserve product', () => {
        it('never decreases across buys and sells', () => {
            const { pair } = world;
            call(world, ALICE, ctx => pair.wrap(ctx, [1n, 2n, 3n, 4n, 5n, 6n, 7n, 8n, 9n, 10n]));
            call(world, ALICE, ctx => pair.add(ctx, 10n * ONE, 5n * ONE, 0n), 10n * ONE);

            const product = () => pair.baseTokenReserves() * pair.fractionalTokenReserves();
            let last = product();

            call(world, BOB, ctx => pair.buy(ctx, ONE, 10n * ONE), 10n * ONE);
            expect(product() >= last).toBe(true);
            last = product();

            call(world, ALICE, ctx => pair.sell(ctx, 2n * ONE, 0n));
            expect(product() >= last).toBe(true);
            last = product();

            call(world, BOB, ctx => pair.sell(ctx, ONE / 2n, 0n));
            expect(product() >= last).toBe(true);
        });
    });

    describe('wrap / unwrap', () => {
        it('mints ONE per item and returns the items on unwrap', () => {
            const { pair, apes } = world;
            const wrapped = call(world, ALICE, ctx => pair.wrap(ctx, [5n, 7n]));

            expect(wrapped.result).toBe(2n * ONE);
            expect(pair.balanceOf(ALICE)).toBe(2n * ONE);
            expect(pair.totalSupply()).toBe(2n * ONE);
            expect(apes.ownerOf(5n)).toBe(pair.address);
            expect(apes.ownerOf(7n)).toBe(pair.address);
            expect(wrapped.events).toEqual([{ type: 'Wrap', address: pair.address, tokenIds: [5n, 7n] }]);

            const unwrapped = call(world, ALICE, ctx => pair.unwrap(ctx, [5n, 7n]));
            expect(unwrapped.result).toBe(2n * ONE);
            expect(pair.balanceOf(ALICE)).toBe(0n);
            expect(pair.totalSupply()).toBe(0n);
            expect(apes.ownerOf(5n)).toBe(ALICE);
            expect(apes.ownerOf(7n)).toBe(ALICE);
            expect(pair.fractionalTokenReserves()).toBe(0n);
        });

        it('needs the pair to be approved for the items', () => {
            world.apes.setApprovalForAll(ALICE, world.pair.address, false);
            expect(() => call(world, ALICE, ctx => world.pair.wrap(ctx, [5n]))).toThrow(TransferError);
            expect(world.pair.balanceOf(ALICE)).toBe(0n);
        });

        it('aborts the whole batch on a duplicate id', () => {
            const { pair, apes } = world;
            expect(() => call(world, ALICE, ctx => pair.wrap(ctx, [5n, 5n]))).toThrow(TransferError);
            expect(apes.ownerOf(5n)).toBe(ALICE);
            expect(pair.totalSupply()).toBe(0n);
        });

        it('fails an unwrap without enough fractional units', () => {
            const { pair, apes } = world;
            call(world, ALICE, ctx => pair.wrap(ctx, [5n]));
            expect(() => call(world, BOB, ctx => pair.unwrap(ctx, [5n]))).toThrow(MathError);
            expect(apes.ownerOf(5n)).toBe(pair.address);
        });
    });

    describe('composites', () => {
        beforeEach(() => {
            const { pair } = world;
            call(world, ALICE, ctx => pair.wrap(ctx, [1n, 2n, 3n]));
            call(world, ALICE, ctx => pair.add(ctx, 3n * ONE, 3n * ONE, 0n), 3n * ONE);
        });

        it('nftBuy buys ONE per item and unwraps them', () => {
            const { pair, apes, chain } = world;
            const expected = pair.buyQuote(ONE);
            expect(expected).toBe(1504513540621865596n);

            const receipt = call(world, BOB, ctx => pair.nftBuy(ctx, [2n], 2n * ONE), 2n * ONE);
            expect(receipt.result).toBe(expected);
            expect(apes.ownerOf(2n)).toBe(BOB);
            expect(pair.balanceOf(BOB)).toBe(0n);
            expect(chain.native.balanceOf(BOB)).toBe(FUNDS - expected);
            expect(receipt.events.map(e => e.type)).toEqual(['Buy', 'Unwrap']);
        });

        it('nftBuy moves nothing when the quote exceeds maxIn', () => {
            const { pair, apes, chain } = world;
            expect(() => call(world, BOB, ctx => pair.nftBuy(ctx, [3n], 1n), 1n)).toThrow(SlippageError);
            expect(apes.ownerOf(3n)).toBe(pair.address);
            expect(chain.native.balanceOf(BOB)).toBe(FUNDS);
        });

        it('nftSell wraps the items and sells ONE per item', () => {
            const { pair, apes } = world;
            const expected = pair.sellQuote(2n * ONE);

            const receipt = call(world, ALICE, ctx => pair.nftSell(ctx, [4n, 5n], 0n));
            expect(receipt.result).toBe(expected);
            expect(apes.ownerOf(4n)).toBe(pair.address);
            expect(pair.balanceOf(ALICE)).toBe(0n);
            expect(pair.fractionalTokenReserves()).toBe(5n * ONE);
            expect(receipt.events.map(e => e.type)).toEqual(['Wrap', 'Sell']);
        });

        it('nftAdd wraps the items and deposits them as liquidity', () => {
            const { pair, apes } = world;
            const expected = pair.addQuote(ONE, ONE);

            const receipt = call(world, ALICE, ctx => pair.nftAdd(ctx, ONE, [6n], 0n), ONE);
            expect(receipt.result).toBe(expected);
            expect(apes.ownerOf(6n)).toBe(pair.address);
            expect(pair.lpToken.balanceOf(ALICE)).toBe(3n * ONE + expected);
            expect(receipt.events.map(e => e.type)).toEqual(['Wrap', 'Add']);
        });

        it('nftRemove removes liquidity and unwraps the chosen items', () => {
            const { pair, apes } = world;
            const lp = pair.lpToken.balanceOf(ALICE);
            const quote = pair.removeQuote(lp);

            const receipt = call(world, ALICE, ctx => pair.nftRemove(ctx, lp, 0n, [1n, 3n]));
            expect(receipt.result).toEqual(quote);
            expect(apes.ownerOf(1n)).toBe(ALICE);
            expect(apes.ownerOf(3n)).toBe(ALICE);
            expect(pair.balanceOf(ALICE)).toBe(quote.fractionalTokenOutputAmount - 2n * ONE);
            expect(pair.lpToken.balanceOf(ALICE)).toBe(0n);
        });

        it('nftRemove requires ONE fractional unit per item from the remove', () => {
            const { pair } = world;
            // a third of the shares yields exactly ONE fractional unit
            expect(() => call(world, ALICE, ctx => pair.nftRemove(ctx, ONE, 0n, [1n, 2n]))).toThrow(
                `Slippage: fractional token output ${ONE} below minimum ${2n * ONE}`
            );
            expect(pair.lpToken.balanceOf(ALICE)).toBe(3n * ONE);
        });
    });

    describe('fractional token surface', () => {
        it('names the ledgers after the collection and base asset', () => {
            const { pair } = world;
            expect(pair.name).toBe('APE fractional token');
            expect(pair.symbol).toBe('fAPE');
            expect(pair.decimals).toBe(18);
            expect(pair.lpToken.name).toBe('APE:ETH LP token');
            expect(pair.lpToken.symbol).toBe('LP-APE:ETH');
        });

        it('transfers and delegates fractional units', () => {
            const { pair } = world;
            call(world, ALICE, ctx => pair.wrap(ctx, [1n]));
            call(world, ALICE, ctx => pair.transfer(ctx, BOB, 10n));
            call(world, ALICE, ctx => pair.approve(ctx, BOB, 5n));
            call(world, BOB, ctx => pair.transferFrom(ctx, ALICE, BOB, 5n));

            expect(pair.balanceOf(BOB)).toBe(15n);
            expect(pair.balanceOf(ALICE)).toBe(ONE - 15n);
            expect(pair.allowance(ALICE, BOB)).toBe(0n);
            expect(() => call(world, BOB, ctx => pair.transferFrom(ctx, ALICE, BOB, 1n))).toThrow(TransferError);
        });
    });

    describe('info', () => {
        it('reports no price on an empty pool', () => {
            const info = world.pair.info(START);
            expect(info.price).toBeNull();
            expect(info.status).toBe('open');
            expect(info.baseToken).toBe(NATIVE_ASSET);
            expect(info.merkleRoot).toBe(ZERO_ROOT);
        });

        it('reports reserves, supplies and price', () => {
            seed(world);
            expect(world.pair.info(START)).toMatchObject({
                baseTokenReserves: 1000n,
                fractionalTokenReserves: 1000n,
                fractionalTokenSupply: ONE,
                lpTokenSupply: 1000n,
                price: ONE,
                closeTimestamp: 0,
            });
        });
    });
});

describe('Pair (token base)', () => {
    let world: World;

    beforeEach(() => {
        world = createWorld({ base: 'token' });
        seed(world);
    });

    it('pulls base tokens through the allowance', () => {
        const { pair, usd } = world;
        expect(usd.balanceOf(pair.address)).toBe(1000n);
        expect(usd.balanceOf(ALICE)).toBe(FUNDS - 1000n);
        expect(pair.lpToken.symbol).toBe('LP-APE:USD');

        call(world, BOB, ctx => pair.buy(ctx, 100n, 111n));
        expect(usd.balanceOf(pair.address)).toBe(1111n);
        expect(usd.balanceOf(BOB)).toBe(FUNDS - 111n);
    });

    it('pushes base tokens on remove', () => {
        const { pair, usd } = world;
        call(world, BOB, ctx => pair.buy(ctx, 100n, 111n));
        const receipt = call(world, ALICE, ctx => pair.remove(ctx, 1000n, 0n, 0n));

        expect(receipt.result).toEqual({ baseTokenOutputAmount: 1111n, fractionalTokenOutputAmount: 900n });
        expect(usd.balanceOf(ALICE)).toBe(FUNDS - 1000n + 1111n);
        expect(usd.balanceOf(pair.address)).toBe(0n);
    });

    it('rejects native value', () => {
        call(world, ALICE, ctx => world.pair.wrap(ctx, [2n]));
        expect(() => call(world, ALICE, ctx => world.pair.add(ctx, 5n, 5n, 0n), 5n)).toThrow(
            'Invalid native input: attached 5, expected 0'
        );
    });

    it('fails a buy without enough allowance', () => {
        const { pair, usd } = world;
        usd.approve(BOB, pair.address, 100n);
        expect(() => call(world, BOB, ctx => pair.buy(ctx, 100n, 111n))).toThrow(TransferError);
        expect(pair.balanceOf(BOB)).toBe(0n);
    });
});

describe('Pair allow-list', () => {
    const tree = new AllowListTree([1n, 2n, 3n]);
    let world: World;

    beforeEach(() => {
        world = createWorld({ root: tree.root });
    });

    it('wraps items with valid proofs', () => {
        const { pair, apes } = world;
        call(world, ALICE, ctx => pair.wrap(ctx, [2n, 3n], [tree.proof(2n), tree.proof(3n)]));
        expect(apes.ownerOf(2n)).toBe(pair.address);
        expect(pair.balanceOf(ALICE)).toBe(2n * ONE);
    });

    it('aborts the whole batch on one unverifiable proof', () => {
        const { pair, apes } = world;
        const error = thrown(() => call(world, ALICE, ctx => pair.wrap(ctx, [1n, 4n], [tree.proof(1n), tree.proof(2n)])));

        expect(error).toBeInstanceOf(AllowListError);
        expect(error).toMatchObject({ message: 'Invalid allow-list proof for item #4', itemId: 4n });
        expect(apes.ownerOf(1n)).toBe(ALICE);
        expect(pair.balanceOf(ALICE)).toBe(0n);
    });

    it('rejects a missing proof', () => {
        expect(() => call(world, ALICE, ctx => world.pair.wrap(ctx, [3n]))).toThrow(AllowListError);
    });

    it('checks nft composites against the allow-list too', () => {
        expect(() => call(world, ALICE, ctx => world.pair.nftSell(ctx, [5n], 0n, [tree.proof(1n)]))).toThrow(
            AllowListError
        );
    });
});

describe('Pair emergency exit', () => {
    let world: World;

    beforeEach(() => {
        world = createWorld();
        seed(world);
    });

    it('lets only the operator close', () => {
        const error = thrown(() => call(world, BOB, ctx => world.pair.close(ctx)));
        expect(error).toBeInstanceOf(UnauthorizedError);
        expect(error).toMatchObject({ message: `Close: caller ${BOB} is not authorized` });
        expect(world.pair.closeTimestamp).toBe(0);
    });

    it('fails a withdraw that was never initiated', () => {
        expect(() => call(world, OPERATOR, ctx => world.pair.withdraw(ctx, 1n))).toThrow('Withdraw not initiated');
    });

    it('closes, deregisters and blocks wrapping', () => {
        const { pair, chain, apes } = world;
        const receipt = call(world, OPERATOR, ctx => pair.close(ctx));

        expect(receipt.result).toBe(START + CLOSE_GRACE_PERIOD);
        expect(pair.closeTimestamp).toBe(START + CLOSE_GRACE_PERIOD);
        expect(receipt.events.map(e => e.type)).toEqual(['Destroy', 'Close']);
        expect(chain.factory.getPair(apes.address, NATIVE_ASSET, ZERO_ROOT)).toBeUndefined();
        expect(pair.status(chain.now())).toBe('closing');

        expect(() => call(world, ALICE, ctx => pair.wrap(ctx, [2n]))).toThrow(PoolClosedError);
        expect(() => call(world, OPERATOR, ctx => pair.close(ctx))).toThrow(PoolClosedError);
    });

    it('keeps trading open while closing', () => {
        const { pair } = world;
        call(world, OPERATOR, ctx => pair.close(ctx));
        expect(call(world, BOB, ctx => pair.buy(ctx, 100n, 111n), 111n).result).toBe(111n);
    });

    it('withdraws only after the grace period and only for the operator', () => {
        const { pair, chain, clock, apes } = world;
        call(world, OPERATOR, ctx => pair.close(ctx));

        clock.set(START + CLOSE_GRACE_PERIOD - 1);
        const early = thrown(() => call(world, OPERATOR, ctx => pair.withdraw(ctx, 1n)));
        expect(early).toBeInstanceOf(TimingError);
        expect(early).toMatchObject({
            message: `Not withdrawable yet: ${START + CLOSE_GRACE_PERIOD - 1} < ${START + CLOSE_GRACE_PERIOD}`,
        });

        clock.advance(1);
        expect(pair.status(chain.now())).toBe('withdrawable');
        expect(() => call(world, BOB, ctx => pair.withdraw(ctx, 1n))).toThrow(UnauthorizedError);

        const receipt = call(world, OPERATOR, ctx => pair.withdraw(ctx, 1n));
        expect(apes.ownerOf(1n)).toBe(OPERATOR);
        expect(receipt.events).toEqual([{ type: 'Withdraw', address: pair.address, tokenId: 1n }]);
    });
});
