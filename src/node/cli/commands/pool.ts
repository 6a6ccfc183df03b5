/**
 * Pool CLI Commands
 * Pair creation, liquidity, swaps, wrapping and the emergency exit
 */

import { Command } from 'commander';
import { isNativeAsset, NATIVE_ASSET, ONE, ZERO_ROOT } from '../../../protocol/params/pool.js';
import { InvalidInputError } from '../../../protocol/errors.js';
import { inputValidator } from '../../../protocol/security/input-validator.js';
import type { Chain } from '../../../protocol/chain/Chain.js';
import type { Pair } from '../../../runtime/pool/Pair.js';
import type { Proof } from '../../../runtime/pool/AllowList.js';
import { command, openChain, printInfo, printResult, transact } from '../session.js';
import { sym } from '../../../protocol/utils/cli.js';

interface CallOptions {
    pair: string;
    from: string;
}

interface CreateOptions {
    from: string;
    nft: string;
    base: string;
    root: string;
}

interface QuoteOptions {
    pair: string;
    buy?: string;
    sell?: string;
    add?: string;
    remove?: string;
}

interface AddOptions extends CallOptions {
    base: string;
    fractional: string;
    minLp: string;
}

interface RemoveOptions extends CallOptions {
    lp: string;
    minBase: string;
    minFractional: string;
}

interface BuyOptions extends CallOptions {
    amount: string;
    maxIn: string;
}

interface SellOptions extends CallOptions {
    amount: string;
    minOut: string;
}

interface IdsOptions extends CallOptions {
    ids: string;
    proofs?: string[];
}

interface NftAddOptions extends IdsOptions {
    base: string;
    minLp: string;
}

interface NftRemoveOptions extends IdsOptions {
    lp: string;
    minBase: string;
}

interface NftBuyOptions extends IdsOptions {
    maxIn: string;
}

interface NftSellOptions extends IdsOptions {
    minOut: string;
}

interface WithdrawOptions extends CallOptions {
    id: string;
}

function collect(value: string, previous: string[] = []): string[] {
    return [...previous, value];
}

function loadPair(options: { pair: string }): { chain: Chain; pair: Pair } {
    const chain = openChain();
    const pair = chain.getPair(inputValidator.parseAddress(options.pair, 'pair'));
    return { chain, pair };
}

// native value that travels with an operation paying `amount` base
function attached(pair: Pair, amount: bigint): bigint {
    return isNativeAsset(pair.baseToken) ? amount : 0n;
}

function parseProofs(options: IdsOptions, count: number): Proof[] {
    const proofs = (options.proofs ?? []).map((p, i) => inputValidator.parseProof(p, `proofs[${i}]`));
    if (proofs.length > count) {
        throw new InvalidInputError(`Got ${proofs.length} proofs for ${count} item(s)`);
    }
    return proofs;
}

export const poolCommand = new Command('pool').description('Fractional NFT pairs');

// CREATE command
poolCommand
    .command('create')
    .description('Create a pair for (collection, base asset, allow-list root)')
    .requiredOption('--from <address>', 'Caller')
    .requiredOption('--nft <address>', 'Collection address')
    .option('--base <address>', 'Base token address (omit for native)', NATIVE_ASSET)
    .option('--root <digest>', 'Allow-list root (zero root admits every id)', ZERO_ROOT)
    .action((options: CreateOptions) => {
        command('Pool create', () => {
            const chain = openChain();
            const from = inputValidator.parseAddress(options.from, 'from');
            const nft = inputValidator.parseAddress(options.nft, 'nft');
            const base = inputValidator.parseAddress(options.base, 'base');
            const root = inputValidator.parseDigest(options.root, 'root');
            const receipt = transact(chain, { sender: from }, ctx => chain.factory.create(ctx, nft, base, root));
            const pair = receipt.result;
            printResult(`${sym.pool} Pair created`, [
                ['Pair', pair.address],
                ['Fractional', `${pair.name} (${pair.symbol})`],
                ['LP token', `${pair.lpToken.name} (${pair.lpToken.symbol}) ${pair.lpToken.address}`],
                ['Root', pair.merkleRoot],
            ], receipt.events);
        });
    });

// INFO command
poolCommand
    .command('info')
    .description('Show reserves, supplies, price and exit status')
    .requiredOption('--pair <address>', 'Pair address')
    .action((options: { pair: string }) => {
        command('Pool info', () => {
            const { chain, pair } = loadPair(options);
            const info = pair.info(chain.now());
            printInfo(`${sym.pool} ${pair.symbol}`, [
                ['Pair', info.address],
                ['Collection', info.nft],
                ['Base', isNativeAsset(info.baseToken) ? chain.native.symbol : info.baseToken],
                ['Root', info.merkleRoot],
                ['Base reserve', info.baseTokenReserves.toString()],
                ['Fractional reserve', info.fractionalTokenReserves.toString()],
                ['Fractional supply', info.fractionalTokenSupply.toString()],
                ['LP supply', info.lpTokenSupply.toString()],
                ['Price', info.price === null ? '-' : info.price.toString()],
                ['Status', info.status],
                ['Close time', info.closeTimestamp === 0 ? '-' : String(info.closeTimestamp)],
            ]);
        });
    });

// QUOTE command
poolCommand
    .command('quote')
    .description('Quote a buy, sell, add or remove without executing it')
    .requiredOption('--pair <address>', 'Pair address')
    .option('--buy <units>', 'Fractional units to buy')
    .option('--sell <units>', 'Fractional units to sell')
    .option('--add <base,fractional>', 'Deposit amounts')
    .option('--remove <lp>', 'LP units to burn')
    .action((options: QuoteOptions) => {
        command('Pool quote', () => {
            const { pair } = loadPair(options);
            const rows: Array<[string, string]> = [];
            if (options.buy !== undefined) {
                const amount = inputValidator.parseAmount(options.buy, 'buy');
                rows.push([`Buy ${amount}`, `${pair.buyQuote(amount)} base in`]);
            }
            if (options.sell !== undefined) {
                const amount = inputValidator.parseAmount(options.sell, 'sell');
                rows.push([`Sell ${amount}`, `${pair.sellQuote(amount)} base out`]);
            }
            if (options.add !== undefined) {
                const [base = '', fractional = ''] = options.add.split(',');
                const baseAmount = inputValidator.parseAmount(base, 'add base');
                const fractionalAmount = inputValidator.parseAmount(fractional, 'add fractional');
                rows.push([`Add ${baseAmount}/${fractionalAmount}`, `${pair.addQuote(baseAmount, fractionalAmount)} LP`]);
            }
            if (options.remove !== undefined) {
                const amount = inputValidator.parseAmount(options.remove, 'remove');
                const quote = pair.removeQuote(amount);
                rows.push([
                    `Remove ${amount}`,
                    `${quote.baseTokenOutputAmount} base + ${quote.fractionalTokenOutputAmount} fractional`,
                ]);
            }
            if (rows.length === 0) {
                throw new InvalidInputError('Pass one of --buy, --sell, --add, --remove');
            }
            printInfo(`${sym.swap} ${pair.symbol} quotes`, rows);
        });
    });

// ADD command
poolCommand
    .command('add')
    .description('Add base asset and fractional units, receive LP units')
    .requiredOption('--pair <address>', 'Pair address')
    .requiredOption('--from <address>', 'Liquidity provider')
    .requiredOption('--base <units>', 'Base amount')
    .requiredOption('--fractional <units>', 'Fractional amount')
    .option('--min-lp <units>', 'Minimum LP out', '0')
    .action((options: AddOptions) => {
        command('Pool add', () => {
            const { chain, pair } = loadPair(options);
            const from = inputValidator.parseAddress(options.from, 'from');
            const base = inputValidator.parseAmount(options.base, 'base');
            const fractional = inputValidator.parseAmount(options.fractional, 'fractional');
            const minLp = inputValidator.parseAmount(options.minLp, 'min-lp');
            const receipt = transact(chain, { sender: from, to: pair.address, value: attached(pair, base) }, ctx =>
                pair.add(ctx, base, fractional, minLp)
            );
            printResult('Liquidity added', [
                ['LP minted', receipt.result.toString()],
                ['LP balance', pair.lpToken.balanceOf(from).toString()],
            ], receipt.events);
        });
    });

// REMOVE command
poolCommand
    .command('remove')
    .description('Burn LP units, receive base asset and fractional units')
    .requiredOption('--pair <address>', 'Pair address')
    .requiredOption('--from <address>', 'Liquidity provider')
    .requiredOption('--lp <units>', 'LP amount')
    .option('--min-base <units>', 'Minimum base out', '0')
    .option('--min-fractional <units>', 'Minimum fractional out', '0')
    .action((options: RemoveOptions) => {
        command('Pool remove', () => {
            const { chain, pair } = loadPair(options);
            const from = inputValidator.parseAddress(options.from, 'from');
            const lp = inputValidator.parseAmount(options.lp, 'lp');
            const minBase = inputValidator.parseAmount(options.minBase, 'min-base');
            const minFractional = inputValidator.parseAmount(options.minFractional, 'min-fractional');
            const receipt = transact(chain, { sender: from }, ctx => pair.remove(ctx, lp, minBase, minFractional));
            printResult('Liquidity removed', [
                ['Base out', receipt.result.baseTokenOutputAmount.toString()],
                ['Fractional out', receipt.result.fractionalTokenOutputAmount.toString()],
            ], receipt.events);
        });
    });

// BUY command
poolCommand
    .command('buy')
    .description('Buy an exact amount of fractional units')
    .requiredOption('--pair <address>', 'Pair address')
    .requiredOption('--from <address>', 'Buyer')
    .requiredOption('--amount <units>', 'Fractional units out')
    .requiredOption('--max-in <units>', 'Maximum base in')
    .action((options: BuyOptions) => {
        command('Pool buy', () => {
            const { chain, pair } = loadPair(options);
            const from = inputValidator.parseAddress(options.from, 'from');
            const amount = inputValidator.parseAmount(options.amount);
            const maxIn = inputValidator.parseAmount(options.maxIn, 'max-in');
            const receipt = transact(chain, { sender: from, to: pair.address, value: attached(pair, maxIn) }, ctx =>
                pair.buy(ctx, amount, maxIn)
            );
            printResult(`${sym.swap} Bought ${pair.symbol}`, [
                ['Base in', receipt.result.toString()],
                ['Fractional out', amount.toString()],
            ], receipt.events);
        });
    });

// SELL command
poolCommand
    .command('sell')
    .description('Sell an exact amount of fractional units')
    .requiredOption('--pair <address>', 'Pair address')
    .requiredOption('--from <address>', 'Seller')
    .requiredOption('--amount <units>', 'Fractional units in')
    .option('--min-out <units>', 'Minimum base out', '0')
    .action((options: SellOptions) => {
        command('Pool sell', () => {
            const { chain, pair } = loadPair(options);
            const from = inputValidator.parseAddress(options.from, 'from');
            const amount = inputValidator.parseAmount(options.amount);
            const minOut = inputValidator.parseAmount(options.minOut, 'min-out');
            const receipt = transact(chain, { sender: from }, ctx => pair.sell(ctx, amount, minOut));
            printResult(`${sym.swap} Sold ${pair.symbol}`, [
                ['Fractional in', amount.toString()],
                ['Base out', receipt.result.toString()],
            ], receipt.events);
        });
    });

// WRAP command
poolCommand
    .command('wrap')
    .description('Deposit items, receive one whole fractional unit each')
    .requiredOption('--pair <address>', 'Pair address')
    .requiredOption('--from <address>', 'Item owner (must have approved the pair)')
    .requiredOption('--ids <list>', 'Comma-separated item ids')
    .option('--proofs <list>', 'Proof for the next id, comma-joined (repeat per id)', collect)
    .action((options: IdsOptions) => {
        command('Pool wrap', () => {
            const { chain, pair } = loadPair(options);
            const from = inputValidator.parseAddress(options.from, 'from');
            const ids = inputValidator.parseItemIds(options.ids);
            const proofs = parseProofs(options, ids.length);
            const receipt = transact(chain, { sender: from }, ctx => pair.wrap(ctx, ids, proofs));
            printResult(`${sym.gift} Wrapped`, [
                ['Ids', ids.join(', ')],
                ['Minted', receipt.result.toString()],
            ], receipt.events);
        });
    });

// UNWRAP command
poolCommand
    .command('unwrap')
    .description('Burn one whole fractional unit per item and take the items')
    .requiredOption('--pair <address>', 'Pair address')
    .requiredOption('--from <address>', 'Fractional holder')
    .requiredOption('--ids <list>', 'Comma-separated item ids')
    .action((options: IdsOptions) => {
        command('Pool unwrap', () => {
            const { chain, pair } = loadPair(options);
            const from = inputValidator.parseAddress(options.from, 'from');
            const ids = inputValidator.parseItemIds(options.ids);
            const receipt = transact(chain, { sender: from }, ctx => pair.unwrap(ctx, ids));
            printResult(`${sym.box} Unwrapped`, [
                ['Ids', ids.join(', ')],
                ['Burned', receipt.result.toString()],
            ], receipt.events);
        });
    });

// NFT-ADD command
poolCommand
    .command('nft-add')
    .description('Wrap items and add them as liquidity with base asset')
    .requiredOption('--pair <address>', 'Pair address')
    .requiredOption('--from <address>', 'Liquidity provider')
    .requiredOption('--ids <list>', 'Comma-separated item ids')
    .requiredOption('--base <units>', 'Base amount')
    .option('--min-lp <units>', 'Minimum LP out', '0')
    .option('--proofs <list>', 'Proof for the next id, comma-joined (repeat per id)', collect)
    .action((options: NftAddOptions) => {
        command('Pool nft-add', () => {
            const { chain, pair } = loadPair(options);
            const from = inputValidator.parseAddress(options.from, 'from');
            const ids = inputValidator.parseItemIds(options.ids);
            const proofs = parseProofs(options, ids.length);
            const base = inputValidator.parseAmount(options.base, 'base');
            const minLp = inputValidator.parseAmount(options.minLp, 'min-lp');
            const receipt = transact(chain, { sender: from, to: pair.address, value: attached(pair, base) }, ctx =>
                pair.nftAdd(ctx, base, ids, minLp, proofs)
            );
            printResult('Items added as liquidity', [
                ['Ids', ids.join(', ')],
                ['LP minted', receipt.result.toString()],
            ], receipt.events);
        });
    });

// NFT-REMOVE command
poolCommand
    .command('nft-remove')
    .description('Remove liquidity and unwrap specific items')
    .requiredOption('--pair <address>', 'Pair address')
    .requiredOption('--from <address>', 'Liquidity provider')
    .requiredOption('--lp <units>', 'LP amount')
    .requiredOption('--ids <list>', 'Comma-separated item ids to take')
    .option('--min-base <units>', 'Minimum base out', '0')
    .action((options: NftRemoveOptions) => {
        command('Pool nft-remove', () => {
            const { chain, pair } = loadPair(options);
            const from = inputValidator.parseAddress(options.from, 'from');
            const lp = inputValidator.parseAmount(options.lp, 'lp');
            const ids = inputValidator.parseItemIds(options.ids);
            const minBase = inputValidator.parseAmount(options.minBase, 'min-base');
            const receipt = transact(chain, { sender: from }, ctx => pair.nftRemove(ctx, lp, minBase, ids));
            printResult('Liquidity removed as items', [
                ['Ids', ids.join(', ')],
                ['Base out', receipt.result.baseTokenOutputAmount.toString()],
                ['Fractional kept', (receipt.result.fractionalTokenOutputAmount - BigInt(ids.length) * ONE).toString()],
            ], receipt.events);
        });
    });

// NFT-BUY command
poolCommand
    .command('nft-buy')
    .description('Buy specific items out of the pool')
    .requiredOption('--pair <address>', 'Pair address')
    .requiredOption('--from <address>', 'Buyer')
    .requiredOption('--ids <list>', 'Comma-separated item ids')
    .requiredOption('--max-in <units>', 'Maximum base in')
    .action((options: NftBuyOptions) => {
        command('Pool nft-buy', () => {
            const { chain, pair } = loadPair(options);
            const from = inputValidator.parseAddress(options.from, 'from');
            const ids = inputValidator.parseItemIds(options.ids);
            const maxIn = inputValidator.parseAmount(options.maxIn, 'max-in');
            const receipt = transact(chain, { sender: from, to: pair.address, value: attached(pair, maxIn) }, ctx =>
                pair.nftBuy(ctx, ids, maxIn)
            );
            printResult(`${sym.swap} Bought items`, [
                ['Ids', ids.join(', ')],
                ['Base in', receipt.result.toString()],
            ], receipt.events);
        });
    });

// NFT-SELL command
poolCommand
    .command('nft-sell')
    .description('Sell items into the pool')
    .requiredOption('--pair <address>', 'Pair address')
    .requiredOption('--from <address>', 'Seller (must have approved the pair)')
    .requiredOption('--ids <list>', 'Comma-separated item ids')
    .option('--min-out <units>', 'Minimum base out', '0')
    .option('--proofs <list>', 'Proof for the next id, comma-joined (repeat per id)', collect)
    .action((options: NftSellOptions) => {
        command('Pool nft-sell', () => {
            const { chain, pair } = loadPair(options);
            const from = inputValidator.parseAddress(options.from, 'from');
            const ids = inputValidator.parseItemIds(options.ids);
            const proofs = parseProofs(options, ids.length);
            const minOut = inputValidator.parseAmount(options.minOut, 'min-out');
            const receipt = transact(chain, { sender: from }, ctx => pair.nftSell(ctx, ids, minOut, proofs));
            printResult(`${sym.swap} Sold items`, [
                ['Ids', ids.join(', ')],
                ['Base out', receipt.result.toString()],
            ], receipt.events);
        });
    });

// CLOSE command
poolCommand
    .command('close')
    .description('Operator: stop wrapping and start the withdrawal grace period')
    .requiredOption('--pair <address>', 'Pair address')
    .requiredOption('--from <address>', 'Operator')
    .action((options: CallOptions) => {
        command('Pool close', () => {
            const { chain, pair } = loadPair(options);
            const from = inputValidator.parseAddress(options.from, 'from');
            const receipt = transact(chain, { sender: from }, ctx => pair.close(ctx));
            printResult(`${sym.lock} Pair closed`, [
                ['Pair', pair.address],
                ['Withdrawable at', String(receipt.result)],
            ], receipt.events);
        });
    });

// WITHDRAW command
poolCommand
    .command('withdraw')
    .description('Operator: take an item out of a closed pair after the grace period')
    .requiredOption('--pair <address>', 'Pair address')
    .requiredOption('--from <address>', 'Operator')
    .requiredOption('--id <id>', 'Item id')
    .action((options: WithdrawOptions) => {
        command('Pool withdraw', () => {
            const { chain, pair } = loadPair(options);
            const from = inputValidator.parseAddress(options.from, 'from');
            const [id] = inputValidator.parseItemIds(options.id, 'id');
            const receipt = transact(chain, { sender: from }, ctx => pair.withdraw(ctx, id));
            printResult(`${sym.clock} Item withdrawn`, [
                ['Item', `#${id}`],
                ['To', from],
            ], receipt.events);
        });
    });
