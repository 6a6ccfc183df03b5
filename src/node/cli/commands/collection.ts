/**
 * Collection CLI Commands
 * Deploy NFT collections, mint items and grant approvals
 */

import { Command } from 'commander';
import { inputValidator } from '../../../protocol/security/input-validator.js';
import { command, openChain, printInfo, printResult, transact } from '../session.js';
import { storage } from '../../storage/index.js';

interface CreateOptions {
    name: string;
    symbol: string;
    from: string;
}

interface MintOptions {
    collection: string;
    from: string;
    to: string;
    ids: string;
}

interface ApproveOptions {
    collection: string;
    from: string;
    operator: string;
    revoke?: boolean;
}

interface OwnedOptions {
    collection: string;
    address: string;
}

export const collectionCommand = new Command('collection').description('NFT collections');

collectionCommand
    .command('create')
    .description('Deploy a collection')
    .requiredOption('--name <name>', 'Collection name')
    .requiredOption('--symbol <symbol>', 'Collection symbol')
    .requiredOption('--from <address>', 'Creator')
    .action((options: CreateOptions) => {
        command('Collection create', () => {
            const name = inputValidator.parseString(options.name, 'name');
            const symbol = inputValidator.parseString(options.symbol, 'symbol');
            const creator = inputValidator.parseAddress(options.from, 'from');
            const chain = openChain();
            const collection = chain.deployCollection(name, symbol, creator);
            storage.saveChain(chain);
            printResult('Collection deployed', [
                ['Address', collection.address],
                ['Name', collection.name],
                ['Symbol', collection.symbol],
                ['Creator', collection.creator],
            ]);
        });
    });

collectionCommand
    .command('mint')
    .description('Mint items (creator only)')
    .requiredOption('--collection <address>', 'Collection address')
    .requiredOption('--from <address>', 'Creator')
    .requiredOption('--to <address>', 'Recipient')
    .requiredOption('--ids <list>', 'Comma-separated item ids')
    .action((options: MintOptions) => {
        command('Collection mint', () => {
            const chain = openChain();
            const collection = chain.getCollection(inputValidator.parseAddress(options.collection, 'collection'));
            const from = inputValidator.parseAddress(options.from, 'from');
            const to = inputValidator.parseAddress(options.to, 'to');
            const ids = inputValidator.parseItemIds(options.ids);
            transact(chain, { sender: from }, ctx => {
                for (const id of ids) collection.mint(ctx.sender, to, id, ctx.timestamp);
            });
            printResult(`${collection.symbol} minted`, [
                ['To', to],
                ['Ids', ids.join(', ')],
                ['Balance', String(collection.balanceOf(to))],
            ]);
        });
    });

collectionCommand
    .command('approve')
    .description('Approve (or revoke) an operator for every item of the caller')
    .requiredOption('--collection <address>', 'Collection address')
    .requiredOption('--from <address>', 'Owner')
    .requiredOption('--operator <address>', 'Operator (usually a pair)')
    .option('--revoke', 'Revoke instead of approve')
    .action((options: ApproveOptions) => {
        command('Collection approve', () => {
            const chain = openChain();
            const collection = chain.getCollection(inputValidator.parseAddress(options.collection, 'collection'));
            const from = inputValidator.parseAddress(options.from, 'from');
            const operator = inputValidator.parseAddress(options.operator, 'operator');
            const approved = options.revoke !== true;
            transact(chain, { sender: from }, ctx => collection.setApprovalForAll(ctx.sender, operator, approved));
            printResult(`${collection.symbol} operator ${approved ? 'approved' : 'revoked'}`, [
                ['Owner', from],
                ['Operator', operator],
            ]);
        });
    });

collectionCommand
    .command('owned')
    .description('List the items an address holds')
    .requiredOption('--collection <address>', 'Collection address')
    .requiredOption('--address <address>', 'Holder')
    .action((options: OwnedOptions) => {
        command('Collection owned', () => {
            const chain = openChain();
            const collection = chain.getCollection(inputValidator.parseAddress(options.collection, 'collection'));
            const holder = inputValidator.parseAddress(options.address);
            const ids = collection.tokensOf(holder);
            printInfo(`${collection.symbol} items`, [
                ['Holder', holder],
                ['Count', String(ids.length)],
                ['Ids', ids.length > 0 ? ids.join(', ') : '-'],
            ]);
        });
    });
