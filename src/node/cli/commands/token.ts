/**
 * Token CLI Commands
 * Deploy and operate base-asset tokens
 */

import { Command } from 'commander';
import { inputValidator } from '../../../protocol/security/input-validator.js';
import { command, openChain, printInfo, printResult, transact } from '../session.js';
import { storage } from '../../storage/index.js';

interface CreateOptions {
    name: string;
    symbol: string;
    decimals: string;
}

interface MintOptions {
    token: string;
    from: string;
    to: string;
    amount: string;
}

interface ApproveOptions {
    token: string;
    from: string;
    spender: string;
    amount: string;
}

interface BalanceOptions {
    token: string;
    address: string;
}

export const tokenCommand = new Command('token').description('Fungible base-asset tokens');

tokenCommand
    .command('create')
    .description('Deploy a token with open minting')
    .requiredOption('--name <name>', 'Token name')
    .requiredOption('--symbol <symbol>', 'Token symbol')
    .option('--decimals <n>', 'Decimals', '18')
    .action((options: CreateOptions) => {
        command('Token create', () => {
            const name = inputValidator.parseString(options.name, 'name');
            const symbol = inputValidator.parseString(options.symbol, 'symbol');
            const decimals = Number(inputValidator.parseAmount(options.decimals, 'decimals'));
            const chain = openChain();
            const token = chain.deployToken(name, symbol, decimals);
            storage.saveChain(chain);
            printResult('Token deployed', [
                ['Address', token.address],
                ['Name', token.name],
                ['Symbol', token.symbol],
                ['Decimals', String(token.decimals)],
            ]);
        });
    });

tokenCommand
    .command('mint')
    .description('Mint raw units to an address')
    .requiredOption('--token <address>', 'Token address')
    .requiredOption('--from <address>', 'Caller')
    .requiredOption('--to <address>', 'Recipient')
    .requiredOption('--amount <units>', 'Raw amount (e.g. 5e18)')
    .action((options: MintOptions) => {
        command('Token mint', () => {
            const chain = openChain();
            const token = chain.getToken(inputValidator.parseAddress(options.token, 'token'));
            const from = inputValidator.parseAddress(options.from, 'from');
            const to = inputValidator.parseAddress(options.to, 'to');
            const amount = inputValidator.parseAmount(options.amount);
            transact(chain, { sender: from }, ctx => token.mint(ctx.sender, to, amount));
            printResult(`${token.symbol} minted`, [
                ['To', to],
                ['Amount', amount.toString()],
                ['Balance', token.balanceOf(to).toString()],
            ]);
        });
    });

tokenCommand
    .command('approve')
    .description('Set a spender allowance')
    .requiredOption('--token <address>', 'Token address')
    .requiredOption('--from <address>', 'Owner')
    .requiredOption('--spender <address>', 'Spender (usually a pair)')
    .requiredOption('--amount <units>', 'Raw allowance')
    .action((options: ApproveOptions) => {
        command('Token approve', () => {
            const chain = openChain();
            const token = chain.getToken(inputValidator.parseAddress(options.token, 'token'));
            const from = inputValidator.parseAddress(options.from, 'from');
            const spender = inputValidator.parseAddress(options.spender, 'spender');
            const amount = inputValidator.parseAmount(options.amount);
            transact(chain, { sender: from }, ctx => token.approve(ctx.sender, spender, amount));
            printResult(`${token.symbol} approved`, [
                ['Owner', from],
                ['Spender', spender],
                ['Allowance', token.allowance(from, spender).toString()],
            ]);
        });
    });

tokenCommand
    .command('balance')
    .description('Show a token balance')
    .requiredOption('--token <address>', 'Token address')
    .requiredOption('--address <address>', 'Holder')
    .action((options: BalanceOptions) => {
        command('Token balance', () => {
            const chain = openChain();
            const token = chain.getToken(inputValidator.parseAddress(options.token, 'token'));
            const holder = inputValidator.parseAddress(options.address);
            printInfo(`${token.symbol} balance`, [
                ['Holder', holder],
                ['Balance', token.balanceOf(holder).toString()],
                ['Total supply', token.totalSupply().toString()],
            ]);
        });
    });
