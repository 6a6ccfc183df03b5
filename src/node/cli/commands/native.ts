/**
 * Native currency CLI Commands
 */

import { Command } from 'commander';
import { inputValidator } from '../../../protocol/security/input-validator.js';
import { command, openChain, printInfo, printResult } from '../session.js';
import { storage } from '../../storage/index.js';

interface FundOptions {
    to: string;
    amount: string;
}

interface BalanceOptions {
    address: string;
}

export const nativeCommand = new Command('native').description('Native currency balances');

nativeCommand
    .command('fund')
    .description('Credit native currency to an address (local faucet)')
    .requiredOption('--to <address>', 'Recipient')
    .requiredOption('--amount <units>', 'Raw amount (e.g. 10e18)')
    .action((options: FundOptions) => {
        command('Fund', () => {
            const chain = openChain();
            const to = inputValidator.parseAddress(options.to, 'to');
            const amount = inputValidator.parseAmount(options.amount);
            chain.native.credit(to, amount);
            storage.saveChain(chain);
            printResult(`${chain.native.symbol} credited`, [
                ['To', to],
                ['Amount', amount.toString()],
                ['Balance', chain.native.balanceOf(to).toString()],
            ]);
        });
    });

nativeCommand
    .command('balance')
    .description('Show a native balance')
    .requiredOption('--address <address>', 'Holder')
    .action((options: BalanceOptions) => {
        command('Native balance', () => {
            const chain = openChain();
            const holder = inputValidator.parseAddress(options.address);
            printInfo(`${chain.native.symbol} balance`, [
                ['Holder', holder],
                ['Balance', chain.native.balanceOf(holder).toString()],
            ]);
        });
    });
