/**
 * One CLI invocation: load state, run one call, save, print.
 */

import { config } from '../config.js';
import { storage } from '../storage/index.js';
import type { Call, Chain, Receipt } from '../../protocol/chain/Chain.js';
import type { CallContext } from '../../protocol/chain/context.js';
import { describeError, isPoolError } from '../../protocol/errors.js';
import type { PoolEvent } from '../../runtime/pool/events.js';
import cli, { c, sym } from '../../protocol/utils/cli.js';

export function openChain(): Chain {
    return storage.loadChain(config.chain.operator);
}

/**
 * Run a command body and report any failure as an error box with a
 * non-zero exit code.
 */
export function command(title: string, body: () => void): void {
    try {
        body();
    } catch (error) {
        const code = isPoolError(error) ? ` ${c.dim(`[${error.code}]`)}` : '';
        console.error('');
        console.error(cli.errorBox(`${describeError(error)}${code}`, `${sym.error} ${title} failed`));
        console.error('');
        process.exitCode = 1;
    }
}

/**
 * Execute one call against the saved chain and persist the result.
 * Nothing is written when the call reverts.
 */
export function transact<T>(
    chain: Chain,
    call: Call,
    fn: (ctx: CallContext) => T
): Receipt<T> {
    const receipt = chain.execute(call, fn);
    storage.saveChain(chain);
    return receipt;
}

export function printResult(title: string, rows: Array<[string, string]>, events: PoolEvent[] = []): void {
    const lines = [cli.table(rows)];
    if (events.length > 0) {
        lines.push('', c.dim('Events:'), ...events.map(event => `  ${sym.bullet} ${formatEvent(event)}`));
    }
    console.log('');
    console.log(cli.successBox(lines.join('\n'), `${sym.check} ${title}`));
    console.log('');
}

export function printInfo(title: string, rows: Array<[string, string]>): void {
    console.log('');
    console.log(cli.infoBox(cli.table(rows), title));
    console.log('');
}

export function formatEvent(event: PoolEvent): string {
    switch (event.type) {
        case 'Add':
        case 'Remove':
            return `${event.type} base=${event.baseTokenAmount} fractional=${event.fractionalTokenAmount} lp=${event.lpTokenAmount}`;
        case 'Buy':
        case 'Sell':
            return `${event.type} in=${event.inputAmount} out=${event.outputAmount}`;
        case 'Wrap':
        case 'Unwrap':
            return `${event.type} ids=[${event.tokenIds.join(', ')}]`;
        case 'Close':
            return `Close withdrawable at ${event.closeTimestamp}`;
        case 'Withdraw':
            return `Withdraw #${event.tokenId}`;
        case 'Create':
        case 'Destroy':
            return `${event.type} pair=${event.pair}`;
    }
}
