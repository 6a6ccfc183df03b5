/**
 * Allow-list CLI Commands
 * Build roots and proofs off-chain
 */

import { Command } from 'commander';
import { inputValidator } from '../../../protocol/security/input-validator.js';
import { AllowListTree } from '../../../runtime/pool/AllowList.js';
import { command, printInfo } from '../session.js';
import { sym } from '../../../protocol/utils/cli.js';

interface RootOptions {
    ids: string;
}

interface ProofOptions {
    ids: string;
    id: string;
}

export const allowlistCommand = new Command('allowlist').description('Allow-list roots and proofs');

allowlistCommand
    .command('root')
    .description('Compute the root over a set of item ids')
    .requiredOption('--ids <list>', 'Comma-separated item ids')
    .action((options: RootOptions) => {
        command('Allow-list root', () => {
            const tree = new AllowListTree(inputValidator.parseItemIds(options.ids));
            printInfo(`${sym.tree} Allow-list`, [
                ['Items', String(tree.size)],
                ['Root', tree.root],
            ]);
        });
    });

allowlistCommand
    .command('proof')
    .description('Print the proof for one id (comma-joined, as wrap --proofs expects)')
    .requiredOption('--ids <list>', 'Comma-separated item ids of the whole allow-list')
    .requiredOption('--id <id>', 'Item id to prove')
    .action((options: ProofOptions) => {
        command('Allow-list proof', () => {
            const tree = new AllowListTree(inputValidator.parseItemIds(options.ids));
            const [id] = inputValidator.parseItemIds(options.id, 'id');
            const proof = tree.proof(id);
            printInfo(`${sym.tree} Proof for #${id}`, [
                ['Root', tree.root],
                ['Proof', proof.length > 0 ? proof.join(',') : '(empty)'],
            ]);
        });
    });
