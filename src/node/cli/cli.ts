#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { tokenCommand } from './commands/token.js';
import { nativeCommand } from './commands/native.js';
import { collectionCommand } from './commands/collection.js';
import { allowlistCommand } from './commands/allowlist.js';
import { poolCommand } from './commands/pool.js';
import { config } from '../config.js';
import { setLogLevel } from '../../protocol/utils/logger.js';

setLogLevel(config.logLevel);

const program = new Command();

program
    .name('shardswap')
    .description('Fractional NFT exchange - constant-product pairs over wrapped NFT collections')
    .version(config.version);

// Add commands BEFORE parse()
program.addCommand(nativeCommand);
program.addCommand(tokenCommand);
program.addCommand(collectionCommand);
program.addCommand(allowlistCommand);
program.addCommand(poolCommand);

program.parse();
