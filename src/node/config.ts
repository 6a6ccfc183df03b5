import 'dotenv/config';
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { parseLogThreshold } from '../protocol/utils/logger.js';

// Read version from package.json dynamically
function getPackageVersion(): string {
    try {
        const __filename = fileURLToPath(import.meta.url);
        const __dirname = dirname(__filename);
        // src/node/config.ts and dist/src/node/config.js both sit below the root
        for (const up of ['../..', '../../..']) {
            try {
                const pkg: unknown = JSON.parse(readFileSync(join(__dirname, up, 'package.json'), 'utf-8'));
                if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
                    return pkg.version;
                }
            } catch {
                continue;
            }
        }
        return '0.0.0';
    } catch {
        return '0.0.0';
    }
}

export const config = {
    version: getPackageVersion(),
    logLevel: parseLogThreshold(process.env.LOG_LEVEL),
    storage: {
        dataDir: process.env.DATA_DIR || './data',
        stateFile: process.env.STATE_FILE || 'state.json',
    },
    chain: {
        // default registry operator for a fresh state file
        operator: process.env.OPERATOR_ADDRESS || '0x00000000000000000000000000000000000000aa',
        nativeSymbol: process.env.NATIVE_SYMBOL || 'ETH',
    },
};
export type Config = typeof config;
