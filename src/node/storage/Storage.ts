import fs from 'fs';
import path from 'path';
import { config } from '../config.js';
import { Chain, type ChainData } from '../../protocol/chain/Chain.js';
import type { Clock } from '../../protocol/chain/Clock.js';
import { logger } from '../../protocol/utils/logger.js';

const log = logger.child('Storage');

export interface StorageOptions {
    dataDir?: string;
    stateFile?: string;
}

/**
 * Whole-chain JSON persistence. Bigints are written as decimal strings.
 */
export class Storage {
    private dataDir: string;
    private statePath: string;

    constructor(options: StorageOptions = {}) {
        this.dataDir = options.dataDir ?? config.storage.dataDir;
        this.statePath = path.join(this.dataDir, options.stateFile ?? config.storage.stateFile);
    }

    get path(): string {
        return this.statePath;
    }

    private ensureDirectories(): void {
        if (!fs.existsSync(this.dataDir)) {
            fs.mkdirSync(this.dataDir, { recursive: true });
        }
    }

    exists(): boolean {
        return fs.existsSync(this.statePath);
    }

    saveChain(chain: Chain): void {
        this.ensureDirectories();
        const tmpPath = `${this.statePath}.tmp`;
        fs.writeFileSync(tmpPath, JSON.stringify(chain.toJSON(), null, 2));
        fs.renameSync(tmpPath, this.statePath);
        log.debug(`💾 State saved to ${this.statePath}`);
    }

    loadData(): ChainData | null {
        if (!this.exists()) {
            return null;
        }
        const content = fs.readFileSync(this.statePath, 'utf-8');
        const data: unknown = JSON.parse(content);
        if (!isChainData(data)) {
            throw new Error(`Unsupported state file: ${this.statePath}`);
        }
        return data;
    }

    /**
     * Load the saved chain, or start an empty one operated by `operator`.
     */
    loadChain(operator: string, clock?: Clock): Chain {
        const data = this.loadData();
        if (data === null) {
            log.info(`📂 No state at ${this.statePath}, starting empty chain`);
            return new Chain({ operator, clock, nativeSymbol: config.chain.nativeSymbol });
        }
        const chain = Chain.fromJSON(data, clock);
        log.debug(`📂 State loaded: ${data.tokens.length} tokens, ${data.collections.length} collections, ${data.factory.instances.length} pairs`);
        return chain;
    }
}

function isChainData(value: unknown): value is ChainData {
    if (typeof value !== 'object' || value === null) return false;
    return (
        'version' in value &&
        value.version === 1 &&
        'native' in value &&
        'tokens' in value &&
        Array.isArray(value.tokens) &&
        'collections' in value &&
        Array.isArray(value.collections) &&
        'factory' in value &&
        typeof value.factory === 'object'
    );
}
