/**
 * Chain - the execution substrate the pairs run on
 *
 * Owns every ledger, collection and the pair factory, and runs calls one at a
 * time. Each call is atomic: all state is checkpointed before it starts and
 * restored if it throws, events included.
 */

import { InvalidInputError, NotFoundError, describeError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { deriveAddress } from '../utils/crypto.js';
import type { CallContext } from './context.js';
import type { Clock } from './Clock.js';
import { SystemClock } from './Clock.js';
import { checkpointAll, type Journaled } from './Journal.js';
import { NativeLedger } from '../../runtime/ledger/NativeLedger.js';
import { FungibleLedger, type FungibleLedgerData } from '../../runtime/ledger/FungibleLedger.js';
import { NFTCollection, type NFTCollectionData } from '../../runtime/nft/NFTCollection.js';
import { EventLog, type PoolEvent } from '../../runtime/pool/events.js';
import { type FactoryEnvironment, PairFactory, type PairFactoryData } from '../../runtime/pool/PairFactory.js';
import type { Pair } from '../../runtime/pool/Pair.js';

const log = logger.child('Chain');

export interface Call {
    sender: string;
    // callee credited with `value` before the call body runs
    to?: string;
    value?: bigint;
}

export interface Receipt<T> {
    result: T;
    events: PoolEvent[];
    timestamp: number;
}

export interface ChainOptions {
    operator: string;
    clock?: Clock;
    nativeSymbol?: string;
}

export interface ChainData {
    version: 1;
    nativeSymbol: string;
    lastTimestamp: number;
    native: Record<string, string>;
    tokens: FungibleLedgerData[];
    collections: NFTCollectionData[];
    factory: PairFactoryData;
}

export class Chain implements FactoryEnvironment {
    readonly native: NativeLedger;
    readonly events: EventLog;
    readonly factory: PairFactory;

    private readonly clock: Clock;
    private readonly tokens: Map<string, FungibleLedger> = new Map();
    private readonly collections: Map<string, NFTCollection> = new Map();
    private executing = false;
    private lastTimestamp = 0;

    constructor(options: ChainOptions) {
        this.clock = options.clock ?? new SystemClock();
        this.native = new NativeLedger(options.nativeSymbol ?? 'ETH');
        this.events = new EventLog();
        this.factory = new PairFactory(this, options.operator);
    }

    // ========== DEPLOYMENT ==========

    deployToken(name: string, symbol: string, decimals: number = 18): FungibleLedger {
        const address = deriveAddress('token', symbol, String(this.tokens.size));
        const token = new FungibleLedger({ address, name, symbol, decimals, minter: null });
        this.tokens.set(address, token);
        log.info(`🪙 Token deployed: ${name} (${symbol}) at ${address}`);
        return token;
    }

    deployCollection(name: string, symbol: string, creator: string): NFTCollection {
        const address = deriveAddress('collection', symbol, String(this.collections.size));
        const collection = new NFTCollection(address, name, symbol, creator);
        this.collections.set(address, collection);
        log.info(`🎨 Collection deployed: ${name} (${symbol}) at ${address}`);
        return collection;
    }

    // ========== LOOKUPS ==========

    getToken(address: string): FungibleLedger {
        const token = this.tokens.get(address);
        if (!token) throw new NotFoundError(`Unknown token: ${address}`);
        return token;
    }

    getCollection(address: string): NFTCollection {
        const collection = this.collections.get(address);
        if (!collection) throw new NotFoundError(`Unknown collection: ${address}`);
        return collection;
    }

    getPair(address: string): Pair {
        return this.factory.pairAt(address);
    }

    allTokens(): FungibleLedger[] {
        return Array.from(this.tokens.values());
    }

    allCollections(): NFTCollection[] {
        return Array.from(this.collections.values());
    }

    now(): number {
        return Math.max(this.clock.now(), this.lastTimestamp);
    }

    // ========== EXECUTION ==========

    /**
     * Run one call atomically. The attached value is moved from sender to
     * `call.to` first, then `fn` runs with the call context. On any throw
     * every ledger, collection, pair and the event log are restored and the
     * error is rethrown.
     */
    execute<T>(call: Call, fn: (ctx: CallContext) => T): Receipt<T> {
        if (this.executing) {
            throw new InvalidInputError('Reentrant call rejected');
        }
        const value = call.value ?? 0n;
        if (value < 0n) {
            throw new InvalidInputError(`Negative call value: ${value}`);
        }
        if (value > 0n && call.to === undefined) {
            throw new InvalidInputError('Call value needs a target');
        }

        const timestamp = this.now();
        const rollback = checkpointAll(this.journaled());
        const start = this.events.length;
        this.executing = true;

        let receipt: Receipt<T>;
        try {
            if (call.to !== undefined && value > 0n) {
                this.native.transfer(call.sender, call.to, value);
            }
            const result = fn({ sender: call.sender, target: call.to, value, timestamp });
            receipt = { result, events: this.events.since(start), timestamp };
            this.lastTimestamp = timestamp;
        } catch (error) {
            rollback();
            log.warn(`⛔ Call from ${call.sender.slice(0, 10)}... reverted: ${describeError(error)}`);
            throw error;
        } finally {
            this.executing = false;
        }

        this.events.publish(receipt.events);
        return receipt;
    }

    private journaled(): Journaled[] {
        return [this.native, this.events, ...this.tokens.values(), ...this.collections.values(), this.factory];
    }

    // ========== SERIALIZATION ==========

    toJSON(): ChainData {
        return {
            version: 1,
            nativeSymbol: this.native.symbol,
            lastTimestamp: this.lastTimestamp,
            native: this.native.toJSON(),
            tokens: this.allTokens().map(t => t.toJSON()),
            collections: this.allCollections().map(c => c.toJSON()),
            factory: this.factory.toJSON(),
        };
    }

    static fromJSON(data: ChainData, clock?: Clock): Chain {
        const chain = new Chain({ operator: data.factory.owner, clock, nativeSymbol: data.nativeSymbol });
        chain.lastTimestamp = data.lastTimestamp;
        chain.native.loadData(data.native);
        for (const tokenData of data.tokens) {
            chain.tokens.set(tokenData.address, FungibleLedger.fromJSON(tokenData));
        }
        for (const collectionData of data.collections) {
            chain.collections.set(collectionData.address, NFTCollection.fromJSON(collectionData));
        }
        // pairs resolve their collections and base tokens, so they load last
        chain.factory.loadData(data.factory);
        return chain;
    }
}
