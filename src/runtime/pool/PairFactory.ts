/**
 * Pair Factory / Registry
 *
 * Creates pairs, keeps the (collection, base asset, root) → pair mapping and
 * holds the operator identity that pairs consult for close/withdraw.
 *
 * A destroyed pair leaves the mapping but stays in the factory: its items
 * must remain withdrawable by the operator.
 */

import { isNativeAsset, isZeroRoot } from '../../protocol/params/pool.js';
import { InvalidInputError, NotFoundError, UnauthorizedError } from '../../protocol/errors.js';
import type { CallContext } from '../../protocol/chain/context.js';
import type { Journaled, Rollback } from '../../protocol/chain/Journal.js';
import { checkpointAll } from '../../protocol/chain/Journal.js';
import { deriveAddress, isDigest } from '../../protocol/utils/crypto.js';
import { logger } from '../../protocol/utils/logger.js';
import type { NativeLedger } from '../ledger/NativeLedger.js';
import type { FungibleLedger } from '../ledger/FungibleLedger.js';
import type { NFTCollection } from '../nft/NFTCollection.js';
import type { EventLog } from './events.js';
import { type BaseAsset, Pair, type PairData, type PairIdentity, type PairRegistry } from './Pair.js';

const log = logger.child('Factory');

/**
 * Lookups the factory needs from the chain it lives on.
 */
export interface FactoryEnvironment {
    readonly native: NativeLedger;
    readonly events: EventLog;
    getToken(address: string): FungibleLedger;
    getCollection(address: string): NFTCollection;
}

export interface PairFactoryData {
    owner: string;
    pairs: Record<string, string>;
    instances: PairData[];
}

function identityKey(nft: string, baseToken: string, merkleRoot: string): string {
    return `${nft.toLowerCase()}:${baseToken.toLowerCase()}:${merkleRoot.toLowerCase()}`;
}

export class PairFactory implements PairRegistry, Journaled {
    readonly address: string;
    private ownerAddress: string;
    private readonly env: FactoryEnvironment;

    // live identity → pair address
    private pairs: Map<string, string> = new Map();
    // every pair ever created, destroyed ones included
    private instances: Map<string, Pair> = new Map();

    constructor(env: FactoryEnvironment, owner: string) {
        this.env = env;
        this.ownerAddress = owner;
        this.address = deriveAddress('factory');
    }

    // ========== REGISTRY ==========

    owner(): string {
        return this.ownerAddress;
    }

    transferOwnership(ctx: CallContext, newOwner: string): void {
        if (ctx.sender !== this.ownerAddress) {
            throw new UnauthorizedError(ctx.sender, 'Transfer ownership');
        }
        log.info(`👑 Operator changed: ${this.ownerAddress} → ${newOwner}`);
        this.ownerAddress = newOwner;
    }

    create(ctx: CallContext, nft: string, baseToken: string, merkleRoot: string): Pair {
        if (!isDigest(merkleRoot)) {
            throw new InvalidInputError(`Merkle root must be a 32-byte hex digest: ${merkleRoot}`);
        }
        const key = identityKey(nft, baseToken, merkleRoot);
        if (this.pairs.has(key)) {
            throw new InvalidInputError(`Pair already exists: ${this.pairs.get(key)}`);
        }

        const collection = this.env.getCollection(nft);
        const base = this.resolveBase(baseToken);
        const baseSymbol = base.ledger.symbol;

        // a re-created identity gets a fresh address, the destroyed instance keeps its own
        const address = deriveAddress('pair', key, String(this.instances.size));
        const identity: PairIdentity = {
            address,
            nft: collection.address,
            baseToken: base.kind === 'native' ? baseToken.toLowerCase() : base.ledger.address,
            merkleRoot: merkleRoot.toLowerCase(),
            name: `${collection.symbol} fractional token`,
            symbol: `f${collection.symbol}`,
            lpName: `${collection.symbol}:${baseSymbol} LP token`,
            lpSymbol: `LP-${collection.symbol}:${baseSymbol}`,
        };

        const pair = new Pair(identity, { base, nft: collection, registry: this, events: this.env.events });
        this.pairs.set(key, address);
        this.instances.set(address, pair);

        this.env.events.emit({
            type: 'Create',
            address: this.address,
            pair: address,
            nft: identity.nft,
            baseToken: identity.baseToken,
            merkleRoot: identity.merkleRoot,
        });
        log.info(
            `🏊 Pair created by ${ctx.sender.slice(0, 10)}...: ${identity.symbol}/${baseSymbol}` +
                (isZeroRoot(identity.merkleRoot) ? ' (open allow-list)' : '')
        );
        return pair;
    }

    /**
     * Release an identity. Only the pair that owns the identity may call this.
     */
    destroy(caller: string, nft: string, baseToken: string, merkleRoot: string): void {
        const key = identityKey(nft, baseToken, merkleRoot);
        const mapped = this.pairs.get(key);
        if (mapped === undefined || mapped !== caller) {
            throw new UnauthorizedError(caller, 'Destroy');
        }
        this.pairs.delete(key);

        this.env.events.emit({ type: 'Destroy', address: this.address, pair: caller, nft, baseToken, merkleRoot });
        log.info(`🗑️ Pair ${caller} deregistered`);
    }

    // ========== LOOKUPS ==========

    getPair(nft: string, baseToken: string, merkleRoot: string): Pair | undefined {
        const address = this.pairs.get(identityKey(nft, baseToken, merkleRoot));
        return address === undefined ? undefined : this.instances.get(address);
    }

    /**
     * Any pair ever created, by address.
     */
    pairAt(address: string): Pair {
        const pair = this.instances.get(address);
        if (!pair) {
            throw new NotFoundError(`Unknown pair: ${address}`);
        }
        return pair;
    }

    allPairs(): Pair[] {
        return Array.from(this.instances.values());
    }

    isRegistered(pair: Pair): boolean {
        return this.pairs.get(identityKey(pair.nft, pair.baseToken, pair.merkleRoot)) === pair.address;
    }

    private resolveBase(baseToken: string): BaseAsset {
        if (isNativeAsset(baseToken)) {
            return { kind: 'native', ledger: this.env.native };
        }
        return { kind: 'token', ledger: this.env.getToken(baseToken) };
    }

    // ========== JOURNAL ==========

    checkpoint(): Rollback {
        const owner = this.ownerAddress;
        const pairs = new Map(this.pairs);
        const instances = new Map(this.instances);
        const children = checkpointAll(Array.from(this.instances.values()));
        return () => {
            children();
            this.ownerAddress = owner;
            this.pairs = pairs;
            this.instances = instances;
        };
    }

    // ========== SERIALIZATION ==========

    toJSON(): PairFactoryData {
        return {
            owner: this.ownerAddress,
            pairs: Object.fromEntries(this.pairs),
            instances: this.allPairs().map(pair => pair.toJSON()),
        };
    }

    loadData(data: PairFactoryData): void {
        this.ownerAddress = data.owner;
        this.pairs = new Map(Object.entries(data.pairs));
        this.instances = new Map(
            data.instances.map((pairData): [string, Pair] => {
                const identity = pairData.identity;
                const pair = Pair.fromJSON(pairData, {
                    base: this.resolveBase(identity.baseToken),
                    nft: this.env.getCollection(identity.nft),
                    registry: this,
                    events: this.env.events,
                });
                return [pair.address, pair];
            })
        );
    }
}
