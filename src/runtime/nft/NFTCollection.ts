/**
 * NFT Collection (ERC-721 style)
 *
 * Ownership, per-item approval, operator approval and transfer history
 * for one collection. Item ids are uint256 values.
 */

import { InvalidInputError, NotFoundError, TransferError, UnauthorizedError } from '../../protocol/errors.js';
import type { Journaled, Rollback } from '../../protocol/chain/Journal.js';
import { logger } from '../../protocol/utils/logger.js';

const log = logger.child('NFT');

export interface TransferRecord {
    from: string;
    to: string;
    timestamp: number;
}

export interface NFTCollectionData {
    address: string;
    name: string;
    symbol: string;
    creator: string;
    owners: Record<string, string>;
    approvals: Record<string, string>;
    operators: Record<string, string[]>;
    history: Record<string, TransferRecord[]>;
}

export class NFTCollection implements Journaled {
    readonly address: string;
    readonly name: string;
    readonly symbol: string;
    readonly creator: string;

    private owners: Map<bigint, string> = new Map();
    private approvals: Map<bigint, string> = new Map();
    private operators: Map<string, Set<string>> = new Map();
    private history: Map<bigint, TransferRecord[]> = new Map();

    constructor(address: string, name: string, symbol: string, creator: string) {
        this.address = address;
        this.name = name;
        this.symbol = symbol;
        this.creator = creator;
    }

    // ========== VIEWS ==========

    ownerOf(itemId: bigint): string {
        const owner = this.owners.get(itemId);
        if (owner === undefined) {
            throw new NotFoundError(`${this.symbol} #${itemId} does not exist`);
        }
        return owner;
    }

    exists(itemId: bigint): boolean {
        return this.owners.has(itemId);
    }

    balanceOf(owner: string): number {
        return this.tokensOf(owner).length;
    }

    tokensOf(owner: string): bigint[] {
        return Array.from(this.owners.entries())
            .filter(([, o]) => o === owner)
            .map(([id]) => id)
            .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    }

    getApproved(itemId: bigint): string | null {
        this.ownerOf(itemId);
        return this.approvals.get(itemId) ?? null;
    }

    isApprovedForAll(owner: string, operator: string): boolean {
        return this.operators.get(owner)?.has(operator) ?? false;
    }

    getHistory(itemId: bigint): TransferRecord[] {
        return [...(this.history.get(itemId) ?? [])];
    }

    totalMinted(): number {
        return this.owners.size;
    }

    // ========== MUTATIONS ==========

    /**
     * Only the collection creator mints.
     */
    mint(caller: string, to: string, itemId: bigint, timestamp: number = 0): void {
        if (caller !== this.creator) {
            throw new UnauthorizedError(caller, `Mint ${this.symbol}`);
        }
        if (itemId < 0n) {
            throw new InvalidInputError(`Item id must be non-negative: ${itemId}`);
        }
        if (this.owners.has(itemId)) {
            throw new TransferError(`${this.symbol} #${itemId} already minted`);
        }
        this.owners.set(itemId, to);
        this.history.set(itemId, [{ from: '', to, timestamp }]);
        log.debug(`🖼️ ${this.symbol} #${itemId} minted to ${to.slice(0, 10)}...`);
    }

    approve(sender: string, spender: string, itemId: bigint): void {
        const owner = this.ownerOf(itemId);
        if (sender !== owner && !this.isApprovedForAll(owner, sender)) {
            throw new TransferError(`${sender} cannot approve ${this.symbol} #${itemId}`);
        }
        this.approvals.set(itemId, spender);
    }

    setApprovalForAll(sender: string, operator: string, approved: boolean): void {
        const set = this.operators.get(sender) ?? new Set<string>();
        if (approved) {
            set.add(operator);
        } else {
            set.delete(operator);
        }
        this.operators.set(sender, set);
    }

    /**
     * Move an item. `operator` is whoever initiates the transfer: the owner,
     * the item's approved address, or an approved-for-all operator.
     */
    safeTransferFrom(operator: string, from: string, to: string, itemId: bigint, timestamp: number = 0): void {
        const owner = this.ownerOf(itemId);
        if (owner !== from) {
            throw new TransferError(`${this.symbol} #${itemId} is not owned by ${from}`);
        }
        const authorized =
            operator === owner ||
            this.approvals.get(itemId) === operator ||
            this.isApprovedForAll(owner, operator);
        if (!authorized) {
            throw new TransferError(`${operator} is not approved to move ${this.symbol} #${itemId}`);
        }

        this.approvals.delete(itemId);
        this.owners.set(itemId, to);
        const records = this.history.get(itemId) ?? [];
        this.history.set(itemId, [...records, { from, to, timestamp }]);
    }

    // ========== JOURNAL ==========

    checkpoint(): Rollback {
        const owners = new Map(this.owners);
        const approvals = new Map(this.approvals);
        const operators = new Map(Array.from(this.operators.entries()).map(([k, v]) => [k, new Set(v)]));
        const history = new Map(this.history);
        return () => {
            this.owners = owners;
            this.approvals = approvals;
            this.operators = operators;
            this.history = history;
        };
    }

    // ========== SERIALIZATION ==========

    toJSON(): NFTCollectionData {
        return {
            address: this.address,
            name: this.name,
            symbol: this.symbol,
            creator: this.creator,
            owners: Object.fromEntries(Array.from(this.owners.entries()).map(([id, o]) => [id.toString(), o])),
            approvals: Object.fromEntries(Array.from(this.approvals.entries()).map(([id, a]) => [id.toString(), a])),
            operators: Object.fromEntries(Array.from(this.operators.entries()).map(([o, set]) => [o, Array.from(set)])),
            history: Object.fromEntries(Array.from(this.history.entries()).map(([id, h]) => [id.toString(), h])),
        };
    }

    static fromJSON(data: NFTCollectionData): NFTCollection {
        const collection = new NFTCollection(data.address, data.name, data.symbol, data.creator);
        collection.owners = new Map(Object.entries(data.owners).map(([id, o]) => [BigInt(id), o]));
        collection.approvals = new Map(Object.entries(data.approvals).map(([id, a]) => [BigInt(id), a]));
        collection.operators = new Map(Object.entries(data.operators).map(([o, list]) => [o, new Set(list)]));
        collection.history = new Map(Object.entries(data.history).map(([id, h]) => [BigInt(id), h]));
        return collection;
    }
}
