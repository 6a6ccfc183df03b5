/**
 * Events emitted by pairs and the pair factory.
 * Observers only; nothing in the engine reads them back.
 */

import type { Journaled, Rollback } from '../../protocol/chain/Journal.js';

interface EventBase {
    // emitting contract
    address: string;
}

export type PoolEvent =
    | (EventBase & { type: 'Add'; baseTokenAmount: bigint; fractionalTokenAmount: bigint; lpTokenAmount: bigint })
    | (EventBase & { type: 'Remove'; baseTokenAmount: bigint; fractionalTokenAmount: bigint; lpTokenAmount: bigint })
    | (EventBase & { type: 'Buy'; inputAmount: bigint; outputAmount: bigint })
    | (EventBase & { type: 'Sell'; inputAmount: bigint; outputAmount: bigint })
    | (EventBase & { type: 'Wrap'; tokenIds: bigint[] })
    | (EventBase & { type: 'Unwrap'; tokenIds: bigint[] })
    | (EventBase & { type: 'Close'; closeTimestamp: number })
    | (EventBase & { type: 'Withdraw'; tokenId: bigint })
    | (EventBase & { type: 'Create'; pair: string; nft: string; baseToken: string; merkleRoot: string })
    | (EventBase & { type: 'Destroy'; pair: string; nft: string; baseToken: string; merkleRoot: string });

export type PoolEventType = PoolEvent['type'];

export type EventSink = (event: PoolEvent) => void;

/**
 * Append-only event log. Rolled back together with the state of a failed call.
 */
export class EventLog implements Journaled {
    private entries: PoolEvent[] = [];
    private listeners: EventSink[] = [];

    emit(event: PoolEvent): void {
        this.entries.push(event);
    }

    get length(): number {
        return this.entries.length;
    }

    since(index: number): PoolEvent[] {
        return this.entries.slice(index);
    }

    all(): PoolEvent[] {
        return [...this.entries];
    }

    /**
     * Listeners see events only once the call that produced them has committed.
     */
    subscribe(listener: EventSink): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    publish(events: PoolEvent[]): void {
        for (const event of events) {
            for (const listener of this.listeners) listener(event);
        }
    }

    checkpoint(): Rollback {
        const length = this.entries.length;
        return () => {
            this.entries.length = length;
        };
    }
}
