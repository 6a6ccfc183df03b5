/**
 * Native currency balances.
 *
 * Push-only: value leaves an account only through transfer() by that
 * account itself. New value enters through credit() (genesis / faucet).
 */

import { MathError, TransferError } from '../../protocol/errors.js';
import { SafeMath } from '../../protocol/utils/safe-math.js';
import type { Journaled, Rollback } from '../../protocol/chain/Journal.js';

export class NativeLedger implements Journaled {
    readonly symbol: string;
    private balances: Map<string, bigint> = new Map();

    constructor(symbol: string = 'ETH') {
        this.symbol = symbol;
    }

    balanceOf(owner: string): bigint {
        return this.balances.get(owner) ?? 0n;
    }

    credit(to: string, amount: bigint): void {
        if (amount <= 0n) {
            throw new TransferError(`Credit amount must be positive: ${amount}`);
        }
        this.balances.set(to, SafeMath.add(this.balanceOf(to), amount));
    }

    transfer(from: string, to: string, amount: bigint): void {
        if (amount < 0n) {
            throw new TransferError(`Negative ${this.symbol} transfer: ${amount}`);
        }
        if (amount === 0n) return;

        const balance = this.balanceOf(from);
        if (balance < amount) {
            throw new MathError(
                'UNDERFLOW',
                `Insufficient ${this.symbol} balance: ${from} has ${balance}, needs ${amount}`
            );
        }
        this.balances.set(from, balance - amount);
        this.balances.set(to, this.balanceOf(to) + amount);
    }

    checkpoint(): Rollback {
        const balances = new Map(this.balances);
        return () => {
            this.balances = balances;
        };
    }

    toJSON(): Record<string, string> {
        return Object.fromEntries(
            Array.from(this.balances.entries())
                .filter(([, v]) => v > 0n)
                .map(([k, v]) => [k, v.toString()])
        );
    }

    loadData(data: Record<string, string>): void {
        this.balances = new Map(Object.entries(data).map(([k, v]) => [k, BigInt(v)]));
    }
}
