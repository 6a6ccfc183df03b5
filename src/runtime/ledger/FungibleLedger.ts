/**
 * Fungible Ledger (ERC-20 style)
 *
 * Used for base-asset tokens, pool-share tokens and, inside each pair,
 * for the fractional units the pair itself issues.
 *
 * All amounts are raw integer units (bigint). Every failure throws and
 * leaves the ledger untouched.
 */

import { MathError, TransferError, UnauthorizedError } from '../../protocol/errors.js';
import { MAX_UINT256 } from '../../protocol/params/pool.js';
import { SafeMath } from '../../protocol/utils/safe-math.js';
import type { Journaled, Rollback } from '../../protocol/chain/Journal.js';

export interface FungibleLedgerData {
    address: string;
    name: string;
    symbol: string;
    decimals: number;
    minter: string | null;
    totalSupply: string;
    balances: Record<string, string>;
    allowances: Record<string, Record<string, string>>;
}

export interface FungibleLedgerOptions {
    address: string;
    name: string;
    symbol: string;
    decimals?: number;
    // Only this address may mint/burn. null = open minting (test tokens)
    minter?: string | null;
}

/**
 * The subset a pair needs from a non-native base asset.
 */
export interface BaseAssetLedger {
    readonly address: string;
    readonly symbol: string;
    balanceOf(owner: string): bigint;
    transfer(sender: string, to: string, amount: bigint): boolean;
    transferFrom(spender: string, from: string, to: string, amount: bigint): boolean;
}

export class FungibleLedger implements BaseAssetLedger, Journaled {
    readonly address: string;
    readonly name: string;
    readonly symbol: string;
    readonly decimals: number;
    protected readonly minter: string | null;

    private supply: bigint = 0n;
    private balances: Map<string, bigint> = new Map();
    private allowances: Map<string, Map<string, bigint>> = new Map();

    constructor(options: FungibleLedgerOptions) {
        this.address = options.address;
        this.name = options.name;
        this.symbol = options.symbol;
        this.decimals = options.decimals ?? 18;
        this.minter = options.minter ?? null;
    }

    // ========== VIEWS ==========

    totalSupply(): bigint {
        return this.supply;
    }

    balanceOf(owner: string): bigint {
        return this.balances.get(owner) ?? 0n;
    }

    allowance(owner: string, spender: string): bigint {
        return this.allowances.get(owner)?.get(spender) ?? 0n;
    }

    holders(): string[] {
        return Array.from(this.balances.keys());
    }

    // ========== TRANSFERS ==========

    approve(owner: string, spender: string, amount: bigint): boolean {
        if (amount < 0n || amount > MAX_UINT256) {
            throw new TransferError(`Invalid ${this.symbol} allowance: ${amount}`);
        }
        const ownerAllowances = this.allowances.get(owner) ?? new Map<string, bigint>();
        ownerAllowances.set(spender, amount);
        this.allowances.set(owner, ownerAllowances);
        return true;
    }

    transfer(sender: string, to: string, amount: bigint): boolean {
        this.move(sender, to, amount);
        return true;
    }

    transferFrom(spender: string, from: string, to: string, amount: bigint): boolean {
        const allowed = this.allowance(from, spender);
        if (allowed < amount) {
            throw new TransferError(
                `Insufficient ${this.symbol} allowance: ${spender} may spend ${allowed} of ${from}, needs ${amount}`
            );
        }
        // check the balance before touching the allowance so a failed move never half-applies
        this.requireBalance(from, amount);
        if (allowed !== MAX_UINT256) {
            this.approve(from, spender, allowed - amount);
        }
        this.move(from, to, amount);
        return true;
    }

    /**
     * Balance-move primitive: debit `from`, credit `to`.
     * Insufficient balance is the only failure mode.
     */
    move(from: string, to: string, amount: bigint): void {
        if (amount < 0n) {
            throw new TransferError(`Negative ${this.symbol} transfer: ${amount}`);
        }
        this.requireBalance(from, amount);
        this.setBalance(from, this.balanceOf(from) - amount);
        this.setBalance(to, this.balanceOf(to) + amount);
    }

    // ========== SUPPLY ==========

    mint(caller: string, to: string, amount: bigint): void {
        this.requireMinter(caller, 'Mint');
        if (amount < 0n) throw new TransferError(`Negative ${this.symbol} mint: ${amount}`);
        this.supply = SafeMath.add(this.supply, amount);
        this.setBalance(to, this.balanceOf(to) + amount);
    }

    burn(caller: string, from: string, amount: bigint): void {
        this.requireMinter(caller, 'Burn');
        if (amount < 0n) throw new TransferError(`Negative ${this.symbol} burn: ${amount}`);
        this.requireBalance(from, amount);
        this.setBalance(from, this.balanceOf(from) - amount);
        this.supply -= amount;
    }

    // ========== INTERNALS ==========

    private requireMinter(caller: string, action: string): void {
        if (this.minter !== null && caller !== this.minter) {
            throw new UnauthorizedError(caller, `${action} ${this.symbol}`);
        }
    }

    private requireBalance(owner: string, amount: bigint): void {
        const balance = this.balanceOf(owner);
        if (balance < amount) {
            throw new MathError(
                'UNDERFLOW',
                `Insufficient ${this.symbol} balance: ${owner} has ${balance}, needs ${amount}`
            );
        }
    }

    private setBalance(owner: string, amount: bigint): void {
        if (amount === 0n) {
            this.balances.delete(owner);
        } else {
            this.balances.set(owner, amount);
        }
    }

    // ========== JOURNAL ==========

    checkpoint(): Rollback {
        const supply = this.supply;
        const balances = new Map(this.balances);
        const allowances = new Map(
            Array.from(this.allowances.entries()).map(([owner, spenders]) => [owner, new Map(spenders)])
        );
        return () => {
            this.supply = supply;
            this.balances = balances;
            this.allowances = allowances;
        };
    }

    // ========== SERIALIZATION ==========

    toJSON(): FungibleLedgerData {
        return {
            address: this.address,
            name: this.name,
            symbol: this.symbol,
            decimals: this.decimals,
            minter: this.minter,
            totalSupply: this.supply.toString(),
            balances: Object.fromEntries(
                Array.from(this.balances.entries()).map(([k, v]) => [k, v.toString()])
            ),
            allowances: Object.fromEntries(
                Array.from(this.allowances.entries()).map(([owner, spenders]) => [
                    owner,
                    Object.fromEntries(Array.from(spenders.entries()).map(([s, v]) => [s, v.toString()])),
                ])
            ),
        };
    }

    loadData(data: FungibleLedgerData): void {
        this.supply = BigInt(data.totalSupply);
        this.balances = new Map(Object.entries(data.balances).map(([k, v]) => [k, BigInt(v)]));
        this.allowances = new Map(
            Object.entries(data.allowances).map(([owner, spenders]) => [
                owner,
                new Map(Object.entries(spenders).map(([s, v]) => [s, BigInt(v)])),
            ])
        );
    }

    static fromJSON(data: FungibleLedgerData): FungibleLedger {
        const ledger = new FungibleLedger({
            address: data.address,
            name: data.name,
            symbol: data.symbol,
            decimals: data.decimals,
            minter: data.minter,
        });
        ledger.loadData(data);
        return ledger;
    }
}
