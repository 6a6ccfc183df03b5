import { FungibleLedger } from './FungibleLedger.js';

/**
 * Pool-share (LP) token. Only the owning pair can mint or burn.
 */
export class ShareToken extends FungibleLedger {
    readonly pair: string;

    constructor(address: string, pair: string, name: string, symbol: string) {
        super({ address, name, symbol, decimals: 18, minter: pair });
        this.pair = pair;
    }
}
