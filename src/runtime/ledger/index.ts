export type { FungibleLedgerData, FungibleLedgerOptions, BaseAssetLedger } from './FungibleLedger.js';
export { FungibleLedger } from './FungibleLedger.js';
export { ShareToken } from './ShareToken.js';
export { NativeLedger } from './NativeLedger.js';
