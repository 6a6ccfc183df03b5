export * from './protocol/params/pool.js';
export * from './protocol/errors.js';
export { SafeMath } from './protocol/utils/safe-math.js';
export { logger, setLogLevel, getLogLevel, parseLogThreshold } from './protocol/utils/logger.js';
export type { LogLevel, LogThreshold } from './protocol/utils/logger.js';
export { InputValidator, inputValidator } from './protocol/security/input-validator.js';

export { Chain } from './protocol/chain/Chain.js';
export type { Call, ChainData, ChainOptions, Receipt } from './protocol/chain/Chain.js';
export { SystemClock, ManualClock } from './protocol/chain/Clock.js';
export type { Clock } from './protocol/chain/Clock.js';
export type { CallContext } from './protocol/chain/context.js';
export type { Journaled, Rollback } from './protocol/chain/Journal.js';

export * from './runtime/ledger/index.js';
export { NFTCollection } from './runtime/nft/NFTCollection.js';
export type { NFTCollectionData, TransferRecord } from './runtime/nft/NFTCollection.js';

export { Pair } from './runtime/pool/Pair.js';
export type { BaseAsset, PairData, PairDeps, PairIdentity, PairInfo, PairRegistry, PairStatus } from './runtime/pool/Pair.js';
export { PairFactory } from './runtime/pool/PairFactory.js';
export type { FactoryEnvironment, PairFactoryData } from './runtime/pool/PairFactory.js';
export { AllowListTree, isEligible, leafHash, hashPair, verifyProof } from './runtime/pool/AllowList.js';
export type { Proof } from './runtime/pool/AllowList.js';
export { EventLog } from './runtime/pool/events.js';
export type { EventSink, PoolEvent, PoolEventType } from './runtime/pool/events.js';
export { quoteAdd, quoteBuy, quoteRemove, quoteSell, spotPrice } from './runtime/pool/pricing.js';
export type { RemoveQuote, Reserves } from './runtime/pool/pricing.js';

export { Storage } from './node/storage/Storage.js';
export type { StorageOptions } from './node/storage/Storage.js';
