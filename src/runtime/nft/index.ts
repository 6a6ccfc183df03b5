export type { NFTCollectionData } from './NFTCollection.js';
export { NFTCollection } from './NFTCollection.js';
