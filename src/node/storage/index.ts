import { Storage } from './Storage.js';

export { Storage };
export type { StorageOptions } from './Storage.js';

export const storage = new Storage();
