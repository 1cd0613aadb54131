export { FileStorage } from './file-storage.js';
export type { FileStorageOptions } from './file-storage.js';
