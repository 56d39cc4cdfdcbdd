export type { IFileSystem } from './IFileSystem.js';
export { FileSystemAdapter } from './FileSystemAdapter.js';
