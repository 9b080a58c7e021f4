export type { Clipboard } from './types.js';
export { SystemClipboard } from './system.js';
