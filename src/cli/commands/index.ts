export { createSyncCommand } from './sync.js';
export { createPendingCommand } from './pending.js';
