// Export CLI commands for programmatic use
export { chatCommand } from './commands/chat.js';
export { simulateCommand, runSimulation, loadScript } from './commands/simulate.js';
export { leadsCommand } from './commands/leads.js';
export { LocalSessionStore } from './lib/local-session-store.js';
export { OfflineGenerator } from './lib/offline-generator.js';
export { createCliConfig } from './lib/cli-config.js';

// Re-export runtime types and utilities for CLI use
export * from '@leadflow/runtime';
