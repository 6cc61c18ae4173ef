/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                            Library Entry Point                            ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Public surface for embedding the settlement engine, with or without the
 * HTTP node around it. The runnable node starts from server.ts.
 *
 * @packageDocumentation
 */

export * from './engine/index.js'
export * from './errors.js'
export type * from './types/core.js'
export type { AppContext } from './types/app.js'
export type { SqlClient, SqlDatabase } from './types/db.js'
export type { EnvironmentConfig } from './types/setup.js'
export { createApp } from './app.js'
export { createPool, pgDatabase } from './db.js'
export { loadEngineState, StateJournal } from './utils/stateStore.js'
export { registerSettlementNotifier, sendWebhook } from './utils/webhook.js'
