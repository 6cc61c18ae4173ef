/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                            Server Entry Point                             ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Main entry point of the corridor settlement node.
 * Validates the environment, restores engine state from the database when
 * one is configured, and starts the Express server.
 *
 * @packageDocumentation
 */

import { logger } from './utils/logger.js'
import { setupEnvironment } from './utils/env.js'
import { initializeDatabase } from './utils/database.js'
import { registerShutdownHandlers } from './utils/gracefulShutdown.js'
import { loadEngineState, StateJournal } from './utils/stateStore.js'
import { registerSettlementNotifier } from './utils/webhook.js'
import { createSettlementEngine } from './engine/index.js'
import { createApp } from './app.js'
import { createPool, pgDatabase } from './db.js'
import type { DatabaseHealthMonitor } from './utils/database.js'
import type { EngineState } from './engine/state.js'
import type { SqlDatabase } from './types/db.js'

/*
╔═══════════════════════════════════════════════════════════════════════════╗
║                          ENVIRONMENT SETUP                                ║
╚═══════════════════════════════════════════════════════════════════════════╝
*/

const envConfig = setupEnvironment()
const { PORT, CORRIDOR_ADMIN_ADDRESS } = envConfig

/*
╔═══════════════════════════════════════════════════════════════════════════╗
║                          DATABASE INITIALIZATION                          ║
╚═══════════════════════════════════════════════════════════════════════════╝
*/

const pool = createPool(envConfig)

/** Database health monitor instance */
let dbHealthMonitor: DatabaseHealthMonitor | undefined
let database: SqlDatabase | undefined
let restoredState: EngineState | undefined

if (pool) {
	try {
		database = pgDatabase(pool)
		dbHealthMonitor = await initializeDatabase(database, {
			validateSchema: true,
			startHealthMonitoring: true,
			healthCheckInterval: 30000,
		})
		restoredState = await loadEngineState(database, CORRIDOR_ADMIN_ADDRESS)
		logger.info('Database validation and monitoring initialized')
	} catch (error) {
		logger.fatal('Failed to initialize database:', error)
		process.exit(1)
	}
}

/*
╔═══════════════════════════════════════════════════════════════════════════╗
║                           ENGINE SETUP                                    ║
╚═══════════════════════════════════════════════════════════════════════════╝
*/

const engine = createSettlementEngine({
	admin: CORRIDOR_ADMIN_ADDRESS,
	state: restoredState,
	gasPerIntentEstimate: BigInt(envConfig.GAS_PER_INTENT_ESTIMATE),
})

const journal = database ? new StateJournal(database, engine.events) : undefined
const stopNotifications = registerSettlementNotifier(engine.events, envConfig)

/*
╔═══════════════════════════════════════════════════════════════════════════╗
║                           SERVER STARTUP                                  ║
╚═══════════════════════════════════════════════════════════════════════════╝
*/

const app = createApp({
	engine,
	config: envConfig,
	database,
	journal,
	dbHealthMonitor,
})

const server = app.listen(PORT, () => {
	logger.info(`Server running on port ${PORT}`)
})

registerShutdownHandlers({
	server,
	pool,
	dbHealthMonitor,
	cleanupHandlers: [
		stopNotifications,
		async () => {
			if (journal) {
				await journal.flush()
				journal.close()
			}
		},
	],
})
