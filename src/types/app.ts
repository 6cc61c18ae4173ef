/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                       Application Context Types                           ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Everything the HTTP layer is built from. Tests build one around an
 * in-memory engine; the server adds the database, journal and monitor.
 *
 * @packageDocumentation
 */

import type { SettlementEngine } from '../engine/index.js'
import type { DatabaseHealthMonitor } from '../utils/database.js'
import type { StateJournal } from '../utils/stateStore.js'
import type { SqlClient } from './db.js'
import type { EnvironmentConfig } from './setup.js'

export interface AppContext {
	engine: SettlementEngine
	config: EnvironmentConfig
	/** Absent when the node runs in memory only */
	database?: SqlClient
	/** Flushed after every mutating request */
	journal?: StateJournal
	dbHealthMonitor?: DatabaseHealthMonitor
}
