/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                     Database Validation Utility                           ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Startup checks and health monitoring for the state store database.
 * Everything runs through the SqlClient seam, so the pg pool and the
 * in-process test database are checked the same way.
 *
 * @packageDocumentation
 */

import { setTimeout as sleep } from 'timers/promises'
import { createLogger, diagnostic } from './logger.js'
import {
	DEFAULT_RETRY_CONFIG,
	DEFAULT_HEALTH_CHECK_INTERVAL,
	REQUIRED_TABLES,
} from '../config/dbSettings.js'
import type {
	DatabaseValidationResult,
	DatabaseRetryConfig,
	DatabaseInitOptions,
	DatabaseHealthStatus,
	SqlClient,
} from '../types/db.js'

/** Logger instance for database validation */
const logger = createLogger('DatabaseValidator')

function messageOf(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

/**
 * Operator hint for connection failures caused by configuration.
 */
function hintFor(message: string): string | undefined {
	if (message.includes('does not support SSL')) {
		return 'SSL connection failed. For a local database set DATABASE_SSL=false'
	}
	if (/database ".*" does not exist/.test(message)) {
		return 'Database does not exist. Create it first, e.g. createdb corridor_db'
	}
	if (message.includes('password authentication failed')) {
		return 'Authentication failed. Check the credentials in DATABASE_URL'
	}
	return undefined
}

function tableNameOf(row: unknown): string | undefined {
	if (typeof row !== 'object' || row === null || !('table_name' in row)) {
		return undefined
	}
	return typeof row.table_name === 'string' ? row.table_name : undefined
}

/**
 * Round-trips the database until it answers, backing off exponentially
 * between attempts.
 */
export async function validateConnection(
	database: SqlClient,
	retryConfig: DatabaseRetryConfig = DEFAULT_RETRY_CONFIG
): Promise<DatabaseValidationResult> {
	const { maxAttempts, delayMs, backoffMultiplier } = retryConfig
	const startTime = Date.now()
	let lastError = 'no connection attempt was made'

	for (let attempt = 1; attempt <= maxAttempts; attempt++) {
		try {
			await database.query('SELECT 1')

			const connectionTime = Date.now() - startTime
			logger.info(`Database reachable (attempt ${attempt}/${maxAttempts})`, {
				connectionTime,
			})
			return {
				success: true,
				details: { attemptsNeeded: attempt, connectionTime },
			}
		} catch (error) {
			lastError = messageOf(error)
			logger.warn(`Database connection attempt ${attempt}/${maxAttempts} failed: ${lastError}`)

			const hint = hintFor(lastError)
			if (hint) {
				logger.warn(`‼️ ${hint}`)
			}

			if (attempt < maxAttempts) {
				const delay = delayMs * backoffMultiplier ** (attempt - 1)
				diagnostic.debug('Retrying database connection', { attempt, delay })
				await sleep(delay)
			}
		}
	}

	const totalTime = Date.now() - startTime
	diagnostic.error('Database unreachable', { maxAttempts, lastError, totalTime })

	return {
		success: false,
		error: lastError,
		details: { attempts: maxAttempts, totalTime },
	}
}

/**
 * Checks that every table the state store reads and writes exists in the
 * public schema.
 */
export async function validateSchema(
	database: SqlClient
): Promise<DatabaseValidationResult> {
	let rows: unknown[]
	try {
		;({ rows } = await database.query(
			`SELECT table_name FROM information_schema.tables
			WHERE table_schema = 'public' AND table_name = ANY($1)`,
			[[...REQUIRED_TABLES]]
		))
	} catch (error) {
		logger.error('Schema validation query failed:', error)
		return {
			success: false,
			error: `Schema validation error: ${messageOf(error)}`,
		}
	}

	const present = new Set(rows.map(tableNameOf))
	const missingTables = REQUIRED_TABLES.filter((table) => !present.has(table))

	if (missingTables.length > 0) {
		logger.error('Missing database tables (see sql/schema.sql):', missingTables)
		return {
			success: false,
			error: `Missing required tables: ${missingTables.join(', ')}`,
			details: { missingTables },
		}
	}

	logger.info(`Database schema valid (${REQUIRED_TABLES.length} tables)`)
	return {
		success: true,
		details: { tablesValidated: [...REQUIRED_TABLES] },
	}
}

/**
 * Periodic `SELECT 1` against the database, counting consecutive failures.
 */
export class DatabaseHealthMonitor {
	private status: DatabaseHealthStatus = { isHealthy: false, failedChecks: 0 }
	private timer?: NodeJS.Timeout

	constructor(private readonly database: SqlClient) {}

	start(intervalMs: number = DEFAULT_HEALTH_CHECK_INTERVAL): void {
		this.stop()
		this.timer = setInterval(() => {
			void this.check()
		}, intervalMs)
		logger.info(`Health monitoring started (interval: ${intervalMs}ms)`)
	}

	/**
	 * Runs one check and records it. Never rejects.
	 */
	async check(): Promise<DatabaseHealthStatus> {
		const wasHealthy = this.status.isHealthy
		try {
			await this.database.query('SELECT 1')
			if (!wasHealthy && (this.status.failedChecks ?? 0) > 0) {
				logger.info('Database connection restored')
			}
			this.status = {
				isHealthy: true,
				lastHealthCheck: new Date(),
				failedChecks: 0,
			}
		} catch (error) {
			const failedChecks = (this.status.failedChecks ?? 0) + 1
			if (wasHealthy) {
				logger.error('Database connection lost:', error)
			}
			diagnostic.warn('Database health check failed', {
				error: messageOf(error),
				failedChecks,
			})
			this.status = {
				isHealthy: false,
				lastHealthCheck: new Date(),
				failedChecks,
			}
		}
		return this.getStatus()
	}

	stop(): void {
		if (this.timer) {
			clearInterval(this.timer)
			this.timer = undefined
			logger.info('Health monitoring stopped')
		}
	}

	getStatus(): DatabaseHealthStatus {
		return { ...this.status }
	}
}

/**
 * Validates the connection and (by default) the schema, then returns a
 * health monitor, started unless `startHealthMonitoring` is false.
 *
 * @throws Error when the database stays unreachable or tables are missing
 */
export async function initializeDatabase(
	database: SqlClient,
	options: DatabaseInitOptions = {}
): Promise<DatabaseHealthMonitor> {
	const startTime = Date.now()

	const connection = await validateConnection(database, {
		...DEFAULT_RETRY_CONFIG,
		...options.retryConfig,
	})
	if (!connection.success) {
		throw new Error(`Database connection failed: ${connection.error}`)
	}

	if (options.validateSchema !== false) {
		const schema = await validateSchema(database)
		if (!schema.success) {
			throw new Error(`Database schema validation failed: ${schema.error}`)
		}
	}

	const monitor = new DatabaseHealthMonitor(database)
	if (options.startHealthMonitoring !== false) {
		monitor.start(options.healthCheckInterval)
	}

	logger.info(`Database initialization completed in ${Date.now() - startTime}ms`)
	return monitor
}
