/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                         Database Connection                               ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * PostgreSQL connection pool management, and the executor the state store
 * runs its statements through.
 *
 * @packageDocumentation
 */

import pgpkg from 'pg'
import { logger } from './utils/logger.js'
import { getDatabaseUrl } from './utils/databaseUrl.js'
import type { EnvironmentConfig } from './types/setup.js'
import type { SqlClient, SqlDatabase } from './types/db.js'

const { Pool } = pgpkg

/**
 * Creates a PostgreSQL connection pool based on the current environment,
 * or returns undefined when no database is configured.
 *
 * - In test mode (NODE_ENV=test): Uses TEST_DATABASE_URL
 * - In production/development: Uses DATABASE_URL
 */
export function createPool(
	config: Pick<
		EnvironmentConfig,
		'DATABASE_URL' | 'TEST_DATABASE_URL' | 'DATABASE_SSL'
	>
): pgpkg.Pool | undefined {
	const isTest = process.env.NODE_ENV === 'test'
	const connectionString = getDatabaseUrl(config, isTest)

	if (!connectionString) {
		logger.warn('No DATABASE_URL configured; engine state is kept in memory')
		return undefined
	}

	// SSL configuration (typically disabled for test databases)
	const sslEnabled = config.DATABASE_SSL && !isTest
	const ssl = sslEnabled ? { rejectUnauthorized: false } : false

	if (isTest) {
		logger.debug('Using test database')
	} else if (!sslEnabled) {
		logger.debug('Database SSL disabled (DATABASE_SSL=false)')
	}

	return new Pool({
		connectionString,
		ssl,
	})
}

/**
 * Wraps a pool as a SqlDatabase. Transactions run on one checked-out
 * client and roll back when the work rejects.
 */
export function pgDatabase(pool: pgpkg.Pool): SqlDatabase {
	return {
		async query(text, values) {
			const result = await pool.query(text, values)
			return { rows: result.rows }
		},
		async transaction<T>(work: (client: SqlClient) => Promise<T>): Promise<T> {
			const client = await pool.connect()
			try {
				await client.query('BEGIN')
				const out = await work({
					async query(text, values) {
						const result = await client.query(text, values)
						return { rows: result.rows }
					},
				})
				await client.query('COMMIT')
				return out
			} catch (error) {
				await client.query('ROLLBACK')
				throw error
			} finally {
				client.release()
			}
		},
	}
}
