/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                   Database URL Utility Functions                          ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Utilities for deriving and managing database connection URLs.
 * Used by the pool factory to pick the production or test database.
 *
 * @packageDocumentation
 */

import type { EnvironmentConfig } from '../types/setup.js'

/**
 * Derives a test database URL from a production database URL.
 * Appends '_test' to the database name.
 *
 * @param productionUrl - The production database URL
 * @returns Test database URL with '_test' appended to database name
 *
 * @example
 * deriveTestDatabaseUrl('postgresql://localhost/corridor_db')
 * // Returns: 'postgresql://localhost/corridor_db_test'
 *
 * @example
 * deriveTestDatabaseUrl('postgresql://localhost/corridor_db?ssl=true')
 * // Returns: 'postgresql://localhost/corridor_db_test?ssl=true'
 */
export function deriveTestDatabaseUrl(productionUrl: string): string {
	return productionUrl.replace(/\/([^/?]+)(\?|$)/, '/$1_test$2')
}

/**
 * Gets the appropriate database URL based on the current environment.
 *
 * - In test mode: Returns TEST_DATABASE_URL if set, otherwise derives from DATABASE_URL
 * - In production: Returns DATABASE_URL
 *
 * Returns undefined when no database is configured; the node then keeps
 * engine state in memory only.
 *
 * @param config - Validated environment configuration
 * @param isTest - Whether running in test mode
 */
export function getDatabaseUrl(
	config: Pick<EnvironmentConfig, 'DATABASE_URL' | 'TEST_DATABASE_URL'>,
	isTest: boolean
): string | undefined {
	if (!isTest) {
		return config.DATABASE_URL
	}
	if (config.TEST_DATABASE_URL) {
		return config.TEST_DATABASE_URL
	}
	return config.DATABASE_URL && deriveTestDatabaseUrl(config.DATABASE_URL)
}
