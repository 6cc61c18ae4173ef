/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                       Node Setup Type Definitions                         ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * TypeScript type definitions for node setup and configuration.
 * Includes environment validation, configuration schemas, and initialization types.
 *
 * @packageDocumentation
 */

/** Value an environment variable takes after transformation */
export type EnvValue = string | number | boolean

/**
 * Defines the schema for an environment variable.
 * Used to validate and transform environment configuration at startup.
 */
export interface EnvVariable {
	/** The environment variable name (e.g., 'DATABASE_URL') */
	name: keyof EnvironmentConfig
	/** Whether this variable is required for the node to function */
	required: boolean
	/** The expected data type of the variable */
	type: 'string' | 'number' | 'boolean' | 'url' | 'address'
	/** Human-readable description of what this variable configures */
	description: string
	/** Optional validation function that returns true or an error message */
	validator?: (value: string) => true | string
	/** Optional transformer to convert the string value to the appropriate type */
	transformer?: (value: string) => EnvValue
	/** Default value if the environment variable is not set (only for optional vars) */
	defaultValue?: EnvValue
	/** Whether this value should be masked in logs (e.g., tokens, secrets) */
	sensitive?: boolean
}

/**
 * Result of environment validation process.
 * Contains validation status, errors, and the processed configuration.
 */
export interface EnvValidationResult {
	/** Whether all required environment variables passed validation */
	valid: boolean
	/** List of validation errors that must be fixed before startup */
	errors: Array<{
		/** The environment variable that failed validation */
		variable: string
		/** The specific error that occurred */
		error: string
		/** Description of what this variable is used for */
		description: string
	}>
	/** The validated and transformed values, by variable name */
	config: Partial<Record<keyof EnvironmentConfig, EnvValue>>
}

/**
 * Strongly-typed environment configuration after validation.
 * Optional entries are absent when the variable is unset and has no default.
 */
export interface EnvironmentConfig {
	/** Operator token for POST endpoints */
	API_BEARER_TOKEN: string
	/** Administrator token; authenticates the caller as CORRIDOR_ADMIN_ADDRESS */
	ADMIN_BEARER_TOKEN: string
	/** Initial administrator address (checksummed) */
	CORRIDOR_ADMIN_ADDRESS: string
	/** PostgreSQL connection string; unset runs the engine in memory only */
	DATABASE_URL?: string
	/** Test database connection string */
	TEST_DATABASE_URL?: string
	/** Enable SSL for database connections (default: true) */
	DATABASE_SSL: boolean
	/** Port number for the Express server (default: 3000) */
	PORT: number
	/** Logging verbosity level 0-6 (default: 3/info) */
	LOG_LEVEL: number
	/** Whether to enable detailed diagnostic logging (default: false) */
	DIAGNOSTIC_LOGGER: boolean
	RATE_LIMIT_ENABLED: boolean
	RATE_LIMIT_WINDOW_MS: number
	RATE_LIMIT_PERMISSIVE: number
	RATE_LIMIT_STANDARD: number
	RATE_LIMIT_STRICT: number
	/** Gas saved per netted intent, reported as costSavedEstimate */
	GAS_PER_INTENT_ESTIMATE: number
	/** Settlement notification endpoint */
	WEBHOOK_URL?: string
	WEBHOOK_SECRET?: string
	WEBHOOK_TIMEOUT_MS: number
	WEBHOOK_MAX_RETRIES: number
}
