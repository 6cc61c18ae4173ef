/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                     Environment Configuration Utilities                    ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Provides utilities for validating, caching, and accessing environment
 * configuration. Ensures all required variables are present and valid at
 * startup, with cached access throughout the application lifecycle.
 *
 * @packageDocumentation
 */

import dotenv from 'dotenv'
import { logger, LogLevel } from './logger.js'
import { envSchema } from '../config/envSchema.js'
import type {
	EnvValidationResult,
	EnvValue,
	EnvironmentConfig,
} from '../types/setup.js'

/**
 * Obfuscates sensitive values based on the current log level.
 * Uses process.env.LOG_LEVEL directly to avoid circular dependency during validation.
 *
 * - SILLY (0): Shows full unobfuscated value
 * - TRACE/DEBUG (1-2): Shows partial obfuscation (last 4 chars)
 * - INFO and above (3+): Shows full obfuscation
 *
 * @param value - The sensitive value to obfuscate
 * @param isSensitive - Whether the value is marked as sensitive
 * @returns The obfuscated or original value based on log level
 * @public
 */
export function obfuscateSensitiveValue(
	value: string,
	isSensitive: boolean
): string {
	if (!isSensitive) {
		return value
	}

	// process.env is read directly: this runs before getEnvConfig() is available
	const logLevel = parseInt(process.env.LOG_LEVEL || String(LogLevel.INFO))

	if (logLevel === LogLevel.SILLY) {
		return value
	} else if (logLevel <= LogLevel.DEBUG) {
		return '***' + value.slice(-4)
	} else {
		return '********'
	}
}

/**
 * Validates all environment variables against the schema.
 * @returns Validation result containing errors and processed config
 */
export function validateEnv(): EnvValidationResult {
	const errors: EnvValidationResult['errors'] = []
	const config: EnvValidationResult['config'] = {}

	logger.info('🔍 Validating environment configuration...')

	for (const envVar of envSchema) {
		const value = process.env[envVar.name]
		const displayName = envVar.sensitive
			? `${envVar.name} (sensitive)`
			: envVar.name

		if (!value && envVar.required) {
			errors.push({
				variable: envVar.name,
				error: 'Missing required environment variable',
				description: envVar.description,
			})
			logger.error(`✗ ${displayName}: Missing`)
			continue
		}

		if (!value) {
			if (envVar.defaultValue !== undefined) {
				config[envVar.name] = envVar.defaultValue
				logger.debug(`○ ${displayName}: Using default (${envVar.defaultValue})`)
			}
			continue
		}

		if (envVar.validator) {
			const validationResult = envVar.validator(value)
			if (validationResult !== true) {
				errors.push({
					variable: envVar.name,
					error: validationResult,
					description: envVar.description,
				})
				logger.error(`✗ ${displayName}: ${validationResult}`)
				continue
			}
		}

		const transformed = envVar.transformer ? envVar.transformer(value) : value
		config[envVar.name] = transformed

		const displayValue = obfuscateSensitiveValue(
			String(transformed),
			envVar.sensitive || false
		)
		logger.info(`✓ ${displayName}: ${displayValue}`)
	}

	return {
		valid: errors.length === 0,
		errors,
		config,
	}
}

function readString(
	config: EnvValidationResult['config'],
	name: keyof EnvironmentConfig
): string | undefined {
	const value: EnvValue | undefined = config[name]
	return typeof value === 'string' ? value : undefined
}

function readNumber(
	config: EnvValidationResult['config'],
	name: keyof EnvironmentConfig
): number {
	const value = config[name]
	if (typeof value !== 'number') {
		throw new Error(`${name} is missing from the validated configuration`)
	}
	return value
}

function readBoolean(
	config: EnvValidationResult['config'],
	name: keyof EnvironmentConfig
): boolean {
	const value = config[name]
	if (typeof value !== 'boolean') {
		throw new Error(`${name} is missing from the validated configuration`)
	}
	return value
}

function requireString(
	config: EnvValidationResult['config'],
	name: keyof EnvironmentConfig
): string {
	const value = readString(config, name)
	if (value === undefined) {
		throw new Error(`${name} is missing from the validated configuration`)
	}
	return value
}

/**
 * Builds the typed configuration from a successful validation result.
 *
 * @throws Error when a variable the schema guarantees is absent
 */
export function toEnvironmentConfig(
	config: EnvValidationResult['config']
): EnvironmentConfig {
	return {
		API_BEARER_TOKEN: requireString(config, 'API_BEARER_TOKEN'),
		ADMIN_BEARER_TOKEN: requireString(config, 'ADMIN_BEARER_TOKEN'),
		CORRIDOR_ADMIN_ADDRESS: requireString(config, 'CORRIDOR_ADMIN_ADDRESS'),
		DATABASE_URL: readString(config, 'DATABASE_URL'),
		TEST_DATABASE_URL: readString(config, 'TEST_DATABASE_URL'),
		DATABASE_SSL: readBoolean(config, 'DATABASE_SSL'),
		PORT: readNumber(config, 'PORT'),
		LOG_LEVEL: readNumber(config, 'LOG_LEVEL'),
		DIAGNOSTIC_LOGGER: readBoolean(config, 'DIAGNOSTIC_LOGGER'),
		RATE_LIMIT_ENABLED: readBoolean(config, 'RATE_LIMIT_ENABLED'),
		RATE_LIMIT_WINDOW_MS: readNumber(config, 'RATE_LIMIT_WINDOW_MS'),
		RATE_LIMIT_PERMISSIVE: readNumber(config, 'RATE_LIMIT_PERMISSIVE'),
		RATE_LIMIT_STANDARD: readNumber(config, 'RATE_LIMIT_STANDARD'),
		RATE_LIMIT_STRICT: readNumber(config, 'RATE_LIMIT_STRICT'),
		GAS_PER_INTENT_ESTIMATE: readNumber(config, 'GAS_PER_INTENT_ESTIMATE'),
		WEBHOOK_URL: readString(config, 'WEBHOOK_URL'),
		WEBHOOK_SECRET: readString(config, 'WEBHOOK_SECRET'),
		WEBHOOK_TIMEOUT_MS: readNumber(config, 'WEBHOOK_TIMEOUT_MS'),
		WEBHOOK_MAX_RETRIES: readNumber(config, 'WEBHOOK_MAX_RETRIES'),
	}
}

/**
 * Prints a formatted validation report to the console.
 * @param result - The validation result to display
 */
export function printEnvValidationReport(result: EnvValidationResult): void {
	const separator = '═'.repeat(60)

	if (result.errors.length > 0) {
		const errorDetails = result.errors
			.map(
				(error) =>
					`  • ${error.variable}:\n    Error: ${error.error}\n    Description: ${error.description}`
			)
			.join('\n\n')

		const errorMessage = `❌ Environment Validation Failed\n${separator}\nFound ${result.errors.length} error(s):\n\n${errorDetails}\n${separator}`
		logger.fatal(errorMessage)

		logger.warn('Please fix the errors above and restart the application.')
	} else {
		const successMessage = `✅ Environment configuration is valid!\n${separator}\nStarting application...`
		logger.info(successMessage)
	}
}

// Cache for validated configuration
let cachedConfig: EnvironmentConfig | null = null

/**
 * Sets the validated configuration cache.
 * Called by server.ts after successful validation.
 * @param config - The validated environment configuration
 */
export function setEnvConfigCache(config: EnvironmentConfig | null): void {
	cachedConfig = config
}

/**
 * Returns the cached environment configuration.
 * Validates as fallback if not already cached (with warning).
 * Exits the process if validation fails.
 * @returns Validated environment configuration
 */
export function getEnvConfig(): EnvironmentConfig {
	if (cachedConfig) {
		return cachedConfig
	}

	logger.warn(
		'⚠️  getEnvConfig() called before environment validation completed in server.ts'
	)
	logger.warn(
		'Running fallback validation - this may indicate an initialization order issue'
	)

	const result = validateEnv()
	if (!result.valid) {
		printEnvValidationReport(result)
		process.exit(1)
	}

	cachedConfig = toEnvironmentConfig(result.config)
	return cachedConfig
}

/**
 * Sets up and validates the environment configuration.
 * Loads .env file, validates all required variables, and caches the config.
 * @returns Validated environment configuration
 */
export function setupEnvironment(): EnvironmentConfig {
	dotenv.config()

	const result = validateEnv()
	printEnvValidationReport(result)

	if (!result.valid) {
		process.exit(1)
	}

	const config = toEnvironmentConfig(result.config)
	setEnvConfigCache(config)
	return config
}
