/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                    Environment Variable Schema                            ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Defines the schema for all environment variables read by the settlement
 * node. This schema is used to validate configuration at startup.
 *
 * @packageDocumentation
 */

import { ethers } from 'ethers'
import type { EnvVariable } from '../types/setup.js'

const postgresUrl = (value: string): true | string => {
	if (!value.startsWith('postgres://') && !value.startsWith('postgresql://')) {
		return 'Must be a valid PostgreSQL connection string'
	}
	return true
}

const bearerToken = (value: string): true | string =>
	value.length >= 32 || 'Token should be at least 32 characters for security'

/** Validator of an integer setting no lower than `min` */
const integerAtLeast =
	(min: number, message: string) =>
	(value: string): true | string => {
		const n = Number(value)
		if (!Number.isInteger(n) || n < min) {
			return message
		}
		return true
	}

/**
 * Environment variable schema defining all configuration requirements.
 * Each entry describes a variable's validation rules, transformations, and metadata.
 */
export const envSchema: EnvVariable[] = [
	{
		name: 'API_BEARER_TOKEN',
		required: true,
		type: 'string',
		description: 'Bearer token for POST endpoint authentication',
		sensitive: true,
		validator: bearerToken,
	},
	{
		name: 'ADMIN_BEARER_TOKEN',
		required: true,
		type: 'string',
		description:
			'Bearer token authenticating the corridor administrator on admin endpoints',
		sensitive: true,
		validator: (value) => {
			const result = bearerToken(value)
			if (result !== true) return result
			if (value === process.env.API_BEARER_TOKEN) {
				return 'Must differ from API_BEARER_TOKEN'
			}
			return true
		},
	},
	{
		name: 'CORRIDOR_ADMIN_ADDRESS',
		required: true,
		type: 'address',
		description: 'Initial administrator of corridors, fees and flow resets',
		validator: (value) => {
			try {
				ethers.getAddress(value)
				return true
			} catch {
				return 'Must be a valid Ethereum address'
			}
		},
		transformer: (value) => ethers.getAddress(value),
	},
	{
		name: 'DATABASE_URL',
		required: false,
		type: 'url',
		description:
			'PostgreSQL connection string (engine state is kept in memory only if not set)',
		sensitive: true,
		validator: postgresUrl,
	},
	{
		name: 'TEST_DATABASE_URL',
		required: false,
		type: 'url',
		description:
			'Test database connection string (auto-derived from DATABASE_URL if not set)',
		sensitive: true,
		validator: postgresUrl,
	},
	{
		name: 'DATABASE_SSL',
		required: false,
		type: 'boolean',
		description: 'Enable SSL for database connections',
		defaultValue: true,
		transformer: (value: string) => value.toLowerCase() !== 'false',
	},
	{
		name: 'PORT',
		required: false,
		type: 'number',
		description: 'Server port',
		defaultValue: 3000,
		validator: (value) => {
			const port = parseInt(value)
			if (isNaN(port) || port < 1 || port > 65535) {
				return 'Port must be between 1 and 65535'
			}
			return true
		},
		transformer: (value) => parseInt(value),
	},
	{
		name: 'LOG_LEVEL',
		required: false,
		type: 'number',
		description:
			'Logging level (0=silly, 1=trace, 2=debug, 3=info, 4=warn, 5=error, 6=fatal)',
		defaultValue: 3,
		validator: (value) => {
			const level = parseInt(value)
			if (isNaN(level) || level < 0 || level > 6) {
				return 'Log level must be between 0 and 6'
			}
			return true
		},
		transformer: (value) => parseInt(value),
	},
	{
		name: 'DIAGNOSTIC_LOGGER',
		required: false,
		type: 'boolean',
		description: 'Enable diagnostic logging',
		defaultValue: false,
		transformer: (value) => value === 'true',
	},
	{
		name: 'RATE_LIMIT_ENABLED',
		required: false,
		type: 'boolean',
		description: 'Enable rate limiting middleware',
		defaultValue: true,
		transformer: (value: string) => value.toLowerCase() !== 'false',
	},
	{
		name: 'RATE_LIMIT_WINDOW_MS',
		required: false,
		type: 'number',
		description: 'Rate limit window duration in milliseconds',
		defaultValue: 60000,
		validator: integerAtLeast(
			1000,
			'Window must be at least 1000ms (1 second)'
		),
		transformer: (value) => parseInt(value),
	},
	{
		name: 'RATE_LIMIT_PERMISSIVE',
		required: false,
		type: 'number',
		description: 'Max requests per window for permissive tier',
		defaultValue: 300,
		validator: integerAtLeast(1, 'Max must be at least 1'),
		transformer: (value) => parseInt(value),
	},
	{
		name: 'RATE_LIMIT_STANDARD',
		required: false,
		type: 'number',
		description: 'Max requests per window for standard tier',
		defaultValue: 100,
		validator: integerAtLeast(1, 'Max must be at least 1'),
		transformer: (value) => parseInt(value),
	},
	{
		name: 'RATE_LIMIT_STRICT',
		required: false,
		type: 'number',
		description: 'Max requests per window for strict tier',
		defaultValue: 50,
		validator: integerAtLeast(1, 'Max must be at least 1'),
		transformer: (value) => parseInt(value),
	},
	{
		name: 'GAS_PER_INTENT_ESTIMATE',
		required: false,
		type: 'number',
		description: 'Gas saved per netted intent, reported as costSavedEstimate',
		defaultValue: 50000,
		validator: integerAtLeast(0, 'Must be a non-negative integer'),
		transformer: (value) => parseInt(value),
	},
	{
		name: 'WEBHOOK_URL',
		required: false,
		type: 'url',
		description: 'Webhook URL for settlement notifications',
		sensitive: true,
		validator: (value) => {
			try {
				new URL(value)
				return true
			} catch {
				return 'Must be a valid URL'
			}
		},
	},
	{
		name: 'WEBHOOK_SECRET',
		required: false,
		type: 'string',
		description: 'Webhook secret for authentication',
		sensitive: true,
		validator: (value) => {
			if (value.trim() === '') {
				return 'Must be a non-empty string'
			}
			return true
		},
	},
	{
		name: 'WEBHOOK_TIMEOUT_MS',
		required: false,
		type: 'number',
		description: 'Timeout of a single webhook delivery attempt',
		defaultValue: 6000,
		validator: integerAtLeast(100, 'Timeout must be at least 100ms'),
		transformer: (value) => parseInt(value),
	},
	{
		name: 'WEBHOOK_MAX_RETRIES',
		required: false,
		type: 'number',
		description: 'Delivery attempts before a webhook is dropped',
		defaultValue: 6,
		validator: integerAtLeast(1, 'Must be at least 1'),
		transformer: (value) => parseInt(value),
	},
]
