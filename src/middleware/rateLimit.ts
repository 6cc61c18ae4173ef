/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                        Rate Limiting Middleware                           ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Express middleware for rate limiting API requests.
 * Provides tiered rate limiting (permissive/standard/strict) with dual-key strategy
 * (IP address + Bearer token) for layered protection.
 *
 * Features:
 * - PostgreSQL-backed storage when a database is configured, memory otherwise
 * - Dual-key rate limiting: IP-based AND token-based
 * - Configurable tiers: permissive, standard, strict
 * - Standards-compliant headers (RateLimit-*)
 * - Global enable/disable via environment variable
 *
 * @packageDocumentation
 */

import rateLimit, { ipKeyGenerator } from 'express-rate-limit'
import { PostgresStore } from '@acpr/rate-limit-postgresql'
import type { Request, RequestHandler } from 'express'
import { logger } from '../utils/logger.js'
import type { EnvironmentConfig } from '../types/setup.js'

/**
 * Rate limit tier definitions
 * @public
 */
export type RateLimitTier = 'permissive' | 'standard' | 'strict'

/**
 * Custom rate limit configuration
 * @public
 */
export interface CustomRateLimitConfig {
	max: number
	windowMs: number
}

export type RateLimitSettings = Pick<
	EnvironmentConfig,
	| 'RATE_LIMIT_ENABLED'
	| 'RATE_LIMIT_WINDOW_MS'
	| 'RATE_LIMIT_PERMISSIVE'
	| 'RATE_LIMIT_STANDARD'
	| 'RATE_LIMIT_STRICT'
	| 'DATABASE_URL'
>

/**
 * Generates a unique rate limit key based on both IP address and Bearer token.
 * This provides layered protection:
 * - IP-based limiting prevents broad abuse
 * - Token-based limiting prevents per-user abuse
 *
 * Uses express-rate-limit's ipKeyGenerator helper to handle IPv6 addresses correctly.
 *
 * @internal
 */
function generateRateLimitKey(req: Request): string {
	const authHeader = req.headers.authorization

	if (authHeader && typeof authHeader === 'string') {
		const [scheme, token] = authHeader.split(' ')
		if (scheme === 'Bearer' && token) {
			// First 16 chars keep keys short
			return `token:${token.substring(0, 16)}`
		}
	}

	const ip = req.ip || req.socket.remoteAddress || 'unknown'
	return `ip:${ipKeyGenerator(String(ip))}`
}

/**
 * Creates a rate limiter middleware with specified configuration.
 *
 * @param settings - Rate limit variables of the validated environment
 * @param tierOrConfig - Rate limit tier ('permissive', 'standard', 'strict') or custom config
 *
 * @example
 * ```typescript
 * app.use(createRateLimiter(config, 'permissive'))
 * app.use(createRateLimiter(config, { max: 50, windowMs: 30000 }))
 * ```
 *
 * @public
 */
export function createRateLimiter(
	settings: RateLimitSettings,
	tierOrConfig: RateLimitTier | CustomRateLimitConfig = 'permissive'
): RequestHandler {
	if (!settings.RATE_LIMIT_ENABLED) {
		logger.info('⚠️  Rate limiting is disabled (RATE_LIMIT_ENABLED=false)')
		return (_req, _res, next) => next()
	}

	let max: number
	let windowMs: number

	if (typeof tierOrConfig === 'string') {
		const maxByTier: Record<RateLimitTier, number> = {
			permissive: settings.RATE_LIMIT_PERMISSIVE,
			standard: settings.RATE_LIMIT_STANDARD,
			strict: settings.RATE_LIMIT_STRICT,
		}
		max = maxByTier[tierOrConfig]
		windowMs = settings.RATE_LIMIT_WINDOW_MS
	} else {
		max = tierOrConfig.max
		windowMs = tierOrConfig.windowMs
	}

	logger.debug(`Rate limiter created: ${max} requests per ${windowMs}ms`, {
		tier: typeof tierOrConfig === 'string' ? tierOrConfig : 'custom',
		store: settings.DATABASE_URL ? 'postgres' : 'memory',
	})

	return rateLimit({
		windowMs,
		limit: max,
		standardHeaders: true,
		legacyHeaders: false,
		// Default memory store when no database is configured
		...(settings.DATABASE_URL
			? {
					store: new PostgresStore(
						{ connectionString: settings.DATABASE_URL },
						'corridor-rate-limit'
					),
				}
			: {}),
		keyGenerator: generateRateLimitKey,
		handler: (req, res) => {
			logger.warn('Rate limit exceeded', {
				key: generateRateLimitKey(req),
				path: req.path,
				method: req.method,
			})
			res.status(429).json({
				error: 'Too many requests',
				message: 'Rate limit exceeded. Please try again later.',
				retryAfter: Math.ceil(windowMs / 1000),
			})
		},
	})
}
