/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                        Authentication Module                              ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Bearer token authentication middleware for protecting POST endpoints.
 *
 * Two tokens are accepted:
 * - the operator token (API_BEARER_TOKEN): anonymous caller
 * - the administrator token (ADMIN_BEARER_TOKEN): caller is
 *   CORRIDOR_ADMIN_ADDRESS
 *
 * The engine decides what an identity may do; this module only establishes
 * it. Tokens are compared in constant time.
 *
 * @packageDocumentation
 */

import { timingSafeEqual } from 'node:crypto'
import type { Request, Response, NextFunction, RequestHandler } from 'express'
import { diagnostic } from './utils/logger.js'

export type CallerRole = 'admin' | 'operator'

export interface BearerTokens {
	apiToken: string
	adminToken: string
	/** Identity the admin token authenticates */
	adminAddress: string
}

function tokenEquals(candidate: string, expected: string): boolean {
	const a = Buffer.from(candidate)
	const b = Buffer.from(expected)
	return a.length === b.length && timingSafeEqual(a, b)
}

/**
 * Creates the middleware protecting endpoints with Bearer token
 * authorization. Sets `res.locals.role` and `res.locals.caller`.
 */
export function createBearerAuth(tokens: BearerTokens): RequestHandler {
	return (req: Request, res: Response, next: NextFunction) => {
		const startTime = Date.now()
		const authHeader = req.headers['authorization']

		if (!authHeader || typeof authHeader !== 'string') {
			diagnostic.debug('Auth failed - missing header', {
				path: req.path,
				method: req.method,
				hasAuthHeader: !!authHeader,
				authHeaderType: typeof authHeader,
			})
			res.status(401).json({ error: 'Missing Authorization header' })
			return
		}

		const [scheme, token] = authHeader.split(' ')
		const role: CallerRole | null =
			scheme !== 'Bearer' || !token
				? null
				: tokenEquals(token, tokens.adminToken)
					? 'admin'
					: tokenEquals(token, tokens.apiToken)
						? 'operator'
						: null

		diagnostic.trace('Bearer auth check', {
			path: req.path,
			method: req.method,
			scheme,
			tokenPreview: token ? token.substring(0, 8) + '...' : 'none',
			authTime: Date.now() - startTime,
			role,
		})

		if (!role) {
			diagnostic.info('Auth failed - invalid token', {
				path: req.path,
				method: req.method,
				scheme,
				tokenLength: token?.length || 0,
			})
			res.status(403).json({ error: 'Invalid or missing token' })
			return
		}

		res.locals.role = role
		res.locals.caller = role === 'admin' ? tokens.adminAddress : null
		next()
	}
}

/**
 * Identity established by the bearer auth, or null for the operator and
 * unauthenticated requests.
 */
export function callerOf(res: Response): string | null {
	const caller: unknown = res.locals.caller
	return typeof caller === 'string' ? caller : null
}
