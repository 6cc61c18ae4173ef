/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                       POST Method Auth Middleware                         ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Middleware to protect all POST endpoints with Bearer token authorization.
 * Automatically applies authentication to state-modifying requests.
 *
 * @packageDocumentation
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express'

/**
 * Wraps `bearerAuth` so it only runs on POST requests.
 * Ensures that only authenticated requests can modify state.
 */
export function protectPostEndpoints(bearerAuth: RequestHandler): RequestHandler {
	return (req: Request, res: Response, next: NextFunction): void => {
		if (req.method === 'POST') {
			bearerAuth(req, res, next)
		} else {
			next()
		}
	}
}
