/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                          Route Type Definitions                           ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * TypeScript type definitions for Express route configuration and logging.
 *
 * @packageDocumentation
 */

import type { Router } from 'express'

/**
 * Route mount configuration
 *
 * Represents a mounted Express router with its base path.
 */
export interface RouteMount {
	basePath: string
	router: Router
}

/**
 * Endpoint listed at startup. Protected endpoints need a bearer token.
 */
export interface EndpointInfo {
	method: string
	path: string
	protected: boolean
}

/**
 * The part of an Express router layer read when listing endpoints.
 */
export interface RouterLayer {
	route?: {
		path: string
		methods: Record<string, boolean>
	}
}
