/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                            Route Handlers                                 ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Express routes for all API endpoints.
 *
 * Route groups:
 * - /intent - Intent queries
 * - /settle - Single and batch settlement
 * - /hooks - Pre/post-trade hooks of the execution host
 * - /corridor - Corridor registration, fee parameters and flow
 * - /admin - Administrator handover
 *
 * Note: POST routes are protected by bearer auth middleware applied globally.
 *
 * @packageDocumentation
 */

import { Router } from 'express'
import type { Controllers } from './controllers.js'
import type { RouteMount } from './types/routes.js'

/**
 * Route mount configuration
 *
 * Single source of truth for all route mounts. Used by:
 * - app.ts to mount routes on the Express app
 * - logger.ts to display available endpoints
 *
 * @public
 */
export function createRouteMounts(c: Controllers): RouteMount[] {
	return [
		{
			basePath: '/health',
			router: Router()
				.get('/', c.healthCheck)
				.get('/detailed', c.detailedHealthCheck),
		},
		{
			basePath: '/info',
			router: Router().get('/', c.getInfo),
		},
		{
			basePath: '/intent',
			router: Router()
				.get('/owner/:address', c.getIntentsByOwner)
				.get('/:id', c.getIntent),
		},
		{
			basePath: '/settle',
			// '/batch' before '/:id'
			router: Router()
				.post('/batch', c.settleBatch)
				.post('/:id', c.settleIntent),
		},
		{
			basePath: '/hooks',
			router: Router()
				.post('/before-trade', c.beforeTrade)
				.post('/after-trade', c.afterTrade),
		},
		{
			basePath: '/corridor',
			router: Router()
				.get('/', c.listCorridors)
				.get('/:corridorId', c.getCorridor)
				.post('/:corridorId', c.configureCorridor)
				.post('/:corridorId/fees', c.setFeeParams)
				.post('/:corridorId/flow/reset', c.resetFlow),
		},
		{
			basePath: '/admin',
			router: Router().post('/transfer', c.transferAdmin),
		},
	]
}
