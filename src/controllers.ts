/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                           Engine Controllers                              ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Request handlers exposing the settlement engine over HTTP.
 *
 * Key operations:
 * - Intent queries
 * - Single and batch settlement
 * - Pre/post-trade hooks for the execution host
 * - Corridor, fee and flow administration
 *
 * Amounts travel as decimal strings in both directions. Mutating handlers
 * flush the state journal before responding.
 *
 * @packageDocumentation
 */

import type { Request, Response } from 'express'
import { callerOf } from './auth.js'
import { handleEngineError } from './errors.js'
import { createLogger, diagnostic } from './utils/logger.js'
import {
	DEFAULT_OWNER_PAGE_SIZE,
	MAX_OWNER_PAGE_SIZE,
} from './config/engineSettings.js'
import {
	field,
	validateAddress,
	validateArray,
	validateBoolean,
	validateCorridorId,
	validateFee,
	validateHexBytes,
	validateInt,
	validateIntentId,
	validateOwner,
	validatePageSize,
	validateUint,
} from './utils/validator.js'
import type { AppContext } from './types/app.js'
import type {
	BeforeTradeResult,
	CoWStats,
	CorridorConfig,
	FeeParams,
	FeeQuote,
	Intent,
} from './types/core.js'

/** Logger instance for controllers module */
const logger = createLogger('Controller')

type Handler = (req: Request, res: Response) => Promise<void>

/*
╔═══════════════════════════════════════════════════════════════════════════╗
║                            SERIALIZATION                                  ║
╚═══════════════════════════════════════════════════════════════════════════╝
*/

function serializeIntent(intent: Intent) {
	return {
		id: intent.id,
		owner: intent.owner,
		corridorId: intent.corridorId,
		zeroForOne: intent.zeroForOne,
		amount: intent.amount.toString(),
		priceLimit: intent.priceLimit === null ? null : intent.priceLimit.toString(),
		minOut: intent.minOut.toString(),
		deadline: intent.deadline,
		settled: intent.settled,
		createdAt: intent.createdAt,
	}
}

function serializeStats(stats: CoWStats) {
	return {
		corridorId: stats.corridorId,
		validCount: stats.validCount,
		totalLeg0: stats.totalLeg0.toString(),
		totalLeg1: stats.totalLeg1.toString(),
		matchedAmount: stats.matchedAmount.toString(),
		residualToVenue: stats.residualToVenue.toString(),
		residualZeroForOne: stats.residualZeroForOne,
		costSavedEstimate: stats.costSavedEstimate.toString(),
		settledIds: stats.settledIds,
	}
}

function serializeFeeParams(params: FeeParams) {
	return {
		baseFee: params.baseFee,
		maxExtraFee: params.maxExtraFee,
		netFlowThreshold: params.netFlowThreshold.toString(),
	}
}

function serializeBeforeTrade(result: BeforeTradeResult) {
	if (result.mode === 'deferred') {
		return {
			mode: result.mode,
			execute: result.execute,
			intent: serializeIntent(result.intent),
			fee: serializeFee(result.fee),
			balanceDelta: result.balanceDelta.toString(),
		}
	}
	return {
		mode: result.mode,
		execute: result.execute,
		fee: serializeFee(result.fee),
	}
}

function serializeFee(fee: FeeQuote) {
	return fee.override
		? { override: true, fee: fee.fee, encoded: fee.encoded }
		: { override: false, fee: 0 }
}

function serializeCorridor(corridor: CorridorConfig) {
	return { ...corridor }
}

/**
 * Sends the error response for `error`. Engine errors keep their status;
 * anything else is logged and becomes a 500.
 */
function sendError(res: Response, error: unknown, operation: string): void {
	const errorResponse = handleEngineError(error)
	if (errorResponse.status === 500) {
		logger.error(`Error in ${operation}:`, error)
	} else {
		diagnostic.debug(`${operation} rejected`, errorResponse)
	}
	res.status(errorResponse.status).json(errorResponse)
}

/*
╔═══════════════════════════════════════════════════════════════════════════╗
║                              HANDLERS                                     ║
╚═══════════════════════════════════════════════════════════════════════════╝
*/

/**
 * Builds the route handlers over one application context.
 */
export function createControllers(ctx: AppContext) {
	const { engine } = ctx
	const startedAt = Date.now()

	const flush = async (): Promise<void> => {
		if (ctx.journal) {
			await ctx.journal.flush()
		}
	}

	/**
	 * GET /health
	 * Liveness, plus a database round trip when one is configured.
	 */
	const healthCheck: Handler = async (_req, res) => {
		if (!ctx.database) {
			res.status(200).json({ status: 'healthy', persistence: 'memory' })
			return
		}
		try {
			await ctx.database.query('SELECT 1')
			res.status(200).json({ status: 'healthy', persistence: 'postgres' })
		} catch (err) {
			logger.error('Health check failed:', err)
			res.status(503).json({ status: 'unhealthy', persistence: 'postgres' })
		}
	}

	/**
	 * GET /health/detailed
	 * Health plus engine counters and the monitor's last database status.
	 */
	const detailedHealthCheck: Handler = async (_req, res) => {
		const startTime = Date.now()
		let database: Record<string, unknown> = { status: 'not_configured' }

		if (ctx.database) {
			try {
				const dbStart = Date.now()
				await ctx.database.query('SELECT 1')
				database = {
					status: 'healthy',
					response_time_ms: Date.now() - dbStart,
					monitor: ctx.dbHealthMonitor?.getStatus(),
				}
			} catch (err) {
				database = {
					status: 'unhealthy',
					error: err instanceof Error ? err.message : String(err),
				}
			}
		}

		const healthy = database.status !== 'unhealthy'
		res.status(healthy ? 200 : 503).json({
			status: healthy ? 'healthy' : 'degraded',
			checks: {
				database,
				engine: {
					status: 'healthy',
					corridors: engine.registry.list().length,
					intents: engine.ledger.count(),
					pending_writes: ctx.journal?.pendingCount ?? 0,
				},
			},
			total_check_time_ms: Date.now() - startTime,
			timestamp: new Date().toISOString(),
		})
	}

	/**
	 * GET /info
	 */
	const getInfo: Handler = async (_req, res) => {
		const uptime = Math.floor((Date.now() - startedAt) / 1000)
		res.status(200).json({
			version: '1.0.0',
			uptime,
			nodeStarted: new Date(startedAt).toISOString(),
			admin: engine.registry.admin,
			corridors: engine.registry.list().length,
			intents: engine.ledger.count(),
			persistence: ctx.database ? 'postgres' : 'memory',
		})
	}

	/**
	 * GET /intent/:id
	 */
	const getIntent: Handler = async (req, res) => {
		try {
			const id = validateIntentId(req.params.id)
			const intent = engine.ledger.get(id)
			if (!intent) {
				res.status(404).json({ error: 'Intent not found' })
				return
			}
			res.status(200).json(serializeIntent(intent))
		} catch (error) {
			sendError(res, error, 'getIntent')
		}
	}

	/**
	 * GET /intent/owner/:address?max=
	 * Intent ids of an owner in creation order.
	 */
	const getIntentsByOwner: Handler = async (req, res) => {
		try {
			const owner = validateAddress(req.params.address, 'address')
			const max = validatePageSize(
				req.query.max,
				DEFAULT_OWNER_PAGE_SIZE,
				MAX_OWNER_PAGE_SIZE
			)
			res.status(200).json({ owner, ids: engine.ledger.intentsOf(owner, max) })
		} catch (error) {
			sendError(res, error, 'getIntentsByOwner')
		}
	}

	/**
	 * POST /settle/:id
	 */
	const settleIntent: Handler = async (req, res) => {
		try {
			const id = validateIntentId(req.params.id)
			const proposedOutput = validateUint(
				field(req.body, 'proposedOutput'),
				'proposedOutput'
			)
			const intent = engine.netting.settleOne(id, proposedOutput)
			await flush()
			res.status(200).json(serializeIntent(intent))
		} catch (error) {
			sendError(res, error, 'settleIntent')
		}
	}

	/**
	 * POST /settle/batch
	 */
	const settleBatch: Handler = async (req, res) => {
		const startTime = Date.now()
		try {
			const ids = validateArray(field(req.body, 'ids'), 'ids', validateIntentId)
			const proposedOutputs = validateArray(
				field(req.body, 'proposedOutputs'),
				'proposedOutputs',
				(value, name) => validateUint(value, name)
			)
			const stats = engine.netting.settleBatch(ids, proposedOutputs)
			await flush()

			diagnostic.info('Batch endpoint completed', {
				submitted: ids.length,
				validCount: stats.validCount,
				processingTime: Date.now() - startTime,
			})
			res.status(200).json(serializeStats(stats))
		} catch (error) {
			sendError(res, error, 'settleBatch')
		}
	}

	/**
	 * POST /hooks/before-trade
	 */
	const beforeTrade: Handler = async (req, res) => {
		const body: unknown = req.body
		try {
			const priceLimit = field(body, 'priceLimit')
			const hookData = field(body, 'hookData')
			const result = engine.hooks.onBeforeTrade({
				owner: validateOwner(field(body, 'owner')),
				corridorId: validateCorridorId(field(body, 'corridorId')),
				zeroForOne: validateBoolean(field(body, 'zeroForOne'), 'zeroForOne'),
				amountSpecified: validateInt(
					field(body, 'amountSpecified'),
					'amountSpecified'
				),
				priceLimit:
					priceLimit === undefined || priceLimit === null
						? null
						: validateInt(priceLimit, 'priceLimit'),
				hookData:
					hookData === undefined ? undefined : validateHexBytes(hookData, 'hookData'),
			})
			await flush()
			res.status(200).json(serializeBeforeTrade(result))
		} catch (error) {
			sendError(res, error, 'beforeTrade')
		}
	}

	/**
	 * POST /hooks/after-trade
	 * `applied` is false when the corridor is not registered.
	 */
	const afterTrade: Handler = async (req, res) => {
		const body: unknown = req.body
		try {
			const corridorId = validateCorridorId(field(body, 'corridorId'))
			const flow = engine.hooks.onAfterTrade({
				corridorId,
				zeroForOne: validateBoolean(field(body, 'zeroForOne'), 'zeroForOne'),
				amountPaid: validateUint(field(body, 'amountPaid'), 'amountPaid'),
			})
			await flush()
			res.status(200).json({
				corridorId,
				applied: flow !== undefined,
				flow: engine.flow.current(corridorId).toString(),
			})
		} catch (error) {
			sendError(res, error, 'afterTrade')
		}
	}

	/**
	 * GET /corridor
	 */
	const listCorridors: Handler = async (_req, res) => {
		res.status(200).json({
			corridors: engine.registry.list().map(serializeCorridor),
		})
	}

	/**
	 * GET /corridor/:corridorId
	 * Registration, fee parameters, current flow and the fee an immediate
	 * trade would pay now.
	 */
	const getCorridor: Handler = async (req, res) => {
		try {
			const corridorId = validateCorridorId(req.params.corridorId)
			const corridor = engine.registry.get(corridorId)
			const params = engine.fees.getParams(corridorId)
			res.status(200).json({
				corridorId,
				registered: corridor !== undefined,
				nettable: corridor?.nettable ?? false,
				registeredAt: corridor?.registeredAt ?? null,
				feeParams: params ? serializeFeeParams(params) : null,
				flow: engine.flow.current(corridorId).toString(),
				effectiveFee: serializeFee(engine.fees.effectiveFee(corridorId)),
			})
		} catch (error) {
			sendError(res, error, 'getCorridor')
		}
	}

	/**
	 * POST /corridor/:corridorId (admin)
	 */
	const configureCorridor: Handler = async (req, res) => {
		try {
			const corridor = engine.registry.configureCorridor(
				callerOf(res),
				validateCorridorId(req.params.corridorId),
				{ nettable: validateBoolean(field(req.body, 'nettable'), 'nettable') }
			)
			await flush()
			res.status(200).json(serializeCorridor(corridor))
		} catch (error) {
			sendError(res, error, 'configureCorridor')
		}
	}

	/**
	 * POST /corridor/:corridorId/fees (admin)
	 */
	const setFeeParams: Handler = async (req, res) => {
		const body: unknown = req.body
		try {
			const corridorId = validateCorridorId(req.params.corridorId)
			const params = engine.fees.setParams(callerOf(res), corridorId, {
				baseFee: validateFee(field(body, 'baseFee'), 'baseFee'),
				maxExtraFee: validateFee(field(body, 'maxExtraFee'), 'maxExtraFee'),
				netFlowThreshold: validateUint(
					field(body, 'netFlowThreshold'),
					'netFlowThreshold'
				),
			})
			await flush()
			res.status(200).json({ corridorId, ...serializeFeeParams(params) })
		} catch (error) {
			sendError(res, error, 'setFeeParams')
		}
	}

	/**
	 * POST /corridor/:corridorId/flow/reset (admin)
	 */
	const resetFlow: Handler = async (req, res) => {
		try {
			const corridorId = validateCorridorId(req.params.corridorId)
			const previous = engine.flow.reset(callerOf(res), corridorId)
			await flush()
			res.status(200).json({
				corridorId,
				previous: previous.toString(),
				flow: '0',
			})
		} catch (error) {
			sendError(res, error, 'resetFlow')
		}
	}

	/**
	 * POST /admin/transfer (admin)
	 * The admin token keeps authenticating the configured address, which
	 * loses admin rights once the role is transferred.
	 */
	const transferAdmin: Handler = async (req, res) => {
		try {
			const newAdmin = validateAddress(field(req.body, 'newAdmin'), 'newAdmin')
			const admin = engine.registry.transferAdmin(callerOf(res), newAdmin)
			res.status(200).json({ admin })
		} catch (error) {
			sendError(res, error, 'transferAdmin')
		}
	}

	return {
		healthCheck,
		detailedHealthCheck,
		getInfo,
		getIntent,
		getIntentsByOwner,
		settleIntent,
		settleBatch,
		beforeTrade,
		afterTrade,
		listCorridors,
		getCorridor,
		configureCorridor,
		setFeeParams,
		resetFlow,
		transferAdmin,
	}
}

export type Controllers = ReturnType<typeof createControllers>
