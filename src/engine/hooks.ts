/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                            Trade Hooks                                    ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Capability the trade-execution host calls synchronously around each trade.
 *
 * - onBeforeTrade: records an intent for deferred requests, otherwise
 *   quotes the dynamic fee of the immediate trade.
 * - onAfterTrade: feeds the executed volume to the flow accumulator.
 *
 * A deferred request never executes: the result carries `execute: false`
 * and the host must skip the trade. Intent creation and trade execution stay
 * separate.
 *
 * @packageDocumentation
 */

import { ethers } from 'ethers'
import { ValidationError } from '../errors.js'
import { createLogger, diagnostic } from '../utils/logger.js'
import { NO_OVERRIDE } from './feePolicy.js'
import type { CorridorRegistry } from './corridorRegistry.js'
import type { FeePolicy } from './feePolicy.js'
import type { FlowAccumulator } from './flowAccumulator.js'
import type { IntentLedger } from './intentLedger.js'
import type {
	BeforeTradeResult,
	DeferredModeSignal,
	ExecutedTrade,
	TradeHooks,
	TradeRequest,
} from '../types/core.js'

const logger = createLogger('TradeHooks')

/** ABI layout of hook data: (bool deferred, uint256 minOut, uint256 deadline) */
const HOOK_DATA_TYPES = ['bool', 'uint256', 'uint256'] as const

const abiCoder = ethers.AbiCoder.defaultAbiCoder()

/**
 * Encodes hook data for a trade request.
 */
export function encodeHookData(
	deferred: boolean,
	minOut: bigint,
	deadline: number
): string {
	return abiCoder.encode(HOOK_DATA_TYPES, [deferred, minOut, deadline])
}

/**
 * Decodes hook data. Empty data, or a cleared deferred flag, means the
 * trade is immediate and yields null.
 *
 * @throws ValidationError `InvalidHookData` when the bytes do not decode
 */
export function decodeHookData(
	hookData: string | undefined
): DeferredModeSignal | null {
	if (!hookData || hookData === '0x') {
		return null
	}

	let deferred: unknown
	let minOut: unknown
	let deadline: unknown
	try {
		;[deferred, minOut, deadline] = abiCoder.decode(HOOK_DATA_TYPES, hookData)
	} catch (error) {
		diagnostic.debug('Hook data decode failed', {
			hookData,
			error: error instanceof Error ? error.message : String(error),
		})
		throw new ValidationError(
			'InvalidHookData',
			'Hook data must encode (bool, uint256, uint256)',
			'hookData',
			hookData
		)
	}

	if (
		typeof deferred !== 'boolean' ||
		typeof minOut !== 'bigint' ||
		typeof deadline !== 'bigint'
	) {
		throw new ValidationError(
			'InvalidHookData',
			'Hook data decoded to unexpected types',
			'hookData',
			hookData
		)
	}
	if (!deferred) {
		return null
	}
	if (deadline > BigInt(Number.MAX_SAFE_INTEGER)) {
		throw new ValidationError(
			'InvalidDeadline',
			'Deadline is out of range',
			'deadline',
			deadline
		)
	}

	return { minOut, deadline: Number(deadline) }
}

export class CorridorTradeHooks implements TradeHooks {
	constructor(
		private readonly ledger: IntentLedger,
		private readonly fees: FeePolicy,
		private readonly flow: FlowAccumulator,
		private readonly registry: CorridorRegistry
	) {}

	/**
	 * Pre-trade hook. The owner is whatever the host declares in the request.
	 */
	onBeforeTrade(request: TradeRequest): BeforeTradeResult {
		const signal = decodeHookData(request.hookData)

		if (signal) {
			const amount =
				request.amountSpecified < 0n
					? -request.amountSpecified
					: request.amountSpecified

			const intent = this.ledger.create({
				owner: request.owner,
				corridorId: request.corridorId,
				zeroForOne: request.zeroForOne,
				amount,
				priceLimit: request.priceLimit ?? null,
				minOut: signal.minOut,
				deadline: signal.deadline,
			})

			logger.debug(`Trade deferred as intent #${intent.id}`, {
				corridorId: request.corridorId,
			})

			return {
				mode: 'deferred',
				intent,
				fee: NO_OVERRIDE,
				balanceDelta: 0n,
				execute: false,
			}
		}

		return {
			mode: 'immediate',
			fee: this.fees.effectiveFee(request.corridorId),
			execute: true,
		}
	}

	/**
	 * Post-trade hook. Trades on unregistered corridors are ignored and
	 * return undefined; otherwise the corridor's new flow is returned.
	 */
	onAfterTrade(trade: ExecutedTrade): bigint | undefined {
		if (!this.registry.isRegistered(trade.corridorId)) {
			diagnostic.debug('Trade on unregistered corridor ignored', {
				corridorId: trade.corridorId,
			})
			return undefined
		}

		return this.flow.onTradeExecuted(
			trade.corridorId,
			trade.zeroForOne,
			trade.amountPaid
		)
	}
}
