/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                              Fee Policy                                   ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Per-corridor dynamic fee configuration and the function turning
 * (parameters, current flow) into the fee of an immediate trade.
 *
 * The fee is a clamped piecewise-linear function of |flow|:
 *
 * ```
 *   fee
 *    │            ┌──────────── baseFee + maxExtraFee
 *    │           ╱
 *    │──────────╱               baseFee
 *    └─────────┴──┴──────────── |flow|
 *          threshold  2·threshold
 * ```
 *
 * @packageDocumentation
 */

import { ConfigurationError } from '../errors.js'
import {
	BPS_DENOMINATOR,
	MAX_FEE_PARAM,
	MAX_VENUE_FEE,
	OVERRIDE_FEE_FLAG,
} from '../config/engineSettings.js'
import { createLogger, diagnostic } from '../utils/logger.js'
import type { CorridorRegistry } from './corridorRegistry.js'
import type { EngineEvents } from './events.js'
import type { EngineState } from './state.js'
import type { FlowAccumulator } from './flowAccumulator.js'
import type { FeeParams, FeeQuote } from '../types/core.js'

const logger = createLogger('FeePolicy')

/** Quote telling the venue to keep its static fee */
export const NO_OVERRIDE: FeeQuote = { override: false, fee: 0 }

/**
 * Whether `fee` can be expressed in the venue's fee encoding.
 */
export function isValidVenueFee(fee: number): boolean {
	return Number.isInteger(fee) && fee >= 0 && fee <= MAX_VENUE_FEE
}

/**
 * Dynamic fee for `params` at signed `flow`, in pips.
 *
 * Flat at baseFee while |flow| ≤ threshold, rising linearly to
 * baseFee + maxExtraFee at |flow| = 2 · threshold, flat beyond.
 * A zero threshold disables the extra component.
 */
export function computeDynamicFee(params: FeeParams, flow: bigint): number {
	const absFlow = flow < 0n ? -flow : flow
	const threshold = params.netFlowThreshold
	let fee = params.baseFee

	if (threshold > 0n && absFlow > threshold) {
		// Basis points over the threshold; exceeds 10000 past 2 · threshold
		const excessRatio = ((absFlow - threshold) * BPS_DENOMINATOR) / threshold
		const maxExtra = BigInt(params.maxExtraFee)
		const scaled = (maxExtra * excessRatio) / BPS_DENOMINATOR
		const extra = scaled < maxExtra ? scaled : maxExtra
		fee += Number(extra)
	}

	return fee
}

/**
 * Venue encoding of an override fee: the fee with the override flag set.
 */
export function encodeOverrideFee(fee: number): number {
	return fee | OVERRIDE_FEE_FLAG
}

export class FeePolicy {
	constructor(
		private readonly state: EngineState,
		private readonly events: EngineEvents,
		private readonly registry: CorridorRegistry,
		private readonly flow: FlowAccumulator
	) {}

	/**
	 * Stores the corridor's fee parameters. Admin only.
	 *
	 * @throws ConfigurationError `InvalidFeeParams` when a fee is not an
	 * integer in [0, 10000] representable by the venue, or the threshold is
	 * negative
	 */
	setParams(
		caller: string | null | undefined,
		corridorId: string,
		params: FeeParams
	): FeeParams {
		this.registry.assertAdmin(caller)

		for (const [name, fee] of [
			['baseFee', params.baseFee],
			['maxExtraFee', params.maxExtraFee],
		] as const) {
			if (!isValidVenueFee(fee) || fee > MAX_FEE_PARAM) {
				throw new ConfigurationError(
					'InvalidFeeParams',
					`${name} must be an integer between 0 and ${MAX_FEE_PARAM}`,
					{ corridorId, [name]: fee }
				)
			}
		}
		if (params.netFlowThreshold < 0n) {
			throw new ConfigurationError(
				'InvalidFeeParams',
				'netFlowThreshold cannot be negative',
				{ corridorId, netFlowThreshold: params.netFlowThreshold }
			)
		}

		const stored: FeeParams = { ...params }
		this.state.feeParams.set(corridorId, stored)

		logger.info('Fee parameters updated', {
			corridorId,
			baseFee: stored.baseFee,
			maxExtraFee: stored.maxExtraFee,
			netFlowThreshold: stored.netFlowThreshold.toString(),
		})
		this.events.emit('feeParamsUpdated', { corridorId, params: { ...stored } })

		return { ...stored }
	}

	getParams(corridorId: string): FeeParams | undefined {
		const params = this.state.feeParams.get(corridorId)
		return params && { ...params }
	}

	/**
	 * Fee for an immediate trade on the corridor at its current flow.
	 * Returns NO_OVERRIDE when no base fee is configured.
	 */
	effectiveFee(corridorId: string): FeeQuote {
		const params = this.state.feeParams.get(corridorId)
		if (!params || params.baseFee === 0) {
			return NO_OVERRIDE
		}

		const flow = this.flow.current(corridorId)
		const fee = computeDynamicFee(params, flow)

		if (!isValidVenueFee(fee)) {
			throw new ConfigurationError(
				'InvalidFeeParams',
				`Computed fee ${fee} is outside the venue fee range`,
				{ corridorId, fee }
			)
		}

		diagnostic.trace('Effective fee computed', {
			corridorId,
			flow: flow.toString(),
			fee,
		})

		return { override: true, fee, encoded: encodeOverrideFee(fee) }
	}
}
