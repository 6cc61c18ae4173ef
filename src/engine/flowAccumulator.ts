/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                           Flow Accumulator                                ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Per-corridor signed running total of directional trade pressure.
 * Positive flow means net leg0 → leg1 volume. No decay and no time window:
 * the total only changes on executed trades or an administrator reset.
 *
 * @packageDocumentation
 */

import { ValidationError } from '../errors.js'
import { createLogger, diagnostic } from '../utils/logger.js'
import type { CorridorRegistry } from './corridorRegistry.js'
import type { EngineEvents } from './events.js'
import type { EngineState } from './state.js'

const logger = createLogger('FlowAccumulator')

export class FlowAccumulator {
	constructor(
		private readonly state: EngineState,
		private readonly events: EngineEvents,
		private readonly registry: CorridorRegistry
	) {}

	/**
	 * Current signed flow of a corridor (0 when never traded).
	 */
	current(corridorId: string): bigint {
		return this.state.flow.get(corridorId) ?? 0n
	}

	/**
	 * Adds an executed trade to the corridor's flow and returns the new total.
	 * `flowUpdated` is emitted only when the total changed.
	 */
	onTradeExecuted(
		corridorId: string,
		zeroForOne: boolean,
		amountPaid: bigint
	): bigint {
		if (amountPaid < 0n) {
			throw new ValidationError(
				'InvalidAmount',
				'Amount paid cannot be negative',
				'amountPaid',
				amountPaid
			)
		}

		const previous = this.current(corridorId)
		const next = zeroForOne ? previous + amountPaid : previous - amountPaid

		if (next === previous) {
			diagnostic.trace('Flow unchanged', { corridorId })
			return previous
		}

		this.state.flow.set(corridorId, next)
		logger.debug(`Flow ${previous} → ${next}`, { corridorId })
		this.events.emit('flowUpdated', { corridorId, previous, current: next })

		return next
	}

	/**
	 * Sets the corridor's flow to zero. Admin only; always emits `flowReset`.
	 */
	reset(caller: string | null | undefined, corridorId: string): bigint {
		this.registry.assertAdmin(caller)

		const previous = this.current(corridorId)
		this.state.flow.set(corridorId, 0n)

		logger.info(`Flow reset from ${previous}`, { corridorId })
		this.events.emit('flowReset', { corridorId, previous, current: 0n })

		return previous
	}
}
