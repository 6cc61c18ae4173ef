/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                            Intent Ledger                                  ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Keyed storage of intents with a monotonic id generator and a per-owner
 * secondary index maintained at creation time.
 *
 * Intents are only ever created here and only ever flipped to settled by
 * the netting engine through `markSettled`. Nothing is deleted: expired and
 * settled intents stay queryable.
 *
 * @packageDocumentation
 */

import { IntentStateError, ValidationError } from '../errors.js'
import { MAX_INTENT_AMOUNT } from '../config/engineSettings.js'
import { createLogger, diagnostic } from '../utils/logger.js'
import { normalizeAddress, validateOwner } from '../utils/validator.js'
import type { EngineEvents } from './events.js'
import type { EngineState } from './state.js'
import type { Clock, CreateIntentParams, Intent } from '../types/core.js'

const logger = createLogger('IntentLedger')

export class IntentLedger {
	constructor(
		private readonly state: EngineState,
		private readonly events: EngineEvents,
		private readonly clock: Clock
	) {}

	/**
	 * Records a new unsettled intent and returns a copy of it.
	 *
	 * @throws ValidationError `InvalidDeadline` when the deadline is not in
	 * the future, `ZeroAmount` when amount or minOut is zero,
	 * `AmountTooLarge` above the uint128 bound, `InvalidOwner` for a missing
	 * or zero owner
	 */
	create(params: CreateIntentParams): Intent {
		const now = this.clock()

		if (params.deadline <= now) {
			throw new ValidationError(
				'InvalidDeadline',
				'Deadline must be in the future',
				'deadline',
				params.deadline,
				{ now }
			)
		}
		if (params.amount <= 0n) {
			throw new ValidationError(
				'ZeroAmount',
				'Amount must be positive',
				'amount',
				params.amount
			)
		}
		if (params.minOut <= 0n) {
			throw new ValidationError(
				'ZeroAmount',
				'Minimum output must be positive',
				'minOut',
				params.minOut
			)
		}
		if (params.amount > MAX_INTENT_AMOUNT) {
			throw new ValidationError(
				'AmountTooLarge',
				'Amount exceeds the uint128 bound',
				'amount',
				params.amount
			)
		}
		const owner = validateOwner(params.owner)

		const intent: Intent = {
			id: this.state.nextIntentId,
			owner,
			corridorId: params.corridorId,
			zeroForOne: params.zeroForOne,
			amount: params.amount,
			priceLimit: params.priceLimit ?? null,
			minOut: params.minOut,
			deadline: params.deadline,
			settled: false,
			createdAt: now,
		}

		this.state.nextIntentId++
		this.state.intents.set(intent.id, intent)

		const ownerIds = this.state.intentsByOwner.get(owner)
		if (ownerIds) {
			ownerIds.push(intent.id)
		} else {
			this.state.intentsByOwner.set(owner, [intent.id])
		}

		logger.info(`Intent #${intent.id} created`, {
			owner,
			corridorId: intent.corridorId,
			zeroForOne: intent.zeroForOne,
			amount: intent.amount.toString(),
		})
		this.events.emit('intentCreated', { ...intent })

		return { ...intent }
	}

	/**
	 * Returns a copy of the intent, or undefined when the id was never
	 * assigned.
	 */
	get(id: number): Intent | undefined {
		const intent = this.state.intents.get(id)
		return intent && { ...intent }
	}

	exists(id: number): boolean {
		return this.state.intents.has(id)
	}

	/**
	 * Ids owned by `owner` in creation order, at most `maxResults` of them.
	 */
	intentsOf(owner: string, maxResults: number): number[] {
		const ids = this.state.intentsByOwner.get(normalizeAddress(owner))
		if (!ids || maxResults <= 0) return []
		return ids.slice(0, maxResults)
	}

	/**
	 * Total number of intents ever created.
	 */
	count(): number {
		return this.state.nextIntentId - 1
	}

	/**
	 * Flips an intent to settled. Set-once: a second call fails.
	 * @internal Called only by the netting engine after its own checks.
	 */
	markSettled(id: number): Intent {
		const intent = this.state.intents.get(id)
		if (!intent) {
			throw new IntentStateError('NotFound', `Intent #${id} not found`, { id })
		}
		if (intent.settled) {
			throw new IntentStateError(
				'AlreadySettled',
				`Intent #${id} is already settled`,
				{ id }
			)
		}

		intent.settled = true
		diagnostic.debug('Intent marked settled', { id })

		return { ...intent }
	}
}
