/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                 Netting Engine (Coincidence of Wants)                     ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Settles intents singly or in batches. Opposing intents in a batch are
 * matched against each other; only the residual needs the venue.
 *
 * The two entry points fail differently on purpose:
 * - settleOne aborts on any intent-state problem.
 * - settleBatch silently excludes entries that are missing, settled,
 *   expired, under their minOut or repeated, and aborts only on structural
 *   problems (shape, mixed corridors, non-nettable corridor, nothing valid).
 *
 * Routing the residual to the venue and paying owners is left to an external
 * settler reading the returned stats and the `intentSettled` events.
 *
 * @packageDocumentation
 */

import {
	ConfigurationError,
	IntentStateError,
	ValidationError,
} from '../errors.js'
import { DEFAULT_GAS_PER_INTENT } from '../config/engineSettings.js'
import { createLogger, diagnostic } from '../utils/logger.js'
import type { CorridorRegistry } from './corridorRegistry.js'
import type { EngineEvents } from './events.js'
import type { IntentLedger } from './intentLedger.js'
import type { Clock, CoWStats, Intent } from '../types/core.js'

const logger = createLogger('NettingEngine')

/** Why a batch entry was left out */
export type ExclusionReason =
	| 'not_found'
	| 'already_settled'
	| 'expired'
	| 'min_output_not_met'
	| 'duplicate'

interface IncludedEntry {
	intent: Intent
	proposedOutput: bigint
}

/**
 * Matched and residual volume of two directional totals.
 * Equal totals resolve the residual direction to leg0 by convention.
 */
export function netTotals(
	totalLeg0: bigint,
	totalLeg1: bigint
): Pick<CoWStats, 'matchedAmount' | 'residualToVenue' | 'residualZeroForOne'> {
	const residualZeroForOne = totalLeg0 >= totalLeg1
	return {
		matchedAmount: residualZeroForOne ? totalLeg1 : totalLeg0,
		residualToVenue: residualZeroForOne
			? totalLeg0 - totalLeg1
			: totalLeg1 - totalLeg0,
		residualZeroForOne,
	}
}

export class NettingEngine {
	constructor(
		private readonly ledger: IntentLedger,
		private readonly registry: CorridorRegistry,
		private readonly events: EngineEvents,
		private readonly clock: Clock,
		private readonly gasPerIntent: bigint = DEFAULT_GAS_PER_INTENT
	) {}

	/**
	 * Settles a single intent at `proposedOutput`.
	 * Every failure aborts the call and leaves the intent untouched.
	 */
	settleOne(id: number, proposedOutput: bigint): Intent {
		const intent = this.ledger.get(id)

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
		const now = this.clock()
		if (now > intent.deadline) {
			throw new IntentStateError('Expired', `Intent #${id} has expired`, {
				id,
				deadline: intent.deadline,
				now,
			})
		}
		if (proposedOutput < intent.minOut) {
			throw new IntentStateError(
				'MinOutputNotMet',
				`Proposed output ${proposedOutput} is below minOut ${intent.minOut}`,
				{ id, minOut: intent.minOut, proposedOutput }
			)
		}

		const settled = this.ledger.markSettled(id)

		logger.info(`Intent #${id} settled`, {
			proposedOutput: proposedOutput.toString(),
		})
		this.events.emit('intentSettled', {
			id,
			owner: settled.owner,
			corridorId: settled.corridorId,
			amount: settled.amount,
			proposedOutput,
		})

		return settled
	}

	/**
	 * Nets a batch of intents on one corridor and settles every valid entry.
	 *
	 * @throws ValidationError `LengthMismatch`, `EmptyBatch`
	 * @throws ConfigurationError `MixedCorridors`, `NotNettable`
	 * @throws IntentStateError `NoValidIntents` when every entry was excluded
	 */
	settleBatch(ids: number[], proposedOutputs: bigint[]): CoWStats {
		const startTime = Date.now()

		if (ids.length !== proposedOutputs.length) {
			throw new ValidationError(
				'LengthMismatch',
				'ids and proposedOutputs must have the same length',
				'proposedOutputs',
				proposedOutputs.length,
				{ ids: ids.length, proposedOutputs: proposedOutputs.length }
			)
		}
		if (ids.length === 0) {
			throw new ValidationError('EmptyBatch', 'Batch is empty', 'ids', ids)
		}

		const now = this.clock()
		const included: IncludedEntry[] = []
		const includedIds = new Set<number>()
		let corridorId: string | undefined
		let totalLeg0 = 0n
		let totalLeg1 = 0n

		// Inclusion pass: derives the commit list once, mutates nothing
		for (let i = 0; i < ids.length; i++) {
			const id = ids[i]
			const proposedOutput = proposedOutputs[i]
			const intent = this.ledger.get(id)
			const reason = this.exclusionReason(
				intent,
				proposedOutput,
				now,
				includedIds.has(id)
			)

			if (!intent || reason) {
				diagnostic.debug('Batch entry excluded', { index: i, id, reason })
				continue
			}

			if (corridorId === undefined) {
				corridorId = intent.corridorId
				if (!this.registry.isNettable(corridorId)) {
					throw new ConfigurationError(
						'NotNettable',
						`Corridor ${corridorId} is not registered for netting`,
						{ corridorId }
					)
				}
			} else if (intent.corridorId !== corridorId) {
				throw new ConfigurationError(
					'MixedCorridors',
					`Intent #${id} belongs to corridor ${intent.corridorId}, batch is on ${corridorId}`,
					{ id, corridorId, intentCorridorId: intent.corridorId }
				)
			}

			if (intent.zeroForOne) {
				totalLeg0 += intent.amount
			} else {
				totalLeg1 += intent.amount
			}
			included.push({ intent, proposedOutput })
			includedIds.add(id)
		}

		if (corridorId === undefined || included.length === 0) {
			throw new IntentStateError(
				'NoValidIntents',
				'No intent in the batch can be settled',
				{ submitted: ids.length }
			)
		}

		const netted = netTotals(totalLeg0, totalLeg1)

		// Commit pass
		const settledIds: number[] = []
		for (const { intent, proposedOutput } of included) {
			this.ledger.markSettled(intent.id)
			settledIds.push(intent.id)
			this.events.emit('intentSettled', {
				id: intent.id,
				owner: intent.owner,
				corridorId: intent.corridorId,
				amount: intent.amount,
				proposedOutput,
			})
		}

		const validCount = included.length
		const stats: CoWStats = {
			corridorId,
			validCount,
			totalLeg0,
			totalLeg1,
			...netted,
			costSavedEstimate: BigInt(validCount) * this.gasPerIntent,
			settledIds,
		}

		logger.info(
			`Batch settled: ${validCount}/${ids.length} intents, matched ${stats.matchedAmount}, residual ${stats.residualToVenue}`,
			{ corridorId }
		)
		diagnostic.info('Batch netting complete', {
			corridorId,
			submitted: ids.length,
			validCount,
			totalLeg0: totalLeg0.toString(),
			totalLeg1: totalLeg1.toString(),
			processingTime: Date.now() - startTime,
		})

		if (validCount > 1 && stats.matchedAmount > 0n) {
			this.events.emit('batchSettled', { ...stats, settledIds: [...settledIds] })
		}

		return stats
	}

	private exclusionReason(
		intent: Intent | undefined,
		proposedOutput: bigint,
		now: number,
		duplicate: boolean
	): ExclusionReason | undefined {
		if (!intent) return 'not_found'
		if (duplicate) return 'duplicate'
		if (intent.settled) return 'already_settled'
		if (now > intent.deadline) return 'expired'
		if (proposedOutput < intent.minOut) return 'min_output_not_met'
		return undefined
	}
}
