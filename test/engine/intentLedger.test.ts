/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                         Intent Ledger Tests                               ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { IntentStateError, ValidationError } from '../../src/errors.js'
import { MAX_INTENT_AMOUNT } from '../../src/config/engineSettings.js'
import {
	ALICE,
	BOB,
	CORRIDOR_A,
	T0,
	ZERO_ADDRESS,
	createTestEngine,
	intentParams,
} from '../helpers/fixtures.js'
import type { SettlementEngine } from '../../src/engine/index.js'
import type { TestClock } from '../helpers/fixtures.js'
import type { Intent } from '../../src/types/core.js'

function validationCode(fn: () => unknown): string | undefined {
	try {
		fn()
	} catch (error) {
		if (error instanceof ValidationError) return error.code
		throw error
	}
	return undefined
}

describe('IntentLedger', () => {
	let engine: SettlementEngine
	let clock: TestClock

	beforeEach(() => {
		;({ engine, clock } = createTestEngine())
	})

	describe('create', () => {
		it('assigns sequential ids starting at 1', () => {
			const first = engine.ledger.create(intentParams())
			const second = engine.ledger.create(intentParams({ owner: BOB }))

			expect(first.id).toBe(1)
			expect(second.id).toBe(2)
			expect(engine.ledger.count()).toBe(2)
		})

		it('records an unsettled intent with the creation time', () => {
			const intent = engine.ledger.create(
				intentParams({ amount: 250n, minOut: 240n, priceLimit: -5n })
			)

			expect(intent).toEqual({
				id: 1,
				owner: ALICE,
				corridorId: CORRIDOR_A,
				zeroForOne: true,
				amount: 250n,
				priceLimit: -5n,
				minOut: 240n,
				deadline: T0 + 3600,
				settled: false,
				createdAt: T0,
			})
		})

		it('defaults the price limit to null', () => {
			expect(engine.ledger.create(intentParams()).priceLimit).toBeNull()
		})

		it('lowercases the owner', () => {
			const intent = engine.ledger.create(
				intentParams({ owner: '0xAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAA' })
			)
			expect(intent.owner).toBe(ALICE)
		})

		it('rejects a deadline that is not in the future', () => {
			expect(validationCode(() => engine.ledger.create(intentParams({ deadline: T0 })))).toBe(
				'InvalidDeadline'
			)
			expect(
				validationCode(() => engine.ledger.create(intentParams({ deadline: T0 - 1 })))
			).toBe('InvalidDeadline')
		})

		it('accepts a deadline one second ahead', () => {
			expect(engine.ledger.create(intentParams({ deadline: T0 + 1 })).id).toBe(1)
		})

		it('rejects zero amount and zero minOut', () => {
			expect(validationCode(() => engine.ledger.create(intentParams({ amount: 0n })))).toBe(
				'ZeroAmount'
			)
			expect(validationCode(() => engine.ledger.create(intentParams({ minOut: 0n })))).toBe(
				'ZeroAmount'
			)
		})

		it('rejects amounts above the uint128 bound', () => {
			expect(
				validationCode(() =>
					engine.ledger.create(intentParams({ amount: MAX_INTENT_AMOUNT + 1n }))
				)
			).toBe('AmountTooLarge')
			expect(
				engine.ledger.create(intentParams({ amount: MAX_INTENT_AMOUNT })).amount
			).toBe(MAX_INTENT_AMOUNT)
		})

		it('rejects the zero owner and malformed owners', () => {
			expect(
				validationCode(() => engine.ledger.create(intentParams({ owner: ZERO_ADDRESS })))
			).toBe('InvalidOwner')
			expect(
				validationCode(() => engine.ledger.create(intentParams({ owner: 'alice' })))
			).toBe('InvalidOwner')
		})

		it('checks the deadline before the amount', () => {
			expect(
				validationCode(() =>
					engine.ledger.create(intentParams({ deadline: T0, amount: 0n }))
				)
			).toBe('InvalidDeadline')
		})

		it('does not consume an id on failure', () => {
			expect(() => engine.ledger.create(intentParams({ amount: 0n }))).toThrow(
				ValidationError
			)
			expect(engine.ledger.create(intentParams()).id).toBe(1)
		})

		it('emits intentCreated with the new intent', () => {
			const seen: Intent[] = []
			engine.events.on('intentCreated', (intent) => seen.push(intent))

			engine.ledger.create(intentParams())

			expect(seen).toHaveLength(1)
			expect(seen[0].id).toBe(1)
		})
	})

	describe('queries', () => {
		it('returns undefined for an unknown id', () => {
			expect(engine.ledger.get(42)).toBeUndefined()
			expect(engine.ledger.exists(42)).toBe(false)
		})

		it('returns copies that do not alias ledger state', () => {
			engine.ledger.create(intentParams())
			const copy = engine.ledger.get(1)
			expect(copy).toBeDefined()
			if (copy) copy.settled = true

			expect(engine.ledger.get(1)?.settled).toBe(false)
		})

		it('keeps expired intents queryable', () => {
			engine.ledger.create(intentParams())
			clock.advance(7200)

			expect(engine.ledger.get(1)?.settled).toBe(false)
		})

		it('lists owner intents in creation order, truncated to max', () => {
			engine.ledger.create(intentParams())
			engine.ledger.create(intentParams({ owner: BOB }))
			engine.ledger.create(intentParams())
			engine.ledger.create(intentParams())

			expect(engine.ledger.intentsOf(ALICE, 10)).toEqual([1, 3, 4])
			expect(engine.ledger.intentsOf(ALICE, 2)).toEqual([1, 3])
			expect(engine.ledger.intentsOf(ALICE, 0)).toEqual([])
			expect(engine.ledger.intentsOf(BOB.toUpperCase().replace('0X', '0x'), 10)).toEqual([2])
		})

		it('indexes an unprefixed owner under its 0x spelling', () => {
			const bare = ALICE.slice(2)
			const intent = engine.ledger.create(intentParams({ owner: bare }))

			expect(intent.owner).toBe(ALICE)
			expect(engine.ledger.intentsOf(ALICE, 10)).toEqual([1])
			expect(engine.ledger.intentsOf(bare, 10)).toEqual([1])
		})

		it('returns an empty list for an owner without intents', () => {
			expect(engine.ledger.intentsOf(BOB, 10)).toEqual([])
		})
	})

	describe('markSettled', () => {
		it('is set-once', () => {
			engine.ledger.create(intentParams())

			expect(engine.ledger.markSettled(1).settled).toBe(true)
			expect(() => engine.ledger.markSettled(1)).toThrow(IntentStateError)
		})

		it('fails for an unknown id', () => {
			expect(() => engine.ledger.markSettled(9)).toThrow('Intent #9 not found')
		})
	})
})
