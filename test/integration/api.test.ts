/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                        HTTP API Integration Tests                         ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Intent, settlement, hook and corridor endpoints against an in-memory
 * engine on a test clock.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { startTestServer, stopTestServer, get, json, post } from '../helpers/testServer.js'
import { FakeDatabase } from '../helpers/fakeDatabase.js'
import { ALICE, BOB, CORRIDOR_A, CORRIDOR_B, T0 } from '../helpers/fixtures.js'
import { encodeHookData } from '../../src/engine/index.js'
import { StateJournal } from '../../src/utils/stateStore.js'
import type { TestServer } from '../helpers/testServer.js'

interface DeferredTrade {
	owner?: string
	corridorId?: string
	zeroForOne?: boolean
	amount?: bigint
	minOut?: bigint
	deadline?: number
	priceLimit?: string
}

/** Pre-trade hook body that defers the trade into an intent */
function deferredTrade(trade: DeferredTrade = {}): Record<string, unknown> {
	const { amount = 100n, minOut = 90n, deadline = T0 + 3600, ...rest } = trade
	return {
		owner: ALICE,
		corridorId: CORRIDOR_A,
		zeroForOne: true,
		amountSpecified: (-amount).toString(),
		hookData: encodeHookData(true, minOut, deadline),
		...rest,
	}
}

describe('HTTP API', () => {
	let testServer: TestServer
	let baseURL: string

	beforeEach(async () => {
		testServer = await startTestServer()
		baseURL = testServer.baseURL
	})

	afterEach(async () => {
		await stopTestServer(testServer.server)
	})

	function defer(trade: DeferredTrade = {}): Promise<Response> {
		return post(baseURL, '/hooks/before-trade', deferredTrade(trade))
	}

	async function registerCorridor(corridorId: string, nettable = true): Promise<void> {
		const response = await post(baseURL, `/corridor/${corridorId}`, { nettable }, 'admin')
		expect(response.status).toBe(200)
	}

	describe('intents', () => {
		it('records a deferred trade and returns the intent with amounts as strings', async () => {
			const response = await defer({ priceLimit: '-7' })

			expect(response.status).toBe(200)
			expect((await json(response)).intent).toEqual({
				id: 1,
				owner: ALICE,
				corridorId: CORRIDOR_A,
				zeroForOne: true,
				amount: '100',
				priceLimit: '-7',
				minOut: '90',
				deadline: T0 + 3600,
				settled: false,
				createdAt: T0,
			})
		})

		it('reads intents back by id and by owner', async () => {
			await defer()
			await defer({ owner: BOB })
			await defer()

			const intent = await json(await get(baseURL, '/intent/2'))
			expect(intent.owner).toBe(BOB)
			expect(intent.priceLimit).toBeNull()

			expect(await json(await get(baseURL, `/intent/owner/${ALICE}`))).toEqual({
				owner: ALICE,
				ids: [1, 3],
			})
			expect(await json(await get(baseURL, `/intent/owner/${ALICE}?max=1`))).toEqual({
				owner: ALICE,
				ids: [1],
			})
		})

		it('has no route that creates intents outside the pre-trade hook', async () => {
			const response = await post(baseURL, '/intent', deferredTrade())

			expect(response.status).toBe(404)
			expect(await json(await get(baseURL, '/info'))).toMatchObject({ intents: 0 })
		})

		it('returns 404 for an unknown id and 400 for a malformed one', async () => {
			const missing = await get(baseURL, '/intent/99')
			expect(missing.status).toBe(404)
			expect(await json(missing)).toEqual({ error: 'Intent not found' })

			const malformed = await get(baseURL, '/intent/abc')
			expect(malformed.status).toBe(400)
			expect(await json(malformed)).toMatchObject({ code: 'InvalidField' })
		})

		it('reports validation failures with the offending field', async () => {
			const response = await defer({ amount: 0n })

			expect(response.status).toBe(400)
			expect(await json(response)).toEqual({
				status: 400,
				error: 'Amount must be positive',
				code: 'ZeroAmount',
				details: { field: 'amount', value: '0' },
			})
		})

		it('rejects a deadline that is not in the future', async () => {
			const response = await defer({ deadline: T0 })

			expect(response.status).toBe(400)
			expect(await json(response)).toEqual({
				status: 400,
				error: 'Deadline must be in the future',
				code: 'InvalidDeadline',
				details: { now: T0, field: 'deadline', value: T0 },
			})
		})

		it('rejects the zero owner', async () => {
			const response = await defer({ owner: '0x0000000000000000000000000000000000000000' })

			expect(response.status).toBe(400)
			expect(await json(response)).toMatchObject({ code: 'InvalidOwner' })
		})
	})

	describe('settlement', () => {
		it('settles a single intent and refuses a second settlement', async () => {
			await defer()

			const first = await post(baseURL, '/settle/1', { proposedOutput: '95' })
			expect(first.status).toBe(200)
			expect(await json(first)).toMatchObject({ id: 1, settled: true })

			const second = await post(baseURL, '/settle/1', { proposedOutput: '95' })
			expect(second.status).toBe(409)
			expect(await json(second)).toMatchObject({ code: 'AlreadySettled' })
		})

		it('maps settleOne failures to their status codes', async () => {
			await defer()

			const low = await post(baseURL, '/settle/1', { proposedOutput: '89' })
			expect(low.status).toBe(409)
			expect(await json(low)).toEqual({
				status: 409,
				error: 'Proposed output 89 is below minOut 90',
				code: 'MinOutputNotMet',
				details: { id: 1, minOut: '90', proposedOutput: '89' },
			})

			const missing = await post(baseURL, '/settle/7', { proposedOutput: '1' })
			expect(missing.status).toBe(404)

			testServer.clock.advance(3601)
			const expired = await post(baseURL, '/settle/1', { proposedOutput: '95' })
			expect(expired.status).toBe(409)
			expect(await json(expired)).toMatchObject({ code: 'Expired' })
		})

		it('nets a batch of opposing intents', async () => {
			await registerCorridor(CORRIDOR_A)
			await defer()
			await defer({ owner: BOB, zeroForOne: false, amount: 80n })

			const response = await post(baseURL, '/settle/batch', {
				ids: [1, 2],
				proposedOutputs: ['95', '95'],
			})

			expect(response.status).toBe(200)
			expect(await json(response)).toEqual({
				corridorId: CORRIDOR_A,
				validCount: 2,
				totalLeg0: '100',
				totalLeg1: '80',
				matchedAmount: '80',
				residualToVenue: '20',
				residualZeroForOne: true,
				costSavedEstimate: '100000',
				settledIds: [1, 2],
			})
		})

		it('rejects batch shape and structure problems', async () => {
			await registerCorridor(CORRIDOR_A)
			await registerCorridor(CORRIDOR_B)
			await defer()
			await defer({ corridorId: CORRIDOR_B })

			const mismatch = await post(baseURL, '/settle/batch', { ids: [1, 2], proposedOutputs: ['95'] })
			expect(mismatch.status).toBe(400)
			expect(await json(mismatch)).toMatchObject({ code: 'LengthMismatch' })

			const empty = await post(baseURL, '/settle/batch', { ids: [], proposedOutputs: [] })
			expect(await json(empty)).toMatchObject({ code: 'EmptyBatch' })

			const mixed = await post(baseURL, '/settle/batch', {
				ids: [1, 2],
				proposedOutputs: ['95', '95'],
			})
			expect(mixed.status).toBe(409)
			expect(await json(mixed)).toMatchObject({ code: 'MixedCorridors' })
			expect((await json(await get(baseURL, '/intent/1'))).settled).toBe(false)

			const none = await post(baseURL, '/settle/batch', { ids: [9], proposedOutputs: ['1'] })
			expect(none.status).toBe(409)
			expect(await json(none)).toMatchObject({ code: 'NoValidIntents' })

			const malformed = await post(baseURL, '/settle/batch', { ids: '1', proposedOutputs: [] })
			expect(malformed.status).toBe(400)
			expect(await json(malformed)).toMatchObject({ code: 'InvalidField' })
		})
	})

	describe('trade hooks', () => {
		it('records a deferred trade as an intent', async () => {
			const response = await post(baseURL, '/hooks/before-trade', {
				owner: BOB,
				corridorId: CORRIDOR_A,
				zeroForOne: false,
				amountSpecified: '-250',
				hookData: encodeHookData(true, 240n, T0 + 600),
			})

			expect(response.status).toBe(200)
			const body = await json(response)
			expect(body).toMatchObject({
				mode: 'deferred',
				execute: false,
				fee: { override: false, fee: 0 },
				balanceDelta: '0',
			})
			expect(body.intent).toMatchObject({ id: 1, owner: BOB, amount: '250', minOut: '240' })
		})

		it('quotes the dynamic fee for immediate trades after flow builds up', async () => {
			await registerCorridor(CORRIDOR_A, false)
			const fees = await post(
				baseURL,
				`/corridor/${CORRIDOR_A}/fees`,
				{ baseFee: 500, maxExtraFee: 2000, netFlowThreshold: '10000' },
				'admin'
			)
			expect(await json(fees)).toEqual({
				corridorId: CORRIDOR_A,
				baseFee: 500,
				maxExtraFee: 2000,
				netFlowThreshold: '10000',
			})

			const after = await post(baseURL, '/hooks/after-trade', {
				corridorId: CORRIDOR_A,
				zeroForOne: true,
				amountPaid: '20000',
			})
			expect(await json(after)).toEqual({ corridorId: CORRIDOR_A, applied: true, flow: '20000' })

			const before = await post(baseURL, '/hooks/before-trade', {
				owner: ALICE,
				corridorId: CORRIDOR_A,
				zeroForOne: true,
				amountSpecified: '-1000',
			})
			expect(await json(before)).toEqual({
				mode: 'immediate',
				execute: true,
				fee: { override: true, fee: 2500, encoded: 4_196_804 },
			})
		})

		it('ignores executed trades on unregistered corridors', async () => {
			const response = await post(baseURL, '/hooks/after-trade', {
				corridorId: CORRIDOR_B,
				zeroForOne: true,
				amountPaid: '500',
			})

			expect(await json(response)).toEqual({ corridorId: CORRIDOR_B, applied: false, flow: '0' })
		})

		it('rejects undecodable hook data', async () => {
			const response = await post(baseURL, '/hooks/before-trade', {
				owner: ALICE,
				corridorId: CORRIDOR_A,
				zeroForOne: true,
				amountSpecified: '-1',
				hookData: '0x1234',
			})

			expect(response.status).toBe(400)
			expect(await json(response)).toMatchObject({ code: 'InvalidHookData' })
		})
	})

	describe('corridors', () => {
		it('describes a corridor with its fee and flow', async () => {
			await registerCorridor(CORRIDOR_A)
			await post(
				baseURL,
				`/corridor/${CORRIDOR_A}/fees`,
				{ baseFee: 500, maxExtraFee: 2000, netFlowThreshold: '10000' },
				'admin'
			)
			await post(baseURL, '/hooks/after-trade', {
				corridorId: CORRIDOR_A,
				zeroForOne: false,
				amountPaid: '15000',
			})

			expect(await json(await get(baseURL, `/corridor/${CORRIDOR_A}`))).toEqual({
				corridorId: CORRIDOR_A,
				registered: true,
				nettable: true,
				registeredAt: T0,
				feeParams: { baseFee: 500, maxExtraFee: 2000, netFlowThreshold: '10000' },
				flow: '-15000',
				effectiveFee: { override: true, fee: 1500, encoded: 0x400000 | 1500 },
			})
			expect(await json(await get(baseURL, '/corridor'))).toEqual({
				corridors: [{ corridorId: CORRIDOR_A, nettable: true, registeredAt: T0 }],
			})
		})

		it('describes an unknown corridor as unregistered', async () => {
			expect(await json(await get(baseURL, `/corridor/${CORRIDOR_B}`))).toEqual({
				corridorId: CORRIDOR_B,
				registered: false,
				nettable: false,
				registeredAt: null,
				feeParams: null,
				flow: '0',
				effectiveFee: { override: false, fee: 0 },
			})
		})

		it('rejects fee parameters above the cap', async () => {
			const response = await post(
				baseURL,
				`/corridor/${CORRIDOR_A}/fees`,
				{ baseFee: 10_001, maxExtraFee: 0, netFlowThreshold: '0' },
				'admin'
			)

			expect(response.status).toBe(409)
			expect(await json(response)).toMatchObject({ code: 'InvalidFeeParams' })
		})

		it('resets the flow for the administrator only', async () => {
			await registerCorridor(CORRIDOR_A)
			await post(baseURL, '/hooks/after-trade', {
				corridorId: CORRIDOR_A,
				zeroForOne: true,
				amountPaid: '300',
			})

			const denied = await post(baseURL, `/corridor/${CORRIDOR_A}/flow/reset`, {})
			expect(denied.status).toBe(403)

			const reset = await post(baseURL, `/corridor/${CORRIDOR_A}/flow/reset`, {}, 'admin')
			expect(await json(reset)).toEqual({ corridorId: CORRIDOR_A, previous: '300', flow: '0' })
		})
	})

	describe('persistence', () => {
		it('flushes the journal before responding', async () => {
			const database = new FakeDatabase()
			const journal = new StateJournal(database, testServer.ctx.engine.events)
			testServer.ctx.journal = journal

			const response = await defer()

			expect(response.status).toBe(200)
			expect(journal.pendingCount).toBe(0)
			expect(database.committed).toHaveLength(2)
		})

		it('returns 500 when the journal cannot be written', async () => {
			const database = new FakeDatabase()
			const journal = new StateJournal(database, testServer.ctx.engine.events)
			testServer.ctx.journal = journal
			database.failNext = new Error('disk full')

			const response = await defer()

			expect(response.status).toBe(500)
			expect(await json(response)).toEqual({ status: 500, error: 'Internal Server Error' })
			expect(journal.pendingCount).toBe(2)
		})
	})
})
