/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                           Fee Policy Tests                                ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 */

import { describe, it, expect, beforeEach } from 'vitest'
import {
	NO_OVERRIDE,
	computeDynamicFee,
	encodeOverrideFee,
	isValidVenueFee,
} from '../../src/engine/index.js'
import { AuthorizationError, ConfigurationError } from '../../src/errors.js'
import { ADMIN, BOB, CORRIDOR_A, createTestEngine } from '../helpers/fixtures.js'
import type { SettlementEngine } from '../../src/engine/index.js'
import type { FeeParams } from '../../src/types/core.js'

const PARAMS: FeeParams = {
	baseFee: 500,
	maxExtraFee: 2000,
	netFlowThreshold: 10_000n,
}

describe('computeDynamicFee', () => {
	it('stays at the base fee up to the threshold', () => {
		expect(computeDynamicFee(PARAMS, 0n)).toBe(500)
		expect(computeDynamicFee(PARAMS, 10_000n)).toBe(500)
		expect(computeDynamicFee(PARAMS, -10_000n)).toBe(500)
	})

	it('rises linearly between one and two thresholds', () => {
		expect(computeDynamicFee(PARAMS, 15_000n)).toBe(1500)
		expect(computeDynamicFee(PARAMS, 20_000n)).toBe(2500)
	})

	it('is symmetric in the flow sign', () => {
		expect(computeDynamicFee(PARAMS, -15_000n)).toBe(1500)
	})

	it('clamps beyond twice the threshold', () => {
		expect(computeDynamicFee(PARAMS, 40_000n)).toBe(2500)
	})

	it('rounds the extra component down', () => {
		expect(computeDynamicFee(PARAMS, 10_001n)).toBe(500)
	})

	it('ignores flow when the threshold is zero', () => {
		expect(computeDynamicFee({ ...PARAMS, netFlowThreshold: 0n }, 1_000_000n)).toBe(500)
	})
})

describe('fee encoding', () => {
	it('sets the override flag', () => {
		expect(encodeOverrideFee(2500)).toBe(0x400000 | 2500)
		expect(encodeOverrideFee(2500)).toBe(4_196_804)
	})

	it('validates the venue range', () => {
		expect(isValidVenueFee(0)).toBe(true)
		expect(isValidVenueFee(1_000_000)).toBe(true)
		expect(isValidVenueFee(1_000_001)).toBe(false)
		expect(isValidVenueFee(-1)).toBe(false)
		expect(isValidVenueFee(1.5)).toBe(false)
	})
})

describe('FeePolicy', () => {
	let engine: SettlementEngine

	beforeEach(() => {
		;({ engine } = createTestEngine())
	})

	it('returns no override for an unconfigured corridor', () => {
		expect(engine.fees.effectiveFee(CORRIDOR_A)).toEqual(NO_OVERRIDE)
	})

	it('returns no override when the base fee is zero', () => {
		engine.fees.setParams(ADMIN, CORRIDOR_A, { ...PARAMS, baseFee: 0 })
		engine.flow.onTradeExecuted(CORRIDOR_A, true, 20_000n)

		expect(engine.fees.effectiveFee(CORRIDOR_A)).toEqual({ override: false, fee: 0 })
	})

	it('quotes the dynamic fee at the current flow', () => {
		engine.fees.setParams(ADMIN, CORRIDOR_A, PARAMS)
		expect(engine.fees.effectiveFee(CORRIDOR_A)).toEqual({
			override: true,
			fee: 500,
			encoded: 0x400000 | 500,
		})

		engine.flow.onTradeExecuted(CORRIDOR_A, false, 20_000n)
		expect(engine.fees.effectiveFee(CORRIDOR_A)).toEqual({
			override: true,
			fee: 2500,
			encoded: 4_196_804,
		})
	})

	it('stores and returns copies of the parameters', () => {
		engine.fees.setParams(ADMIN, CORRIDOR_A, PARAMS)

		expect(engine.fees.getParams(CORRIDOR_A)).toEqual(PARAMS)
		expect(engine.fees.getParams(CORRIDOR_A)).not.toBe(PARAMS)
	})

	it('emits feeParamsUpdated', () => {
		const seen: string[] = []
		engine.events.on('feeParamsUpdated', ({ corridorId }) => seen.push(corridorId))

		engine.fees.setParams(ADMIN, CORRIDOR_A, PARAMS)

		expect(seen).toEqual([CORRIDOR_A])
	})

	it.each<[string, FeeParams]>([
		['base fee above cap', { baseFee: 10_001, maxExtraFee: 0, netFlowThreshold: 0n }],
		['extra fee above cap', { baseFee: 0, maxExtraFee: 10_001, netFlowThreshold: 0n }],
		['fractional fee', { baseFee: 1.5, maxExtraFee: 0, netFlowThreshold: 0n }],
		['negative fee', { baseFee: -1, maxExtraFee: 0, netFlowThreshold: 0n }],
		['negative threshold', { baseFee: 100, maxExtraFee: 0, netFlowThreshold: -1n }],
	])('rejects %s', (_label, params) => {
		expect(() => engine.fees.setParams(ADMIN, CORRIDOR_A, params)).toThrow(
			ConfigurationError
		)
		expect(engine.fees.getParams(CORRIDOR_A)).toBeUndefined()
	})

	it('accepts fees at the 10000 cap', () => {
		const stored = engine.fees.setParams(ADMIN, CORRIDOR_A, {
			baseFee: 10_000,
			maxExtraFee: 10_000,
			netFlowThreshold: 1n,
		})
		expect(stored.baseFee).toBe(10_000)
	})

	it('is admin only', () => {
		expect(() => engine.fees.setParams(BOB, CORRIDOR_A, PARAMS)).toThrow(
			AuthorizationError
		)
	})
})
