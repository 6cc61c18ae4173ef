/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                       Settlement Engine Factory                           ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Wires one state repository, one event registry and the engine components
 * into a single settlement engine.
 *
 * @packageDocumentation
 */

import { DEFAULT_GAS_PER_INTENT } from '../config/engineSettings.js'
import { CorridorRegistry } from './corridorRegistry.js'
import { EngineEvents } from './events.js'
import { FeePolicy } from './feePolicy.js'
import { FlowAccumulator } from './flowAccumulator.js'
import { CorridorTradeHooks } from './hooks.js'
import { IntentLedger } from './intentLedger.js'
import { NettingEngine } from './nettingEngine.js'
import { createEngineState } from './state.js'
import type { EngineState } from './state.js'
import type { Clock } from '../types/core.js'

export interface SettlementEngineOptions {
	/** Administrator address; ignored when `state` is given */
	admin: string
	/** Returns Unix seconds; defaults to the wall clock */
	clock?: Clock
	/** Factor of costSavedEstimate */
	gasPerIntentEstimate?: bigint
	/** Pre-loaded state, e.g. hydrated from the database */
	state?: EngineState
}

export interface SettlementEngine {
	state: EngineState
	events: EngineEvents
	clock: Clock
	registry: CorridorRegistry
	ledger: IntentLedger
	flow: FlowAccumulator
	fees: FeePolicy
	netting: NettingEngine
	hooks: CorridorTradeHooks
}

/** Wall clock in Unix seconds */
export const systemClock: Clock = () => Math.floor(Date.now() / 1000)

/**
 * Creates a settlement engine with its own state.
 *
 * @example
 * ```typescript
 * const engine = createSettlementEngine({ admin: '0xAd...01' })
 * engine.registry.configureCorridor(admin, corridorId, { nettable: true })
 * const stats = engine.netting.settleBatch([1, 2], [95n, 80n])
 * ```
 */
export function createSettlementEngine(
	options: SettlementEngineOptions
): SettlementEngine {
	const clock = options.clock ?? systemClock
	const state = options.state ?? createEngineState(options.admin)
	const events = new EngineEvents()

	const registry = new CorridorRegistry(state, events, clock)
	const ledger = new IntentLedger(state, events, clock)
	const flow = new FlowAccumulator(state, events, registry)
	const fees = new FeePolicy(state, events, registry, flow)
	const netting = new NettingEngine(
		ledger,
		registry,
		events,
		clock,
		options.gasPerIntentEstimate ?? DEFAULT_GAS_PER_INTENT
	)
	const hooks = new CorridorTradeHooks(ledger, fees, flow, registry)

	return { state, events, clock, registry, ledger, flow, fees, netting, hooks }
}

export { CorridorRegistry } from './corridorRegistry.js'
export { EngineEvents } from './events.js'
export type {
	EngineEventMap,
	EngineEventName,
	EngineEventListener,
	FlowUpdatedEvent,
	IntentSettledEvent,
} from './events.js'
export {
	FeePolicy,
	NO_OVERRIDE,
	computeDynamicFee,
	encodeOverrideFee,
	isValidVenueFee,
} from './feePolicy.js'
export { FlowAccumulator } from './flowAccumulator.js'
export { CorridorTradeHooks, decodeHookData, encodeHookData } from './hooks.js'
export { IntentLedger } from './intentLedger.js'
export { NettingEngine, netTotals } from './nettingEngine.js'
export type { ExclusionReason } from './nettingEngine.js'
export { createEngineState } from './state.js'
export type { EngineState } from './state.js'
