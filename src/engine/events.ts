/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                           Engine Events                                   ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Typed observer registry for engine state transitions. Every event is
 * emitted after the state change it reports has been applied, and listeners
 * run synchronously in registration order.
 *
 * @packageDocumentation
 */

import { createLogger } from '../utils/logger.js'
import type {
	CoWStats,
	CorridorConfig,
	FeeParams,
	Intent,
} from '../types/core.js'

const logger = createLogger('EngineEvents')

export interface IntentSettledEvent {
	id: number
	owner: string
	corridorId: string
	amount: bigint
	proposedOutput: bigint
}

export interface FlowUpdatedEvent {
	corridorId: string
	previous: bigint
	current: bigint
}

/**
 * Event name to listener arguments.
 */
export interface EngineEventMap {
	intentCreated: [intent: Intent]
	intentSettled: [event: IntentSettledEvent]
	batchSettled: [stats: CoWStats]
	feeParamsUpdated: [event: { corridorId: string; params: FeeParams }]
	flowUpdated: [event: FlowUpdatedEvent]
	flowReset: [event: FlowUpdatedEvent]
	corridorConfigured: [corridor: CorridorConfig]
	adminTransferred: [event: { previous: string; current: string }]
}

export type EngineEventName = keyof EngineEventMap

export type EngineEventListener<K extends EngineEventName> = (
	...args: EngineEventMap[K]
) => void

type ListenerRegistry = {
	[K in EngineEventName]: Set<EngineEventListener<K>>
}

/**
 * Observer registry restricted to the engine's event map.
 *
 * A listener that throws is logged and skipped: the operation that emitted
 * the event has already committed and must not be reported as failed.
 */
export class EngineEvents {
	private readonly listeners: ListenerRegistry = {
		intentCreated: new Set(),
		intentSettled: new Set(),
		batchSettled: new Set(),
		feeParamsUpdated: new Set(),
		flowUpdated: new Set(),
		flowReset: new Set(),
		corridorConfigured: new Set(),
		adminTransferred: new Set(),
	}

	on<K extends EngineEventName>(
		name: K,
		listener: EngineEventListener<K>
	): this {
		this.listeners[name].add(listener)
		return this
	}

	off<K extends EngineEventName>(
		name: K,
		listener: EngineEventListener<K>
	): this {
		this.listeners[name].delete(listener)
		return this
	}

	/**
	 * @returns Number of listeners invoked
	 */
	emit<K extends EngineEventName>(name: K, ...args: EngineEventMap[K]): number {
		const listeners = this.listeners[name]
		for (const listener of listeners) {
			try {
				listener(...args)
			} catch (error) {
				logger.error(`Listener for '${name}' threw`, error)
			}
		}
		return listeners.size
	}

	listenerCount(name: EngineEventName): number {
		return this.listeners[name].size
	}
}
