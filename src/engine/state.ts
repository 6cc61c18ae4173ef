/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                         Engine State Repository                           ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * The single owner of every piece of mutable engine state. One instance is
 * created per engine and injected into each component; there are no
 * module-level maps.
 *
 * @packageDocumentation
 */

import { normalizeAddress } from '../utils/validator.js'
import type { CorridorConfig, FeeParams, Intent } from '../types/core.js'

/**
 * Mutable engine state.
 */
export interface EngineState {
	/** Intents keyed by id */
	intents: Map<number, Intent>
	/** Owner (lowercased) to intent ids in creation order */
	intentsByOwner: Map<string, number[]>
	/** Next id the ledger assigns; starts at 1 */
	nextIntentId: number
	corridors: Map<string, CorridorConfig>
	feeParams: Map<string, FeeParams>
	/** Signed running total of directional flow per corridor */
	flow: Map<string, bigint>
	/** Lowercased administrator address */
	admin: string
}

/**
 * Creates an empty state owned by `admin`.
 */
export function createEngineState(admin: string): EngineState {
	return {
		intents: new Map(),
		intentsByOwner: new Map(),
		nextIntentId: 1,
		corridors: new Map(),
		feeParams: new Map(),
		flow: new Map(),
		admin: normalizeAddress(admin),
	}
}
