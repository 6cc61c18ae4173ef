/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                          Core Type Definitions                            ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * TypeScript type definitions for the intent settlement engine.
 * Defines intents, corridor configuration, fee parameters, netting statistics
 * and the host hook contracts.
 *
 * @packageDocumentation
 */

/**
 * Returns the current time as Unix seconds.
 */
export type Clock = () => number

/**
 * A recorded request to trade, pending settlement.
 */
export interface Intent {
	/** Positive, strictly increasing in creation order. 0 is never assigned. */
	id: number
	/** Lowercased owner address */
	owner: string
	corridorId: string
	/** true = leg0 → leg1, false = leg1 → leg0 */
	zeroForOne: boolean
	/** Input magnitude, 0 < amount ≤ 2^128 - 1 */
	amount: bigint
	/** Opaque execution bound, carried through to the venue */
	priceLimit: bigint | null
	/** Slippage floor for the proposed output */
	minOut: bigint
	/** Unix seconds; settlement is rejected once now > deadline */
	deadline: number
	settled: boolean
	createdAt: number
}

/**
 * Parameters accepted by the intent ledger when recording a new intent.
 */
export interface CreateIntentParams {
	owner: string
	corridorId: string
	zeroForOne: boolean
	amount: bigint
	priceLimit?: bigint | null
	minOut: bigint
	deadline: number
}

/**
 * Registration record of a corridor.
 */
export interface CorridorConfig {
	corridorId: string
	/** Whether batches on this corridor may be netted */
	nettable: boolean
	registeredAt: number
}

/**
 * Per-corridor dynamic fee configuration, fees in pips (1_000_000 = 100%).
 */
export interface FeeParams {
	baseFee: number
	maxExtraFee: number
	/** Absolute flow above which the extra fee starts to apply; 0 disables it */
	netFlowThreshold: bigint
}

/**
 * Fee returned to the venue for an immediate trade.
 *
 * `override: false` leaves the venue on its static fee. An override carries
 * the fee in pips and its venue encoding with the override flag bit set.
 */
export type FeeQuote =
	| { override: false; fee: 0 }
	| { override: true; fee: number; encoded: number }

/**
 * Aggregate result of a batch netting call. Not persisted.
 */
export interface CoWStats {
	corridorId: string
	validCount: number
	totalLeg0: bigint
	totalLeg1: bigint
	matchedAmount: bigint
	residualToVenue: bigint
	/** Direction of the residual; equal totals resolve to leg0 (true) */
	residualZeroForOne: boolean
	/** Informational only */
	costSavedEstimate: bigint
	/** Ids committed by the call, in input order */
	settledIds: number[]
}

/**
 * Trade request handed to the pre-trade hook by the execution host.
 */
export interface TradeRequest {
	/** Explicit trader identity supplied by the host */
	owner: string
	corridorId: string
	zeroForOne: boolean
	/** Signed venue amount; its absolute value is the intent magnitude */
	amountSpecified: bigint
	priceLimit?: bigint | null
	/** ABI-encoded (bool deferred, uint256 minOut, uint256 deadline) */
	hookData?: string
}

/**
 * Deferred-mode signal decoded from hook data.
 */
export interface DeferredModeSignal {
	minOut: bigint
	deadline: number
}

/**
 * Outcome of the pre-trade hook.
 *
 * A deferred request records an intent and tells the host not to execute
 * the trade (`execute: false`).
 */
export type BeforeTradeResult =
	| {
			mode: 'deferred'
			intent: Intent
			fee: FeeQuote
			balanceDelta: bigint
			execute: false
	  }
	| {
			mode: 'immediate'
			fee: FeeQuote
			execute: true
	  }

/**
 * Executed trade reported by the host to the post-trade hook.
 */
export interface ExecutedTrade {
	corridorId: string
	zeroForOne: boolean
	/** Input amount paid into the venue */
	amountPaid: bigint
}

/**
 * Capability interface the execution host calls synchronously.
 */
export interface TradeHooks {
	onBeforeTrade(request: TradeRequest): BeforeTradeResult
	onAfterTrade(trade: ExecutedTrade): bigint | undefined
}
