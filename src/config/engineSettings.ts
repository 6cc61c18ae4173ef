/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                        Engine Configuration                               ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Fixed bounds and defaults of the settlement engine.
 *
 * @packageDocumentation
 */

/** Largest intent magnitude, the uint128 bound */
export const MAX_INTENT_AMOUNT = (1n << 128n) - 1n

/** Policy cap for baseFee and maxExtraFee, in pips (1%) */
export const MAX_FEE_PARAM = 10_000

/** Largest fee the venue accepts, in pips (100%) */
export const MAX_VENUE_FEE = 1_000_000

/** Bit the venue reads as "fee override in effect" */
export const OVERRIDE_FEE_FLAG = 0x400000

/** Basis-point denominator of the excess-flow ratio */
export const BPS_DENOMINATOR = 10_000n

/**
 * Default gas cost avoided per netted intent.
 * Feeds costSavedEstimate, which is informational only.
 */
export const DEFAULT_GAS_PER_INTENT = 50_000n

/** Default and maximum page size of owner intent listings */
export const DEFAULT_OWNER_PAGE_SIZE = 100
export const MAX_OWNER_PAGE_SIZE = 1_000
