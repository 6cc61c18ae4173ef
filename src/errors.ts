/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                            Engine Errors                                  ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Error taxonomy shared by the engine and the HTTP layer.
 *
 * - ValidationError: malformed input or batch shape
 * - AuthorizationError: non-admin caller on an admin-only operation
 * - ConfigurationError: fee parameters, corridor registration, corridor mixing
 * - IntentStateError: missing, settled, expired or under-filled intents
 *
 * @packageDocumentation
 */

export type ErrorCategory =
	| 'validation'
	| 'authorization'
	| 'configuration'
	| 'intent_state'

export type ValidationErrorCode =
	| 'LengthMismatch'
	| 'EmptyBatch'
	| 'InvalidDeadline'
	| 'ZeroAmount'
	| 'AmountTooLarge'
	| 'InvalidOwner'
	| 'InvalidAddress'
	| 'InvalidAmount'
	| 'InvalidHookData'
	| 'InvalidField'

export type ConfigurationErrorCode =
	| 'InvalidFeeParams'
	| 'NotNettable'
	| 'MixedCorridors'

export type IntentStateErrorCode =
	| 'NotFound'
	| 'AlreadySettled'
	| 'Expired'
	| 'MinOutputNotMet'
	| 'NoValidIntents'

export type ErrorCode =
	| ValidationErrorCode
	| ConfigurationErrorCode
	| IntentStateErrorCode
	| 'Unauthorized'

/**
 * Base class of every failure the engine surfaces to its caller.
 */
export abstract class EngineError extends Error {
	abstract readonly category: ErrorCategory

	constructor(
		public readonly code: ErrorCode,
		message: string,
		public readonly context?: Record<string, unknown>
	) {
		super(message)
	}
}

/**
 * Validation error with the offending field and value
 */
export class ValidationError extends EngineError {
	readonly category = 'validation'

	constructor(
		code: ValidationErrorCode,
		message: string,
		public readonly field?: string,
		public readonly value?: unknown,
		context?: Record<string, unknown>
	) {
		super(code, message, context)
		this.name = 'ValidationError'
	}
}

export class AuthorizationError extends EngineError {
	readonly category = 'authorization'

	constructor(message: string, context?: Record<string, unknown>) {
		super('Unauthorized', message, context)
		this.name = 'AuthorizationError'
	}
}

export class ConfigurationError extends EngineError {
	readonly category = 'configuration'

	constructor(
		code: ConfigurationErrorCode,
		message: string,
		context?: Record<string, unknown>
	) {
		super(code, message, context)
		this.name = 'ConfigurationError'
	}
}

export class IntentStateError extends EngineError {
	readonly category = 'intent_state'

	constructor(
		code: IntentStateErrorCode,
		message: string,
		context?: Record<string, unknown>
	) {
		super(code, message, context)
		this.name = 'IntentStateError'
	}
}

/** HTTP status per error category */
const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
	validation: 400,
	authorization: 403,
	configuration: 409,
	intent_state: 409,
}

/**
 * Renders bigint values in error context as decimal strings so the
 * context can be serialized.
 */
function jsonSafe(
	context: Record<string, unknown> | undefined
): Record<string, unknown> | undefined {
	if (!context) return undefined
	const out: Record<string, unknown> = {}
	for (const [key, value] of Object.entries(context)) {
		out[key] = typeof value === 'bigint' ? value.toString() : value
	}
	return out
}

/**
 * Maps an error to an HTTP status and JSON body.
 * Unknown errors become a bare 500 with no details.
 */
export function handleEngineError(error: unknown): {
	status: number
	error: string
	code?: ErrorCode
	details?: unknown
} {
	if (!(error instanceof EngineError)) {
		return { status: 500, error: 'Internal Server Error' }
	}

	const status =
		error.code === 'NotFound' ? 404 : STATUS_BY_CATEGORY[error.category]

	const details: Record<string, unknown> = { ...jsonSafe(error.context) }
	if (error instanceof ValidationError && error.field) {
		details.field = error.field
		details.value =
			typeof error.value === 'bigint' ? error.value.toString() : error.value
	}

	return {
		status,
		error: error.message,
		code: error.code,
		...(Object.keys(details).length > 0 ? { details } : {}),
	}
}
