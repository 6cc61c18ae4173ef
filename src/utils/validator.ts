/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                          Validation Utility                               ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Lightweight input validation for request bodies and engine inputs.
 * Every failure is a ValidationError carrying the field and offending value.
 *
 * Features:
 * - Ethereum address validation and normalization
 * - Corridor id (32-byte pool id) validation
 * - Unsigned and signed integer amounts as decimal strings
 * - Intent ids and id arrays
 *
 * @packageDocumentation
 */

import { ethers } from 'ethers'
import { ValidationError } from '../errors.js'
import { diagnostic } from './logger.js'

const ZERO_ADDRESS_REGEX = /^(0x)?0{40}$/i
const CORRIDOR_ID_REGEX = /^0x[a-fA-F0-9]{64}$/
const UINT_REGEX = /^\d{1,78}$/
const INT_REGEX = /^-?\d{1,78}$/
const HEX_BYTES_REGEX = /^0x([a-fA-F0-9]{2})*$/

/**
 * True for the zero address, with or without 0x prefix.
 */
export function isZeroAddress(address: string): boolean {
	return ZERO_ADDRESS_REGEX.test(address)
}

/**
 * Lowercased, 0x-prefixed spelling of an address. Checksummed, lowercase
 * and unprefixed spellings of one address map to the same key; strings
 * that are not addresses are only lowercased.
 */
export function normalizeAddress(address: string): string {
	return ethers.isAddress(address)
		? ethers.getAddress(address).toLowerCase()
		: address.toLowerCase()
}

/**
 * Validates an Ethereum address and returns its normalized spelling.
 */
export function validateAddress(address: unknown, fieldName: string): string {
	if (!address || typeof address !== 'string') {
		throw new ValidationError(
			'InvalidAddress',
			'Address is required',
			fieldName,
			address
		)
	}

	if (!ethers.isAddress(address)) {
		diagnostic.debug('Invalid Ethereum address', {
			field: fieldName,
			value: address,
		})
		throw new ValidationError(
			'InvalidAddress',
			'Invalid Ethereum address',
			fieldName,
			address
		)
	}

	return ethers.getAddress(address).toLowerCase()
}

/**
 * Validates an intent owner: a valid address that is not the zero address.
 * The zero identity is reserved as the not-found sentinel.
 */
export function validateOwner(owner: unknown, fieldName = 'owner'): string {
	if (typeof owner === 'string' && isZeroAddress(owner)) {
		throw new ValidationError(
			'InvalidOwner',
			'Owner cannot be the zero address',
			fieldName,
			owner
		)
	}
	try {
		return validateAddress(owner, fieldName)
	} catch (error) {
		if (error instanceof ValidationError) {
			throw new ValidationError(
				'InvalidOwner',
				error.message,
				fieldName,
				owner
			)
		}
		throw error
	}
}

/**
 * Validates a corridor id (32-byte hex pool id) and returns it lowercased.
 */
export function validateCorridorId(
	corridorId: unknown,
	fieldName = 'corridorId'
): string {
	if (typeof corridorId !== 'string' || !CORRIDOR_ID_REGEX.test(corridorId)) {
		throw new ValidationError(
			'InvalidField',
			'Corridor id must be 0x followed by 64 hex characters',
			fieldName,
			corridorId
		)
	}
	return corridorId.toLowerCase()
}

/**
 * Validates an unsigned integer given as a decimal string or safe integer.
 */
export function validateUint(
	value: unknown,
	fieldName: string,
	options: { max?: bigint } = {}
): bigint {
	let parsed: bigint

	if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
		parsed = BigInt(value)
	} else if (typeof value === 'string' && UINT_REGEX.test(value)) {
		parsed = BigInt(value)
	} else {
		throw new ValidationError(
			'InvalidAmount',
			'Must be a non-negative integer (decimal string)',
			fieldName,
			value
		)
	}

	if (options.max !== undefined && parsed > options.max) {
		throw new ValidationError(
			'AmountTooLarge',
			`Must not exceed ${options.max}`,
			fieldName,
			value
		)
	}

	return parsed
}

/**
 * Validates a signed integer given as a decimal string or safe integer.
 */
export function validateInt(value: unknown, fieldName: string): bigint {
	if (typeof value === 'number' && Number.isSafeInteger(value)) {
		return BigInt(value)
	}
	if (typeof value === 'string' && INT_REGEX.test(value)) {
		return BigInt(value)
	}
	throw new ValidationError(
		'InvalidAmount',
		'Must be an integer (decimal string)',
		fieldName,
		value
	)
}

/**
 * Validates an intent id: a positive safe integer, or its decimal string.
 */
export function validateIntentId(id: unknown, fieldName = 'id'): number {
	const parsed =
		typeof id === 'string' && /^\d{1,15}$/.test(id) ? Number(id) : id

	if (
		typeof parsed !== 'number' ||
		!Number.isSafeInteger(parsed) ||
		parsed < 1
	) {
		throw new ValidationError(
			'InvalidField',
			'Intent id must be a positive integer',
			fieldName,
			id
		)
	}
	return parsed
}

export function validateBoolean(value: unknown, fieldName: string): boolean {
	if (typeof value !== 'boolean') {
		throw new ValidationError(
			'InvalidField',
			'Must be a boolean',
			fieldName,
			value,
			{ receivedType: typeof value }
		)
	}
	return value
}

/**
 * Validates a fee in pips: a non-negative integer.
 * Range checks against the policy caps belong to the fee policy.
 */
export function validateFee(value: unknown, fieldName: string): number {
	if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
		throw new ValidationError(
			'InvalidField',
			'Fee must be a non-negative integer',
			fieldName,
			value
		)
	}
	return value
}

/**
 * Validates 0x-prefixed hex bytes (e.g. hook data).
 */
export function validateHexBytes(value: unknown, fieldName: string): string {
	if (typeof value !== 'string' || !HEX_BYTES_REGEX.test(value)) {
		throw new ValidationError(
			'InvalidField',
			'Must be 0x-prefixed hex bytes',
			fieldName,
			value
		)
	}
	return value
}

/**
 * Validates an array, applying `item` to each element.
 * Shape checks (length, emptiness) are left to the caller.
 */
export function validateArray<T>(
	value: unknown,
	fieldName: string,
	item: (element: unknown, field: string) => T
): T[] {
	if (!Array.isArray(value)) {
		throw new ValidationError(
			'InvalidField',
			'Must be an array',
			fieldName,
			value
		)
	}
	return value.map((element, index) => item(element, `${fieldName}[${index}]`))
}

/**
 * Validates an optional page size, clamping it to `max`.
 */
export function validatePageSize(
	value: unknown,
	fallback: number,
	max: number
): number {
	if (value === undefined) return fallback

	const parsed = typeof value === 'string' ? Number(value) : value
	if (
		typeof parsed !== 'number' ||
		!Number.isSafeInteger(parsed) ||
		parsed < 0
	) {
		throw new ValidationError(
			'InvalidField',
			'max must be a non-negative integer',
			'max',
			value
		)
	}
	return Math.min(parsed, max)
}

/**
 * Reads a property of an unknown request body.
 */
export function field(body: unknown, name: string): unknown {
	if (typeof body !== 'object' || body === null || !(name in body)) {
		return undefined
	}
	const value: unknown = Reflect.get(body, name)
	return value
}
