/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                          Corridor Registry                                ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Corridor registration, nettable flags and the administrator identity that
 * guards every admin-only operation.
 *
 * @packageDocumentation
 */

import { AuthorizationError, ValidationError } from '../errors.js'
import { createLogger } from '../utils/logger.js'
import {
	isZeroAddress,
	normalizeAddress,
	validateAddress,
} from '../utils/validator.js'
import type { EngineEvents } from './events.js'
import type { EngineState } from './state.js'
import type { Clock, CorridorConfig } from '../types/core.js'

const logger = createLogger('CorridorRegistry')

export class CorridorRegistry {
	constructor(
		private readonly state: EngineState,
		private readonly events: EngineEvents,
		private readonly clock: Clock
	) {}

	/**
	 * Current administrator (lowercased).
	 */
	get admin(): string {
		return this.state.admin
	}

	/**
	 * Fails with Unauthorized unless `caller` is the administrator.
	 * A missing caller is never authorized.
	 */
	assertAdmin(caller: string | null | undefined): void {
		if (!caller || normalizeAddress(caller) !== this.state.admin) {
			throw new AuthorizationError('Caller is not the corridor administrator', {
				caller: caller ?? null,
			})
		}
	}

	/**
	 * Registers a corridor or updates its nettable flag. Admin only.
	 */
	configureCorridor(
		caller: string | null | undefined,
		corridorId: string,
		options: { nettable: boolean }
	): CorridorConfig {
		this.assertAdmin(caller)

		if (!corridorId) {
			throw new ValidationError(
				'InvalidField',
				'Corridor id is required',
				'corridorId',
				corridorId
			)
		}

		const existing = this.state.corridors.get(corridorId)
		const corridor: CorridorConfig = {
			corridorId,
			nettable: options.nettable,
			registeredAt: existing?.registeredAt ?? this.clock(),
		}
		this.state.corridors.set(corridorId, corridor)

		logger.info(
			`Corridor ${existing ? 'updated' : 'registered'}: ${corridorId}`,
			{ nettable: corridor.nettable }
		)
		this.events.emit('corridorConfigured', { ...corridor })

		return { ...corridor }
	}

	/**
	 * Hands the administrator role to `newAdmin`. Admin only.
	 */
	transferAdmin(caller: string | null | undefined, newAdmin: string): string {
		this.assertAdmin(caller)

		const normalized = validateAddress(newAdmin, 'newAdmin')
		if (isZeroAddress(normalized)) {
			throw new ValidationError(
				'InvalidAddress',
				'New administrator must be a non-zero address',
				'newAdmin',
				newAdmin
			)
		}

		const previous = this.state.admin
		this.state.admin = normalized

		logger.warn(`Administrator transferred ${previous} → ${this.state.admin}`)
		this.events.emit('adminTransferred', {
			previous,
			current: this.state.admin,
		})

		return this.state.admin
	}

	get(corridorId: string): CorridorConfig | undefined {
		const corridor = this.state.corridors.get(corridorId)
		return corridor && { ...corridor }
	}

	isRegistered(corridorId: string): boolean {
		return this.state.corridors.has(corridorId)
	}

	isNettable(corridorId: string): boolean {
		return this.state.corridors.get(corridorId)?.nettable === true
	}

	list(): CorridorConfig[] {
		return [...this.state.corridors.values()].map((corridor) => ({
			...corridor,
		}))
	}
}
