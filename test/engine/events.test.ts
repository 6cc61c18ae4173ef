/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                           Engine Event Tests                              ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 */

import { describe, it, expect, vi } from 'vitest'
import { EngineEvents } from '../../src/engine/index.js'
import { ADMIN, BOB } from '../helpers/fixtures.js'

describe('EngineEvents', () => {
	it('calls listeners in registration order', () => {
		const events = new EngineEvents()
		const order: string[] = []
		events.on('adminTransferred', () => order.push('first'))
		events.on('adminTransferred', () => order.push('second'))

		expect(events.emit('adminTransferred', { previous: ADMIN, current: BOB })).toBe(2)
		expect(order).toEqual(['first', 'second'])
	})

	it('keeps notifying after a listener throws', () => {
		const events = new EngineEvents()
		const after = vi.fn()
		events.on('adminTransferred', () => {
			throw new Error('listener failure')
		})
		events.on('adminTransferred', after)

		expect(() =>
			events.emit('adminTransferred', { previous: ADMIN, current: BOB })
		).not.toThrow()
		expect(after).toHaveBeenCalledWith({ previous: ADMIN, current: BOB })
	})

	it('removes listeners with off', () => {
		const events = new EngineEvents()
		const listener = vi.fn()
		events.on('flowReset', listener).off('flowReset', listener)

		expect(events.listenerCount('flowReset')).toBe(0)
		expect(events.emit('flowReset', { corridorId: 'c', previous: 1n, current: 0n })).toBe(0)
		expect(listener).not.toHaveBeenCalled()
	})
})
