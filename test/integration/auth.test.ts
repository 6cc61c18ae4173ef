/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                    Authentication Integration Tests                       ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Bearer token protection of POST endpoints and the operator/administrator
 * split of the two tokens.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import {
	startTestServer,
	stopTestServer,
	get,
	json,
	post,
} from '../helpers/testServer.js'
import {
	ADMIN_TOKEN,
	BOB,
	CORRIDOR_A,
	OPERATOR_TOKEN,
} from '../helpers/fixtures.js'
import type { Server } from 'http'

/** Every POST route, with a body that passes auth */
const POST_ENDPOINTS = [
	'/settle/1',
	'/settle/batch',
	'/hooks/before-trade',
	'/hooks/after-trade',
	`/corridor/${CORRIDOR_A}`,
	`/corridor/${CORRIDOR_A}/fees`,
	`/corridor/${CORRIDOR_A}/flow/reset`,
	'/admin/transfer',
]

const GET_ENDPOINTS = ['/health', '/info', '/corridor', '/intent/1']

describe('Authentication Middleware', () => {
	let server: Server
	let baseURL: string

	beforeAll(async () => {
		;({ server, baseURL } = await startTestServer())
	})

	afterAll(async () => {
		await stopTestServer(server)
	})

	async function postWithHeader(path: string, authorization: string): Promise<Response> {
		return fetch(`${baseURL}${path}`, {
			method: 'POST',
			headers: { Authorization: authorization, 'Content-Type': 'application/json' },
			body: JSON.stringify({}),
		})
	}

	describe('Bearer Token Validation', () => {
		it('should reject POST request with missing Authorization header', async () => {
			const response = await post(baseURL, '/hooks/before-trade', {}, 'none')

			expect(response.status).toBe(401)
			expect(await json(response)).toEqual({ error: 'Missing Authorization header' })
		})

		it('should reject POST request with empty Authorization header', async () => {
			const response = await postWithHeader('/hooks/before-trade', '')
			expect(response.status).toBe(401)
		})

		it.each([
			['an invalid token', 'Bearer test-wrong-token-000000000000000000'],
			['the wrong scheme', `Basic ${OPERATOR_TOKEN}`],
			['no space after the scheme', `Bearer${OPERATOR_TOKEN}`],
			['only the scheme', 'Bearer'],
			['extra whitespace', `Bearer  ${OPERATOR_TOKEN}`],
			['a lowercase scheme', `bearer ${OPERATOR_TOKEN}`],
			['a partial token', `Bearer ${OPERATOR_TOKEN.slice(0, 20)}`],
			['extra characters', `Bearer ${OPERATOR_TOKEN}x`],
		])('should reject POST request with %s', async (_label, authorization) => {
			const response = await postWithHeader('/hooks/before-trade', authorization)

			expect(response.status).toBe(403)
			expect(await json(response)).toEqual({ error: 'Invalid or missing token' })
		})

		it('should pass a valid operator token through to validation', async () => {
			const response = await post(baseURL, '/hooks/before-trade', {})

			expect(response.status).toBe(400)
		})
	})

	describe('Endpoint coverage', () => {
		it.each(POST_ENDPOINTS)('should protect POST %s', async (path) => {
			const response = await post(baseURL, path, {}, 'none')
			expect(response.status).toBe(401)
		})

		it.each(GET_ENDPOINTS)('should leave GET %s open', async (path) => {
			const response = await get(baseURL, path)
			expect(response.status).not.toBe(401)
			expect(response.status).not.toBe(403)
		})
	})

	describe('Administrator identity', () => {
		it('should refuse admin operations to the operator token', async () => {
			const response = await post(baseURL, `/corridor/${CORRIDOR_A}`, { nettable: true })

			expect(response.status).toBe(403)
			expect(await json(response)).toMatchObject({
				code: 'Unauthorized',
				error: 'Caller is not the corridor administrator',
			})
		})

		it('should allow admin operations with the admin token', async () => {
			const response = await post(
				baseURL,
				`/corridor/${CORRIDOR_A}`,
				{ nettable: true },
				'admin'
			)

			expect(response.status).toBe(200)
			expect(await json(response)).toMatchObject({ corridorId: CORRIDOR_A, nettable: true })
		})

		it('should accept the admin token on operator endpoints', async () => {
			const response = await fetch(`${baseURL}/hooks/before-trade`, {
				method: 'POST',
				headers: { Authorization: `Bearer ${ADMIN_TOKEN}`, 'Content-Type': 'application/json' },
				body: JSON.stringify({}),
			})
			expect(response.status).toBe(400)
		})
	})
})

describe('Administrator handover', () => {
	let server: Server
	let baseURL: string

	beforeAll(async () => {
		;({ server, baseURL } = await startTestServer())
	})

	afterAll(async () => {
		await stopTestServer(server)
	})

	it('should leave the admin token without rights after a transfer', async () => {
		const transfer = await post(baseURL, '/admin/transfer', { newAdmin: BOB }, 'admin')
		expect(transfer.status).toBe(200)
		expect(await json(transfer)).toEqual({ admin: BOB })

		const info = await json(await get(baseURL, '/info'))
		expect(info.admin).toBe(BOB)

		const configure = await post(
			baseURL,
			`/corridor/${CORRIDOR_A}`,
			{ nettable: true },
			'admin'
		)
		expect(configure.status).toBe(403)
	})
})
