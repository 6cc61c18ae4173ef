// utils/webhook.ts
import { diagnostic, createLogger } from '../utils/logger.js'
import { setTimeout as delay } from 'timers/promises'
import type { EngineEvents, IntentSettledEvent } from '../engine/events.js'
import type { CoWStats } from '../types/core.js'
import type { EnvironmentConfig } from '../types/setup.js'

const log = createLogger('Webhook')

type Payload = Record<string, unknown>

export type WebhookSettings = Pick<
	EnvironmentConfig,
	'WEBHOOK_URL' | 'WEBHOOK_SECRET' | 'WEBHOOK_TIMEOUT_MS' | 'WEBHOOK_MAX_RETRIES'
>

type SendOptions = {
	timeoutMs?: number
	maxRetries?: number
	/** First retry delay; doubles per attempt up to 15s */
	initialBackoffMs?: number
}

export async function sendWebhook(
	payload: Payload,
	settings: WebhookSettings,
	opts: SendOptions = {}
): Promise<void> {
	const { WEBHOOK_URL, WEBHOOK_SECRET } = settings
	const timeoutMs = opts.timeoutMs ?? settings.WEBHOOK_TIMEOUT_MS
	const maxRetries = opts.maxRetries ?? settings.WEBHOOK_MAX_RETRIES

	if (!WEBHOOK_URL || !WEBHOOK_SECRET) {
		throw new Error('Missing WEBHOOK_URL or WEBHOOK_SECRET')
	}

	try {
		new URL(WEBHOOK_URL)
	} catch {
		throw new Error(`WEBHOOK_URL is not a valid URL: ${WEBHOOK_URL}`)
	}

	const body = JSON.stringify(payload, (_key, value: unknown) =>
		typeof value === 'bigint' ? value.toString() : value
	)
	let attempt = 0
	let backoff = opts.initialBackoffMs ?? 500
	let lastError: unknown = null

	while (attempt < maxRetries) {
		attempt++
		const started = Date.now()

		const controller = new AbortController()
		const timeout = setTimeout(() => controller.abort(), timeoutMs)

		try {
			log.info(
				`Webhook attempt ${attempt}/${maxRetries} → ${WEBHOOK_URL} (payload ${body.length} bytes)`
			)

			const res = await fetch(WEBHOOK_URL, {
				method: 'POST',
				signal: controller.signal,
				headers: {
					'Content-Type': 'application/json',
					Authorization: `Bearer ${WEBHOOK_SECRET}`,
				},
				body,
			})

			clearTimeout(timeout)

			const took = Date.now() - started
			const ok = res.ok
			const status = res.status
			const text = !ok ? (await res.text()).slice(0, 1024) : ''

			diagnostic.debug('Webhook response', { status, took, ok })
			if (!ok) {
				if (status === 409) {
					log.warn('Webhook got 409 (duplicate), treating as success')
					return
				}

				const retryable =
					status === 408 || status === 429 || (status >= 500 && status <= 599)
				const msg = `Webhook HTTP ${status} in ${took}ms. Body: ${text || '(empty)'}`
				if (!retryable) {
					throw new NonRetriableWebhookError(msg)
				}

				lastError = new Error(msg)
				log.warn(`${msg}, will retry`)
			} else {
				log.info(`Webhook delivered in ${took}ms (attempt ${attempt})`)
				return
			}
		} catch (err: unknown) {
			clearTimeout(timeout)
			if (err instanceof NonRetriableWebhookError) {
				throw err
			}
			lastError = err

			if (err instanceof Error && err.name === 'AbortError') {
				log.warn(
					`Webhook attempt ${attempt} aborted after ${timeoutMs}ms, will retry`
				)
			} else {
				log.warn(
					`Webhook attempt ${attempt} failed: ${stringifyErr(err)}, will retry`
				)
			}
		}

		if (attempt < maxRetries) {
			await delay(backoff + Math.floor(Math.random() * 250))
			backoff = Math.min(backoff * 2, 15000)
		}
	}

	const redacted = redactSecret(WEBHOOK_SECRET)
	diagnostic.error('Webhook failed; giving up', {
		url: WEBHOOK_URL,
		secretPreview: redacted,
		attempts: maxRetries,
		lastError: stringifyErr(lastError),
	})

	throw new Error(
		`Webhook failed after ${maxRetries} attempts: ${stringifyErr(lastError)}`
	)
}

class NonRetriableWebhookError extends Error {
	constructor(message: string) {
		super(`Non-retriable error: ${message}`)
		this.name = 'NonRetriableWebhookError'
	}
}

/**
 * Posts `intentSettled` and `batchSettled` events to the webhook.
 * Events emitted during one engine call are sent together as a single
 * `settlements` notification, and notifications go out one at a time.
 * Does nothing unless both WEBHOOK_URL and WEBHOOK_SECRET are set.
 *
 * @returns Function that unsubscribes and resolves once queued
 * notifications have been attempted
 */
export function registerSettlementNotifier(
	events: EngineEvents,
	settings: WebhookSettings,
	opts: SendOptions = {}
): () => Promise<void> {
	if (!settings.WEBHOOK_URL || !settings.WEBHOOK_SECRET) {
		log.debug('Webhook not configured; settlement notifications disabled')
		return async () => undefined
	}

	let pending: Payload[] = []
	let delivery: Promise<void> = Promise.resolve()

	const flush = () => {
		if (pending.length === 0) return
		const batch = pending
		pending = []
		delivery = delivery
			.then(() => sendWebhook({ type: 'settlements', events: batch }, settings, opts))
			.catch((error: unknown) => {
				log.error(
					`${batch.length} settlement notification(s) dropped: ${stringifyErr(error)}`
				)
			})
	}

	// The engine emits synchronously, so one microtask collects a whole call
	const enqueue = (payload: Payload) => {
		if (pending.length === 0) {
			queueMicrotask(flush)
		}
		pending.push(payload)
	}

	const onIntentSettled = (event: IntentSettledEvent) =>
		enqueue({ type: 'intentSettled', ...event })
	const onBatchSettled = (stats: CoWStats) =>
		enqueue({ type: 'batchSettled', ...stats })

	events.on('intentSettled', onIntentSettled)
	events.on('batchSettled', onBatchSettled)
	log.info('Settlement notifications enabled')

	return async () => {
		events.off('intentSettled', onIntentSettled)
		events.off('batchSettled', onBatchSettled)
		flush()
		await delivery
	}
}

function redactSecret(secret: string | undefined) {
	if (!secret) return '(missing)'
	if (secret.length <= 8) return '********'
	return `${secret.slice(0, 2)}***${secret.slice(-4)}`
}

function hasCode(e: unknown): e is { code: string | number } {
	if (typeof e !== 'object' || e === null || !('code' in e)) {
		return false
	}
	return typeof e.code === 'string' || typeof e.code === 'number'
}

function stringifyErr(err: unknown): string {
	if (!err) return 'unknown error'
	if (typeof err === 'string') return err

	if (err instanceof Error) {
		const code = hasCode(err) ? ` code=${String(err.code)}` : ''
		return `${err.name}: ${err.message}${code}`
	}

	try {
		return JSON.stringify(err)
	} catch {
		return String(err)
	}
}
