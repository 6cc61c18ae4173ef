/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                          Engine State Store                               ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * PostgreSQL persistence of engine state.
 *
 * - loadEngineState: hydrates a fresh EngineState from the tables of
 *   sql/schema.sql
 * - StateJournal: turns engine events into row writes, buffered in memory
 *   until flush() writes them in one transaction
 *
 * The engine stays synchronous; callers flush after each mutating call.
 *
 * @packageDocumentation
 */

import { createLogger, diagnostic } from './logger.js'
import { createEngineState } from '../engine/state.js'
import type {
	EngineEventListener,
	EngineEventName,
	EngineEvents,
} from '../engine/events.js'
import type { EngineState } from '../engine/state.js'
import type { SqlClient, SqlDatabase } from '../types/db.js'

const logger = createLogger('StateStore')

interface Statement {
	text: string
	values: unknown[]
}

/*
╔═══════════════════════════════════════════════════════════════════════════╗
║                             ROW READERS                                   ║
╚═══════════════════════════════════════════════════════════════════════════╝
*/

type Row = Record<string, unknown>

function asRow(row: unknown, table: string): Row {
	if (typeof row !== 'object' || row === null) {
		throw new Error(`Malformed row in ${table}`)
	}
	return Object.fromEntries(Object.entries(row))
}

function text(row: Row, column: string): string {
	const value = row[column]
	if (typeof value !== 'string') {
		throw new Error(`Column ${column} is not text`)
	}
	return value
}

function bool(row: Row, column: string): boolean {
	const value = row[column]
	if (typeof value !== 'boolean') {
		throw new Error(`Column ${column} is not boolean`)
	}
	return value
}

/** NUMERIC and BIGINT columns arrive as decimal strings */
function big(row: Row, column: string): bigint {
	const value = row[column]
	if (typeof value === 'bigint') return value
	if (typeof value === 'number' && Number.isInteger(value)) return BigInt(value)
	if (typeof value === 'string' && /^-?\d+$/.test(value)) return BigInt(value)
	throw new Error(`Column ${column} is not an integer`)
}

function int(row: Row, column: string): number {
	const value = big(row, column)
	if (
		value > BigInt(Number.MAX_SAFE_INTEGER) ||
		value < BigInt(Number.MIN_SAFE_INTEGER)
	) {
		throw new Error(`Column ${column} exceeds the safe integer range`)
	}
	return Number(value)
}

/*
╔═══════════════════════════════════════════════════════════════════════════╗
║                              HYDRATION                                    ║
╚═══════════════════════════════════════════════════════════════════════════╝
*/

/**
 * Builds engine state from the database. The administrator is not stored
 * and comes from configuration.
 */
export async function loadEngineState(
	db: SqlClient,
	admin: string
): Promise<EngineState> {
	const startTime = Date.now()
	const state = createEngineState(admin)

	const corridors = await db.query(
		'SELECT corridor_id, nettable, registered_at FROM corridors'
	)
	for (const raw of corridors.rows) {
		const row = asRow(raw, 'corridors')
		const corridorId = text(row, 'corridor_id')
		state.corridors.set(corridorId, {
			corridorId,
			nettable: bool(row, 'nettable'),
			registeredAt: int(row, 'registered_at'),
		})
	}

	const intents = await db.query(
		`SELECT id, owner, corridor_id, zero_for_one, amount, price_limit,
			min_out, deadline, settled, created_at
		FROM intents ORDER BY id`
	)
	let maxId = 0
	for (const raw of intents.rows) {
		const row = asRow(raw, 'intents')
		const id = int(row, 'id')
		state.intents.set(id, {
			id,
			owner: text(row, 'owner'),
			corridorId: text(row, 'corridor_id'),
			zeroForOne: bool(row, 'zero_for_one'),
			amount: big(row, 'amount'),
			priceLimit: row.price_limit === null ? null : big(row, 'price_limit'),
			minOut: big(row, 'min_out'),
			deadline: int(row, 'deadline'),
			settled: bool(row, 'settled'),
			createdAt: int(row, 'created_at'),
		})
		maxId = Math.max(maxId, id)
	}
	state.nextIntentId = maxId + 1

	const owners = await db.query(
		'SELECT owner, intent_id FROM owner_intents ORDER BY intent_id'
	)
	for (const raw of owners.rows) {
		const row = asRow(raw, 'owner_intents')
		const owner = text(row, 'owner')
		const ids = state.intentsByOwner.get(owner) ?? []
		ids.push(int(row, 'intent_id'))
		state.intentsByOwner.set(owner, ids)
	}

	const fees = await db.query(
		'SELECT corridor_id, base_fee, max_extra_fee, net_flow_threshold FROM fee_params'
	)
	for (const raw of fees.rows) {
		const row = asRow(raw, 'fee_params')
		state.feeParams.set(text(row, 'corridor_id'), {
			baseFee: int(row, 'base_fee'),
			maxExtraFee: int(row, 'max_extra_fee'),
			netFlowThreshold: big(row, 'net_flow_threshold'),
		})
	}

	const flows = await db.query('SELECT corridor_id, flow FROM corridor_flow')
	for (const raw of flows.rows) {
		const row = asRow(raw, 'corridor_flow')
		state.flow.set(text(row, 'corridor_id'), big(row, 'flow'))
	}

	logger.info(
		`Engine state loaded: ${state.corridors.size} corridors, ${state.intents.size} intents`
	)
	diagnostic.info('Engine state hydrated', {
		corridors: state.corridors.size,
		intents: state.intents.size,
		feeParams: state.feeParams.size,
		flows: state.flow.size,
		nextIntentId: state.nextIntentId,
		loadTime: Date.now() - startTime,
	})

	return state
}

/*
╔═══════════════════════════════════════════════════════════════════════════╗
║                               JOURNAL                                     ║
╚═══════════════════════════════════════════════════════════════════════════╝
*/

const UPSERT_FLOW = `INSERT INTO corridor_flow (corridor_id, flow) VALUES ($1, $2)
	ON CONFLICT (corridor_id) DO UPDATE SET flow = EXCLUDED.flow`

/**
 * Records engine events as pending row writes.
 *
 * @example
 * ```typescript
 * const journal = new StateJournal(pgDatabase(pool), engine.events)
 * engine.ledger.create(params)
 * await journal.flush()
 * ```
 */
export class StateJournal {
	private pending: Statement[] = []
	private flushing: Promise<void> = Promise.resolve()
	private readonly detach: Array<() => void> = []

	constructor(
		private readonly db: SqlDatabase,
		events: EngineEvents
	) {
		this.listen(events, 'intentCreated', (intent) => {
			this.push(
				`INSERT INTO intents (id, owner, corridor_id, zero_for_one, amount,
					price_limit, min_out, deadline, settled, created_at)
				VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
				ON CONFLICT (id) DO NOTHING`,
				[
					intent.id,
					intent.owner,
					intent.corridorId,
					intent.zeroForOne,
					intent.amount.toString(),
					intent.priceLimit === null ? null : intent.priceLimit.toString(),
					intent.minOut.toString(),
					intent.deadline,
					intent.settled,
					intent.createdAt,
				]
			)
			this.push(
				`INSERT INTO owner_intents (owner, intent_id) VALUES ($1, $2)
				ON CONFLICT DO NOTHING`,
				[intent.owner, intent.id]
			)
		})
		this.listen(events, 'intentSettled', ({ id }) => {
			this.push('UPDATE intents SET settled = TRUE WHERE id = $1', [id])
		})
		this.listen(events, 'corridorConfigured', (corridor) => {
			this.push(
				`INSERT INTO corridors (corridor_id, nettable, registered_at)
				VALUES ($1, $2, $3)
				ON CONFLICT (corridor_id) DO UPDATE SET nettable = EXCLUDED.nettable`,
				[corridor.corridorId, corridor.nettable, corridor.registeredAt]
			)
		})
		this.listen(events, 'feeParamsUpdated', ({ corridorId, params }) => {
			this.push(
				`INSERT INTO fee_params (corridor_id, base_fee, max_extra_fee, net_flow_threshold)
				VALUES ($1, $2, $3, $4)
				ON CONFLICT (corridor_id) DO UPDATE SET
					base_fee = EXCLUDED.base_fee,
					max_extra_fee = EXCLUDED.max_extra_fee,
					net_flow_threshold = EXCLUDED.net_flow_threshold`,
				[
					corridorId,
					params.baseFee,
					params.maxExtraFee,
					params.netFlowThreshold.toString(),
				]
			)
		})
		this.listen(events, 'flowUpdated', ({ corridorId, current }) => {
			this.push(UPSERT_FLOW, [corridorId, current.toString()])
		})
		this.listen(events, 'flowReset', ({ corridorId, current }) => {
			this.push(UPSERT_FLOW, [corridorId, current.toString()])
		})
	}

	/** Writes not yet flushed */
	get pendingCount(): number {
		return this.pending.length
	}

	/**
	 * Writes every pending statement in one transaction. Flushes run one at a
	 * time; a failed flush keeps its statements queued for the next one.
	 */
	flush(): Promise<void> {
		const run = this.flushing.then(() => this.write())
		// The next flush waits for this one whether or not it succeeds
		this.flushing = run.then(
			() => undefined,
			() => undefined
		)
		return run
	}

	/**
	 * Stops recording events.
	 */
	close(): void {
		for (const off of this.detach.splice(0)) {
			off()
		}
	}

	private listen<K extends EngineEventName>(
		events: EngineEvents,
		name: K,
		listener: EngineEventListener<K>
	): void {
		events.on(name, listener)
		this.detach.push(() => events.off(name, listener))
	}

	private push(text: string, values: unknown[]): void {
		this.pending.push({ text, values })
	}

	private async write(): Promise<void> {
		const batch = this.pending
		this.pending = []
		if (batch.length === 0) {
			return
		}

		const startTime = Date.now()
		try {
			await this.db.transaction(async (client) => {
				for (const statement of batch) {
					await client.query(statement.text, statement.values)
				}
			})
		} catch (error) {
			this.pending = [...batch, ...this.pending]
			logger.error(`Journal flush of ${batch.length} statements failed`, error)
			throw error
		}

		diagnostic.debug('Journal flushed', {
			statements: batch.length,
			flushTime: Date.now() - startTime,
		})
	}
}
