/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                         In-Process Database Fake                          ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * SqlDatabase stand-in recording every statement. SELECTs are answered from
 * canned rows keyed by table name (schema-qualified where the query
 * qualifies it).
 */

import type { SqlClient, SqlDatabase } from '../../src/types/db.js'

export interface RecordedStatement {
	text: string
	values: unknown[]
}

export class FakeDatabase implements SqlDatabase {
	/** Statements of committed transactions and direct queries */
	readonly committed: RecordedStatement[] = []
	/** Number of transactions rolled back */
	rollbacks = 0
	/** When set, the next query throws it (once) */
	failNext: Error | undefined

	constructor(private readonly tables: Record<string, unknown[]> = {}) {}

	async query(text: string, values: unknown[] = []): Promise<{ rows: unknown[] }> {
		const failure = this.failNext
		if (failure) {
			this.failNext = undefined
			throw failure
		}

		const select = /^\s*SELECT[\s\S]*?\bFROM\s+([\w.]+)/i.exec(text)
		if (select) {
			return { rows: this.tables[select[1]] ?? [] }
		}
		if (/^\s*SELECT\b/i.test(text)) {
			return { rows: [{ ok: 1 }] }
		}

		this.committed.push({ text, values })
		return { rows: [] }
	}

	async transaction<T>(work: (client: SqlClient) => Promise<T>): Promise<T> {
		const staged: RecordedStatement[] = []
		const client: SqlClient = {
			query: async (text, values = []) => {
				const failure = this.failNext
				if (failure) {
					this.failNext = undefined
					throw failure
				}
				staged.push({ text, values })
				return { rows: [] }
			},
		}

		try {
			const result = await work(client)
			this.committed.push(...staged)
			return result
		} catch (error) {
			this.rollbacks++
			throw error
		}
	}
}
