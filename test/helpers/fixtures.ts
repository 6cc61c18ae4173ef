/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    ⚖️  CORRIDOR SETTLEMENT NODE  ⚖️                        ║
 * ║                          Test Fixtures & Constants                        ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Shared test data, a controllable clock and engine builders.
 */

import { createSettlementEngine } from '../../src/engine/index.js'
import type { SettlementEngine } from '../../src/engine/index.js'
import type { CreateIntentParams } from '../../src/types/core.js'
import type { EnvironmentConfig } from '../../src/types/setup.js'

/** Administrator of every test engine (lowercase to avoid checksum validation) */
export const ADMIN = '0x00000000000000000000000000000000000000ad'

/** Owners for multi-party scenarios */
export const ALICE = '0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa'
export const BOB = '0xbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb'
export const CAROL = '0xcccccccccccccccccccccccccccccccccccccccc'

export const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000'

/** Corridor (pool) ids */
export const CORRIDOR_A =
	'0x1111111111111111111111111111111111111111111111111111111111111111'
export const CORRIDOR_B =
	'0x2222222222222222222222222222222222222222222222222222222222222222'

/** Start time of every test clock */
export const T0 = 1_700_000_000

export const OPERATOR_TOKEN = 'test-operator-token-0000000000000000'
export const ADMIN_TOKEN = 'test-admin-token-00000000000000000000'

/**
 * Clock whose time only moves when the test says so.
 */
export class TestClock {
	constructor(public now: number = T0) {}

	readonly read = (): number => this.now

	advance(seconds: number): void {
		this.now += seconds
	}
}

/**
 * Engine owned by ADMIN on a test clock.
 */
export function createTestEngine(clock = new TestClock()): {
	engine: SettlementEngine
	clock: TestClock
} {
	const engine = createSettlementEngine({ admin: ADMIN, clock: clock.read })
	return { engine, clock }
}

/**
 * Intent parameters on CORRIDOR_A, one hour from T0, overridable per test.
 */
export function intentParams(
	overrides: Partial<CreateIntentParams> = {}
): CreateIntentParams {
	return {
		owner: ALICE,
		corridorId: CORRIDOR_A,
		zeroForOne: true,
		amount: 100n,
		minOut: 90n,
		deadline: T0 + 3600,
		...overrides,
	}
}

/**
 * Validated configuration with rate limiting off and no database.
 */
export function testConfig(
	overrides: Partial<EnvironmentConfig> = {}
): EnvironmentConfig {
	return {
		API_BEARER_TOKEN: OPERATOR_TOKEN,
		ADMIN_BEARER_TOKEN: ADMIN_TOKEN,
		CORRIDOR_ADMIN_ADDRESS: ADMIN,
		DATABASE_SSL: false,
		PORT: 0,
		LOG_LEVEL: 5,
		DIAGNOSTIC_LOGGER: false,
		RATE_LIMIT_ENABLED: false,
		RATE_LIMIT_WINDOW_MS: 60000,
		RATE_LIMIT_PERMISSIVE: 300,
		RATE_LIMIT_STANDARD: 100,
		RATE_LIMIT_STRICT: 50,
		GAS_PER_INTENT_ESTIMATE: 50000,
		WEBHOOK_TIMEOUT_MS: 6000,
		WEBHOOK_MAX_RETRIES: 6,
		...overrides,
	}
}
