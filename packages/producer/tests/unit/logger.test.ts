import { afterEach, describe, expect, it, vi } from 'vitest'

import { createLogger, noopLogger, resolveLogger, type Logger } from '@/logger.js'

function lastPayload(spy: { mock: { calls: unknown[][] } }): Record<string, unknown> {
	const call = spy.mock.calls.at(-1)
	return JSON.parse(String(call?.[0]))
}

function stubLogger(childLogger?: Logger): Logger {
	const logger: Logger = {
		error: vi.fn(),
		warn: vi.fn(),
		info: vi.fn(),
		debug: vi.fn(),
		child: vi.fn(() => childLogger ?? logger),
	}
	return logger
}

describe('logger', () => {
	afterEach(() => {
		vi.restoreAllMocks()
	})

	it('writes info entries as one JSON line', () => {
		const spy = vi.spyOn(console, 'log').mockImplementation(() => {})
		createLogger('info', { service: 'orders' }).info('connected', { brokers: 2 })

		expect(spy).toHaveBeenCalledTimes(1)
		const payload = lastPayload(spy)
		expect(payload.level).toBe('info')
		expect(payload.message).toBe('connected')
		expect(payload.service).toBe('orders')
		expect(payload.brokers).toBe(2)
		expect(typeof payload.timestamp).toBe('string')
	})

	it('routes errors to console.error', () => {
		const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
		const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {})
		createLogger('error').error('boom')

		expect(errorSpy).toHaveBeenCalledTimes(1)
		expect(logSpy).not.toHaveBeenCalled()
	})

	it('drops entries below the configured level', () => {
		const spy = vi.spyOn(console, 'log').mockImplementation(() => {})
		const logger = createLogger('warn')
		logger.info('hidden')
		logger.debug('hidden')
		logger.warn('shown')

		expect(spy).toHaveBeenCalledTimes(1)
		expect(lastPayload(spy).message).toBe('shown')
	})

	it('silent drops everything', () => {
		const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
		createLogger('silent').error('hidden')
		expect(errorSpy).not.toHaveBeenCalled()
	})

	it('child loggers merge context, entry context wins', () => {
		const spy = vi.spyOn(console, 'log').mockImplementation(() => {})
		createLogger('info', { a: 1, b: 1 }).child({ b: 2 }).info('child', { c: 3 })

		const payload = lastPayload(spy)
		expect(payload.a).toBe(1)
		expect(payload.b).toBe(2)
		expect(payload.c).toBe(3)
	})

	it('noopLogger never writes', () => {
		const spy = vi.spyOn(console, 'log').mockImplementation(() => {})
		noopLogger.info('nope')
		noopLogger.child({ x: 1 }).warn('nope')
		expect(spy).not.toHaveBeenCalled()
	})

	describe('resolveLogger()', () => {
		it('prefers an explicit logger and scopes it with a child', () => {
			const child = stubLogger()
			const parent = stubLogger(child)

			expect(resolveLogger({ logger: parent, logLevel: 'debug' }, { component: 'producer' })).toBe(child)
			expect(parent.child).toHaveBeenCalledWith({ component: 'producer' })
		})

		it('creates a JSON logger for a log level', () => {
			const spy = vi.spyOn(console, 'log').mockImplementation(() => {})
			resolveLogger({ logLevel: 'info' }, { component: 'producer' }).info('up')
			expect(lastPayload(spy).component).toBe('producer')
		})

		it('falls back to the no-op logger', () => {
			expect(resolveLogger({})).toBe(noopLogger)
			expect(resolveLogger({ logLevel: 'silent' })).toBe(noopLogger)
		})
	})
})
