/**
 * Producer configuration
 */

import { z } from 'zod'
import { InvalidConfigError } from '@/errors.js'
import type { Logger, LogLevel } from '@/logger.js'

export interface ProducerConfig {
	/** Bootstrap broker addresses (format: "host:port"), at least one */
	bootstrapServers: readonly string[]

	/** Client identifier sent to brokers (default: 'courier-producer') */
	clientId?: string

	/** Upper bound on waiting for in-flight records during close() in ms (default: 30000) */
	closeTimeoutMs?: number

	/** Logger instance (optional, defaults to no-op) */
	logger?: Logger

	/** Log level when using the default JSON logger */
	logLevel?: LogLevel
}

/**
 * Configuration with defaults applied and endpoints de-duplicated
 */
export interface ResolvedProducerConfig {
	readonly bootstrapServers: readonly string[]
	readonly clientId: string
	readonly closeTimeoutMs: number
	/** Level for the underlying client's own logs: `logLevel`, else 'info' with a logger, else 'silent' */
	readonly logLevel: LogLevel
}

const DEFAULT_CLIENT_ID = 'courier-producer'
const DEFAULT_CLOSE_TIMEOUT_MS = 30_000

const endpointSchema = z.string().refine(
	value => {
		const separator = value.lastIndexOf(':')
		if (separator <= 0) {
			return false
		}
		const port = value.slice(separator + 1)
		if (!/^\d+$/.test(port)) {
			return false
		}
		return Number(port) >= 1 && Number(port) <= 65535
	},
	value => ({ message: `"${value}" is not a host:port address` })
)

const configSchema = z.object({
	bootstrapServers: z.array(endpointSchema).min(1, 'at least one bootstrap server is required'),
	clientId: z.string().min(1).default(DEFAULT_CLIENT_ID),
	closeTimeoutMs: z.number().int().nonnegative().default(DEFAULT_CLOSE_TIMEOUT_MS),
	logLevel: z.enum(['silent', 'error', 'warn', 'info', 'debug']).optional(),
})

/**
 * Validate a ProducerConfig and apply defaults
 *
 * @throws InvalidConfigError listing every failed check
 */
export function resolveProducerConfig(config: ProducerConfig): ResolvedProducerConfig {
	const parsed = configSchema.safeParse({
		bootstrapServers: [...config.bootstrapServers],
		clientId: config.clientId,
		closeTimeoutMs: config.closeTimeoutMs,
		logLevel: config.logLevel,
	})

	if (!parsed.success) {
		throw new InvalidConfigError(
			parsed.error.issues.map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
		)
	}

	const logLevel: LogLevel = parsed.data.logLevel ?? (config.logger ? 'info' : 'silent')

	return Object.freeze({
		bootstrapServers: Object.freeze([...new Set(parsed.data.bootstrapServers)]),
		clientId: parsed.data.clientId,
		closeTimeoutMs: parsed.data.closeTimeoutMs,
		logLevel,
	})
}

/**
 * Bootstrap servers in the comma separated form brokers and CLIs expect
 */
export function connectionString(config: Pick<ResolvedProducerConfig, 'bootstrapServers'>): string {
	return config.bootstrapServers.join(',')
}
