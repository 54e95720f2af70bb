/**
 * Producer type definitions
 */

import type { Headers } from '@/headers.js'
import type { Logger } from '@/logger.js'
import type { ResolvedProducerConfig } from '@/config.js'
import type { Serializer } from '@/serializer.js'

// ==================== Produce Target ====================

/**
 * How the key and partition of a record are chosen.
 * A record carries either a key or an explicit partition, never both.
 */
export type ProduceTarget<K> =
	| { readonly kind: 'none' }
	| { readonly kind: 'partition'; readonly partition: number }
	| { readonly kind: 'key'; readonly key: K; readonly serializer: Serializer<K> }

const NONE: ProduceTarget<never> = Object.freeze({ kind: 'none' })

export const ProduceTarget = {
	/** No key; the underlying client picks the partition */
	none<K = never>(): ProduceTarget<K> {
		return NONE
	},

	/** Explicit partition, no key */
	partition<K = never>(partition: number): ProduceTarget<K> {
		if (!Number.isInteger(partition) || partition < 0) {
			throw new RangeError(`Partition must be a non-negative integer, got ${partition}`)
		}
		return { kind: 'partition', partition }
	},

	/** Keyed record; the underlying client derives the partition from the key */
	key<K>(key: K, serializer: Serializer<K>): ProduceTarget<K> {
		return { kind: 'key', key, serializer }
	},
}

// ==================== Records ====================

/**
 * Fully serialized record, ready for the underlying client
 */
export interface WireRecord {
	readonly topic: string
	readonly key: Buffer | null
	readonly value: Buffer
	readonly partition: number | null
	readonly headers: Headers
}

/**
 * Broker-confirmed placement of a record
 */
export interface RecordMetadata {
	readonly topic: string
	readonly partition: number
	readonly offset: bigint
	/** Broker append time, or the record's create time */
	readonly timestamp: Date
}

// ==================== Transport ====================

/**
 * Completion callback of a send. Called with an error, or with `null` and the
 * record's metadata.
 */
export type SendCallback = (error: Error | null, metadata?: RecordMetadata) => void

/**
 * The underlying broker client.
 *
 * Implementations own retries, batching, partitioning and timeouts. `send` must
 * invoke its callback once per record, from whatever context the client
 * completes in. `send` and `close` must not be called before `connect` resolves.
 */
export interface ProducerTransport {
	connect(): Promise<void>
	send(record: WireRecord, callback: SendCallback): void
	close(): Promise<void>
}

export type TransportFactory = (config: ResolvedProducerConfig, logger: Logger) => ProducerTransport

// ==================== Producer ====================

export interface ProducerOptions {
	/** Builds the underlying client (default: kafkajs) */
	transport?: TransportFactory
}

/**
 * Producer state
 */
export type ProducerState = 'running' | 'closing' | 'closed'
