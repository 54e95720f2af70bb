/**
 * Producer - serializes typed records and hands them to the underlying client
 */

import { connectionString, resolveProducerConfig, type ProducerConfig, type ResolvedProducerConfig } from '@/config.js'
import { ProducerClosedError, ProducerSetupError, toError } from '@/errors.js'
import { EMPTY_HEADERS, type Headers } from '@/headers.js'
import { resolveLogger, type Logger } from '@/logger.js'
import type { Serializer } from '@/serializer.js'
import type { Topic } from '@/topic.js'
import { createKafkaJsTransport } from '@/transport/kafkajs.js'
import { settleWithin } from '@/utils/sleep.js'
import { createCompletion } from './completion.js'
import { buildRecord } from './record-builder.js'
import {
	ProduceTarget,
	type ProducerOptions,
	type ProducerState,
	type ProducerTransport,
	type RecordMetadata,
	type TransportFactory,
	type WireRecord,
} from './types.js'

async function connectTransport(
	factory: TransportFactory,
	config: ResolvedProducerConfig,
	logger: Logger
): Promise<ProducerTransport> {
	try {
		const transport = factory(config, logger)
		await transport.connect()
		return transport
	} catch (error) {
		logger.error('failed to connect producer', {
			bootstrapServers: connectionString(config),
			error: toError(error).message,
		})
		throw new ProducerSetupError(config.bootstrapServers, error)
	}
}

/**
 * Producer handle owning one connected underlying client
 *
 * `produce()` may be called concurrently. Records are serialized locally and
 * handed to the client; each call settles once the client reports the
 * outcome. The client is closed exactly once, by `close()`.
 *
 * @example
 * ```typescript
 * const orders = topic<Order, string>('orders')
 *
 * const producer = await Producer.create({ bootstrapServers: ['localhost:9092'] })
 * try {
 *   const metadata = await producer.produceWithKey(orders, order.id, order, serializer.string(), serializer.json())
 *   console.log(metadata.partition, metadata.offset)
 * } finally {
 *   await producer.close()
 * }
 * ```
 */
export class Producer {
	private readonly transport: ProducerTransport
	private readonly config: ResolvedProducerConfig
	private readonly logger: Logger

	private state: ProducerState = 'running'
	private closePromise: Promise<void> | null = null
	private readonly inflight = new Set<Promise<void>>()

	private constructor(transport: ProducerTransport, config: ResolvedProducerConfig, logger: Logger) {
		this.transport = transport
		this.config = config
		this.logger = logger
	}

	/**
	 * Validate `config`, build the underlying client and connect it
	 *
	 * @throws InvalidConfigError if the config is invalid
	 * @throws ProducerSetupError if the client cannot be built or connected
	 */
	static async create(config: ProducerConfig, options: ProducerOptions = {}): Promise<Producer> {
		const resolved = resolveProducerConfig(config)
		const logger = resolveLogger(config, { component: 'producer', clientId: resolved.clientId })
		const transport = await connectTransport(options.transport ?? createKafkaJsTransport, resolved, logger)

		logger.info('producer connected', { bootstrapServers: connectionString(resolved) })
		return new Producer(transport, resolved, logger)
	}

	get isClosed(): boolean {
		return this.state !== 'running'
	}

	/**
	 * Serialize `value` and send it to `topic`
	 *
	 * @param target - Key or explicit partition for the record (default: none)
	 * @param headers - Record headers (default: none)
	 * @returns Metadata reported by the broker for the stored record
	 * @throws SerializationError if a serializer fails; nothing is sent
	 * @throws DispatchError if the underlying client reports a failure
	 * @throws ProducerClosedError if the producer is closed
	 */
	async produce<K, V>(
		topic: Topic<K, V>,
		value: V,
		serializer: Serializer<V>,
		target: ProduceTarget<K> = ProduceTarget.none(),
		headers: Headers = EMPTY_HEADERS
	): Promise<RecordMetadata> {
		this.assertRunning(topic.name)
		const record = await buildRecord(topic, value, serializer, target, headers)
		// close() may have started while an async serializer was running
		this.assertRunning(topic.name)
		return this.dispatch(record)
	}

	/**
	 * Send a keyed record; the underlying client picks the partition from the key
	 */
	produceWithKey<K, V>(
		topic: Topic<K, V>,
		key: K,
		value: V,
		keySerializer: Serializer<K>,
		valueSerializer: Serializer<V>
	): Promise<RecordMetadata> {
		return this.produce(topic, value, valueSerializer, ProduceTarget.key(key, keySerializer))
	}

	/**
	 * Close the underlying client
	 *
	 * Waits for in-flight records to settle (up to `closeTimeoutMs`), then
	 * closes the client. Safe to call more than once; every call resolves when
	 * the first one does. Never rejects: close failures are logged.
	 */
	close(): Promise<void> {
		this.closePromise ??= this.doClose()
		return this.closePromise
	}

	private async doClose(): Promise<void> {
		this.state = 'closing'
		this.logger.info('closing producer', { inflight: this.inflight.size })

		const drained = await settleWithin(this.inflight, this.config.closeTimeoutMs)
		if (!drained) {
			this.logger.warn('closing with records still in flight', {
				inflight: this.inflight.size,
				closeTimeoutMs: this.config.closeTimeoutMs,
			})
		}

		try {
			await this.transport.close()
			this.logger.info('producer closed')
		} catch (error) {
			this.logger.warn('failed to close producer client', { error: toError(error).message })
		} finally {
			this.state = 'closed'
		}
	}

	private assertRunning(topic: string): void {
		if (this.state !== 'running') {
			throw new ProducerClosedError(topic)
		}
	}

	private dispatch(record: WireRecord): Promise<RecordMetadata> {
		const completion = createCompletion(record.topic, this.logger)

		this.logger.debug('sending record', {
			topic: record.topic,
			partition: record.partition,
			keyed: record.key !== null,
			bytes: record.value.length,
		})

		try {
			this.transport.send(record, completion.callback)
		} catch (error) {
			completion.callback(toError(error))
		}

		const tracked: Promise<void> = completion.promise.then(
			() => {
				this.inflight.delete(tracked)
			},
			() => {
				this.inflight.delete(tracked)
			}
		)
		this.inflight.add(tracked)

		return completion.promise
	}
}

/**
 * Run `use` with a connected producer and close it afterwards
 *
 * The producer is closed whether `use` resolves or rejects; the outcome of
 * `use` is passed through as is.
 *
 * @example
 * ```typescript
 * await withProducer({ bootstrapServers: ['localhost:9092'] }, producer =>
 *   producer.produce(events, event, serializer.json())
 * )
 * ```
 */
export async function withProducer<T>(
	config: ProducerConfig,
	use: (producer: Producer) => Promise<T>,
	options: ProducerOptions = {}
): Promise<T> {
	const producer = await Producer.create(config, options)
	try {
		return await use(producer)
	} finally {
		await producer.close()
	}
}
