/**
 * Transport backed by kafkajs
 */

import {
	Kafka,
	Partitioners,
	logLevel as KafkaJsLogLevel,
	type IHeaders,
	type LogEntry,
	type Message,
	type Producer as KafkaJsProducer,
	type RecordMetadata as KafkaJsRecordMetadata,
} from 'kafkajs'
import type { ResolvedProducerConfig } from '@/config.js'
import { toError } from '@/errors.js'
import type { Logger, LogLevel } from '@/logger.js'
import type { ProducerTransport, RecordMetadata, SendCallback, WireRecord } from '@/producer/types.js'

/**
 * Forward kafkajs log entries to `logger`
 */
export function kafkaJsLogCreator(logger: Logger): () => (entry: LogEntry) => void {
	return () =>
		({ namespace, level, log }) => {
			const { message, timestamp: _timestamp, ...context } = log
			const entryContext = { namespace, ...context }

			switch (level) {
				case KafkaJsLogLevel.ERROR:
					logger.error(message, entryContext)
					break
				case KafkaJsLogLevel.WARN:
					logger.warn(message, entryContext)
					break
				case KafkaJsLogLevel.INFO:
					logger.info(message, entryContext)
					break
				case KafkaJsLogLevel.DEBUG:
					logger.debug(message, entryContext)
					break
				default:
					break
			}
		}
}

const KAFKAJS_LOG_LEVELS: Record<LogLevel, KafkaJsLogLevel> = {
	silent: KafkaJsLogLevel.NOTHING,
	error: KafkaJsLogLevel.ERROR,
	warn: KafkaJsLogLevel.WARN,
	info: KafkaJsLogLevel.INFO,
	debug: KafkaJsLogLevel.DEBUG,
}

export function toKafkaJsLogLevel(level: LogLevel): KafkaJsLogLevel {
	return KAFKAJS_LOG_LEVELS[level]
}

/**
 * Header names that a plain object enumerates before all others
 */
export function indexLikeHeaderNames(headers: WireRecord['headers']): string[] {
	return [...headers.keys()].filter(name => /^(0|[1-9]\d*)$/.test(name) && Number(name) < 2 ** 32 - 1)
}

/**
 * kafkajs takes headers as a plain object, so names that look like array
 * indexes are sent first, in ascending numeric order. Other names keep
 * their order.
 */
export function toKafkaJsMessage(record: WireRecord, createTime: number): Message {
	const headers: IHeaders = Object.fromEntries(record.headers)
	return {
		key: record.key,
		value: record.value,
		headers,
		timestamp: String(createTime),
		...(record.partition !== null ? { partition: record.partition } : {}),
	}
}

/**
 * Map a kafkajs produce result to RecordMetadata.
 * The timestamp is the broker append time when the topic uses LogAppendTime
 * (anything but -1), otherwise the create time set on the message.
 */
export function toRecordMetadata(result: KafkaJsRecordMetadata, createTime: number): RecordMetadata {
	const offset = result.baseOffset ?? result.offset
	const appendTime = result.logAppendTime !== undefined ? Number(result.logAppendTime) : -1

	return {
		topic: result.topicName,
		partition: result.partition,
		offset: offset !== undefined ? BigInt(offset) : -1n,
		timestamp: new Date(appendTime >= 0 ? appendTime : createTime),
	}
}

export class KafkaJsTransport implements ProducerTransport {
	private readonly producer: KafkaJsProducer
	private readonly logger: Logger
	private warnedHeaderOrder = false

	constructor(config: ResolvedProducerConfig, logger: Logger) {
		this.logger = logger.child({ transport: 'kafkajs' })

		const kafka = new Kafka({
			clientId: config.clientId,
			brokers: [...config.bootstrapServers],
			logLevel: toKafkaJsLogLevel(config.logLevel),
			logCreator: kafkaJsLogCreator(this.logger),
		})

		this.producer = kafka.producer({
			createPartitioner: Partitioners.DefaultPartitioner,
		})
	}

	async connect(): Promise<void> {
		await this.producer.connect()
	}

	send(record: WireRecord, callback: SendCallback): void {
		const createTime = Date.now()
		this.warnOnReorderedHeaders(record)

		void this.producer
			.send({ topic: record.topic, messages: [toKafkaJsMessage(record, createTime)] })
			.then(
				results => {
					const result = results.find(r => r.topicName === record.topic) ?? results[0]
					if (result) {
						callback(null, toRecordMetadata(result, createTime))
					} else {
						callback(new Error(`No produce result returned for ${record.topic}`))
					}
				},
				(error: unknown) => {
					callback(toError(error))
				}
			)
			.catch((error: unknown) => {
				this.logger.error('send callback threw', { topic: record.topic, error: toError(error).message })
			})
	}

	private warnOnReorderedHeaders(record: WireRecord): void {
		if (this.warnedHeaderOrder) {
			return
		}
		const names = indexLikeHeaderNames(record.headers)
		if (names.length > 0) {
			this.warnedHeaderOrder = true
			this.logger.warn('integer-like header names are sent before other headers', { topic: record.topic, headers: names })
		}
	}

	async close(): Promise<void> {
		await this.producer.disconnect()
	}
}

export const createKafkaJsTransport = (config: ResolvedProducerConfig, logger: Logger): ProducerTransport =>
	new KafkaJsTransport(config, logger)
