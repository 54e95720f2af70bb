/**
 * In-process transport for tests
 *
 * Stores every record it is given and completes sends with offsets counted per
 * topic-partition. Failures can be scripted per send, and completion can be
 * held back to exercise in-flight behaviour.
 *
 * @example
 * ```typescript
 * import { InMemoryTransport } from '@courier-kafka/producer/testing'
 *
 * const transport = new InMemoryTransport()
 * const producer = await Producer.create(config, { transport: () => transport })
 *
 * await producer.produce(orders, order, serializer.json())
 * expect(transport.records).toHaveLength(1)
 * ```
 */

import type { ProducerTransport, RecordMetadata, SendCallback, WireRecord } from '@/producer/types.js'

export interface InMemoryTransportOptions {
	/** Partition used for records with no explicit partition (default: 0) */
	defaultPartition?: number
	/** Time reported as the record timestamp (default: Date.now) */
	now?: () => number
	/** Complete sends only when `complete()` is called (default: false) */
	manual?: boolean
}

interface PendingSend {
	record: WireRecord
	callback: SendCallback
}

export class InMemoryTransport implements ProducerTransport {
	readonly records: WireRecord[] = []

	connectCalls = 0
	closeCalls = 0

	private connectError: Error | null = null
	private closeError: Error | null = null
	private readonly sendErrors: Error[] = []
	private readonly pending: PendingSend[] = []
	private readonly offsets = new Map<string, bigint>()
	private readonly defaultPartition: number
	private readonly now: () => number
	private readonly manual: boolean

	constructor(options: InMemoryTransportOptions = {}) {
		this.defaultPartition = options.defaultPartition ?? 0
		this.now = options.now ?? Date.now
		this.manual = options.manual ?? false
	}

	/** Make the next connect() reject with `error` */
	failConnect(error: Error): this {
		this.connectError = error
		return this
	}

	/** Make close() reject with `error` */
	failClose(error: Error): this {
		this.closeError = error
		return this
	}

	/** Fail the next send with `error`. Queued failures apply in order. */
	failNextSend(error: Error): this {
		this.sendErrors.push(error)
		return this
	}

	get pendingCount(): number {
		return this.pending.length
	}

	async connect(): Promise<void> {
		this.connectCalls++
		if (this.connectError) {
			throw this.connectError
		}
	}

	send(record: WireRecord, callback: SendCallback): void {
		this.records.push(record)
		this.pending.push({ record, callback })
		if (!this.manual) {
			queueMicrotask(() => this.complete())
		}
	}

	/**
	 * Complete up to `count` pending sends in the order they were made
	 *
	 * @returns number of sends completed
	 */
	complete(count = Infinity): number {
		let completed = 0
		while (completed < count) {
			const next = this.pending.shift()
			if (!next) {
				break
			}
			const error = this.sendErrors.shift()
			if (error) {
				next.callback(error)
			} else {
				next.callback(null, this.append(next.record))
			}
			completed++
		}
		return completed
	}

	async close(): Promise<void> {
		this.closeCalls++
		if (this.closeError) {
			throw this.closeError
		}
	}

	private append(record: WireRecord): RecordMetadata {
		const partition = record.partition ?? this.defaultPartition
		const key = `${record.topic}:${partition}`
		const offset = this.offsets.get(key) ?? 0n
		this.offsets.set(key, offset + 1n)

		return {
			topic: record.topic,
			partition,
			offset,
			timestamp: new Date(this.now()),
		}
	}
}
