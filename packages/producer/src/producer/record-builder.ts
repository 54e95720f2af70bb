import { SerializationError, type RecordPart } from '@/errors.js'
import { EMPTY_HEADERS, type Headers } from '@/headers.js'
import type { Serializer } from '@/serializer.js'
import type { Topic } from '@/topic.js'
import type { ProduceTarget, WireRecord } from './types.js'

async function serializePart<T>(topic: string, part: RecordPart, serializer: Serializer<T>, value: T): Promise<Buffer> {
	try {
		return await serializer.serialize(topic, value)
	} catch (error) {
		throw new SerializationError(topic, part, error)
	}
}

function assertNever(target: never): never {
	throw new TypeError(`Unknown produce target: ${JSON.stringify(target)}`)
}

/**
 * Serialize a record for the given target.
 *
 * Keyed targets serialize the key first, then the value; the first failure
 * rejects with a SerializationError and the other serializer is not called.
 * Headers are copied when the call is made; later changes to the caller's map
 * do not reach the record.
 */
export async function buildRecord<K, V>(
	topic: Topic<K, V>,
	value: V,
	valueSerializer: Serializer<V>,
	target: ProduceTarget<K>,
	headers: Headers
): Promise<WireRecord> {
	const name = topic.name
	const recordHeaders: Headers = headers.size > 0 ? new Map(headers) : EMPTY_HEADERS

	switch (target.kind) {
		case 'none':
			return Object.freeze({
				topic: name,
				key: null,
				value: await serializePart(name, 'value', valueSerializer, value),
				partition: null,
				headers: recordHeaders,
			})

		case 'partition':
			return Object.freeze({
				topic: name,
				key: null,
				value: await serializePart(name, 'value', valueSerializer, value),
				partition: target.partition,
				headers: recordHeaders,
			})

		case 'key': {
			const keyBytes = await serializePart(name, 'key', target.serializer, target.key)
			const valueBytes = await serializePart(name, 'value', valueSerializer, value)
			return Object.freeze({
				topic: name,
				key: keyBytes,
				value: valueBytes,
				partition: null,
				headers: recordHeaders,
			})
		}

		default:
			return assertNever(target)
	}
}
