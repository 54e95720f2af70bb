/**
 * Value serializers
 *
 * A serializer turns a typed value into the bytes written to a topic. It gets
 * the topic name so topic-aware formats (schema registries, per-topic
 * envelopes) can be plugged in. Serializers may throw or return a rejected
 * promise; the producer reports either as a SerializationError.
 */

export interface Serializer<T> {
	serialize(topic: string, value: T): Buffer | Promise<Buffer>
}

/**
 * Encode-only codec shape, as exposed by most codec libraries
 */
export interface Encoder<T> {
	encode(value: T): Buffer
}

export function string(): Serializer<string> {
	return {
		serialize: (_topic, value) => Buffer.from(value, 'utf-8'),
	}
}

export function json<T>(): Serializer<T> {
	return {
		serialize: (_topic, value) => Buffer.from(JSON.stringify(value), 'utf-8'),
	}
}

export function buffer(): Serializer<Buffer> {
	return {
		serialize: (_topic, value) => value,
	}
}

/**
 * Adapt a topic-agnostic encoder to a serializer
 */
export function fromCodec<T>(codec: Encoder<T>): Serializer<T> {
	return {
		serialize: (_topic, value) => codec.encode(value),
	}
}

export const serializer = {
	string,
	json,
	buffer,
	fromCodec,
}
