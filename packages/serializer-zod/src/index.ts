import type { Serializer } from '@courier-kafka/producer'
import type { ZodType, ZodTypeDef } from 'zod'

export interface ZodSerializerOptions {
	/** Encode the parsed value (default: UTF-8 JSON) */
	encode?: (value: unknown, topic: string) => Buffer
}

/**
 * Serializer that validates values against `schema` before encoding them
 *
 * The parsed output is what gets encoded, so schema transforms and defaults
 * apply. A value that fails validation throws the ZodError, which the producer
 * reports as a SerializationError.
 *
 * @example
 * ```typescript
 * const order = z.object({ id: z.string(), amount: z.number().positive() })
 *
 * await producer.produce(orders, input, zodSerializer(order))
 * ```
 */
export function zodSerializer<T>(schema: ZodType<T, ZodTypeDef, unknown>, options: ZodSerializerOptions = {}): Serializer<T> {
	const encodeValue = options.encode ?? ((value: unknown) => Buffer.from(JSON.stringify(value), 'utf-8'))

	return {
		serialize: (topic, value) => encodeValue(schema.parse(value), topic),
	}
}
