/**
 * Topic definitions
 *
 * A topic is identified by its name only. The key and value types exist at the
 * type level so that `produce()` only accepts serializers matching the topic.
 */

declare const topicTypes: unique symbol

export interface Topic<K = Buffer, V = Buffer> {
	readonly name: string
	/** Type-level carrier for the key/value types, never set at runtime */
	readonly [topicTypes]?: { key: K; value: V }
}

/**
 * Create a typed topic
 *
 * @example
 * ```typescript
 * const orders = topic<Order, string>('orders')
 *
 * await producer.produceWithKey(orders, order.id, order, serializer.string(), serializer.json())
 * ```
 */
export function topic<V = Buffer, K = Buffer>(name: string): Topic<K, V> {
	if (name.length === 0) {
		throw new TypeError('Topic name must not be empty')
	}
	return { name }
}
