/**
 * Record headers: an ordered mapping of header name to raw bytes
 *
 * The kafkajs transport sends integer-like names (such as "10") ahead of the
 * others, because kafkajs takes headers as a plain object.
 */

export type Headers = ReadonlyMap<string, Buffer>

export type HeaderValue = string | Buffer

export type HeadersInit = Record<string, HeaderValue> | Iterable<readonly [string, HeaderValue]>

export const EMPTY_HEADERS: Headers = new Map<string, Buffer>()

function toBuffer(value: HeaderValue): Buffer {
	return typeof value === 'string' ? Buffer.from(value, 'utf-8') : value
}

function isIterable(init: HeadersInit): init is Iterable<readonly [string, HeaderValue]> {
	return Symbol.iterator in init
}

/**
 * Build headers, keeping the order in which entries are given.
 * String values are UTF-8 encoded. A repeated name keeps its first position
 * and takes the last value.
 *
 * @example
 * ```typescript
 * headers({ 'trace-id': 'abc', 'content-type': 'application/json' })
 * headers([['b', 'second'], ['a', Buffer.from([1])]])
 * ```
 */
export function headers(init: HeadersInit): Headers {
	const entries = isIterable(init) ? init : Object.entries(init)
	const result = new Map<string, Buffer>()
	for (const [name, value] of entries) {
		result.set(name, toBuffer(value))
	}
	return result
}
