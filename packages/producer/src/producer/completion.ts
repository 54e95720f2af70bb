/**
 * One-shot bridge from a send callback to a promise
 */

import { DispatchError, toError } from '@/errors.js'
import type { Logger } from '@/logger.js'
import type { RecordMetadata, SendCallback } from './types.js'

export interface Completion {
	readonly promise: Promise<RecordMetadata>
	readonly callback: SendCallback
	readonly settled: boolean
}

/**
 * Create a completion for one record sent to `topic`.
 *
 * The first callback invocation settles the promise. Any later invocation is
 * dropped and logged; the promise never changes once settled.
 */
export function createCompletion(topic: string, logger: Logger): Completion {
	let settled = false
	let resolve!: (metadata: RecordMetadata) => void
	let reject!: (error: DispatchError) => void

	const promise = new Promise<RecordMetadata>((res, rej) => {
		resolve = res
		reject = rej
	})

	const callback: SendCallback = (error, metadata) => {
		if (settled) {
			logger.error('send callback invoked more than once', {
				topic,
				error: error?.message,
				partition: metadata?.partition,
			})
			return
		}
		settled = true

		if (error) {
			reject(new DispatchError(topic, toError(error)))
		} else if (metadata) {
			resolve(metadata)
		} else {
			reject(new DispatchError(topic, new Error('Send completed without metadata')))
		}
	}

	return {
		promise,
		callback,
		get settled() {
			return settled
		},
	}
}
