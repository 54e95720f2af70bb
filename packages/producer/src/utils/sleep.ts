/**
 * Resolve after `ms` milliseconds. The timer is cleared when `signal` aborts,
 * and the returned promise then resolves immediately.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise(resolve => {
		if (signal?.aborted) {
			resolve()
			return
		}

		const onAbort = () => {
			clearTimeout(timeout)
			resolve()
		}

		const timeout = setTimeout(() => {
			signal?.removeEventListener('abort', onAbort)
			resolve()
		}, ms)

		signal?.addEventListener('abort', onAbort, { once: true })
	})
}

/**
 * Wait for `promises` to settle, giving up after `timeoutMs`.
 *
 * @returns true when every promise settled in time
 */
export async function settleWithin(promises: Iterable<Promise<unknown>>, timeoutMs: number): Promise<boolean> {
	const controller = new AbortController()
	const all = Promise.allSettled(promises).then(() => true)
	const timer = sleep(timeoutMs, controller.signal).then(() => false)

	try {
		return await Promise.race([all, timer])
	} finally {
		controller.abort()
	}
}
