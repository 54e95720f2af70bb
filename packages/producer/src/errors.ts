/**
 * Producer error hierarchy
 *
 * Everything a `produce()` call can reject with is a ProducerError, tagged by
 * `kind`. Failures while acquiring the producer are separate classes: no
 * record has been attempted at that point.
 */

export type ProducerErrorKind = 'serialization' | 'dispatch' | 'closed'

/**
 * Base class for errors returned by produce()
 */
export abstract class ProducerError extends Error {
	abstract readonly kind: ProducerErrorKind

	/** Topic the record was addressed to */
	readonly topic: string

	constructor(message: string, topic: string) {
		super(message)
		this.name = 'ProducerError'
		this.topic = topic

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor)
		}
	}
}

export type RecordPart = 'key' | 'value'

/**
 * A key or value serializer failed. Raised before anything is sent.
 */
export class SerializationError extends ProducerError {
	readonly kind = 'serialization'
	readonly part: RecordPart
	override readonly cause: unknown

	constructor(topic: string, part: RecordPart, cause: unknown) {
		super(`Failed to serialize ${part} for topic ${topic}: ${describe(cause)}`, topic)
		this.name = 'SerializationError'
		this.part = part
		this.cause = cause
	}
}

/**
 * The underlying client reported a failure for the record
 */
export class DispatchError extends ProducerError {
	readonly kind = 'dispatch'
	override readonly cause: Error

	constructor(topic: string, cause: Error) {
		super(`Failed to deliver record to ${topic}: ${cause.message}`, topic)
		this.name = 'DispatchError'
		this.cause = cause
	}
}

/**
 * produce() was called after the producer was closed
 */
export class ProducerClosedError extends ProducerError {
	readonly kind = 'closed'

	constructor(topic: string) {
		super(`Producer is closed, cannot produce to ${topic}`, topic)
		this.name = 'ProducerClosedError'
	}
}

/**
 * The underlying client could not be created or connected
 */
export class ProducerSetupError extends Error {
	readonly bootstrapServers: readonly string[]
	override readonly cause: unknown

	constructor(bootstrapServers: readonly string[], cause: unknown) {
		super(`Failed to connect producer to ${bootstrapServers.join(',')}: ${describe(cause)}`)
		this.name = 'ProducerSetupError'
		this.bootstrapServers = bootstrapServers
		this.cause = cause
	}
}

/**
 * Producer configuration failed validation
 */
export class InvalidConfigError extends Error {
	readonly issues: readonly string[]

	constructor(issues: readonly string[]) {
		super(`Invalid producer config: ${issues.join('; ')}`)
		this.name = 'InvalidConfigError'
		this.issues = issues
	}
}

function describe(cause: unknown): string {
	return cause instanceof Error ? cause.message : String(cause)
}

export function isProducerError(error: unknown): error is ProducerError {
	return error instanceof ProducerError
}

export function isSerializationError(error: unknown): error is SerializationError {
	return error instanceof SerializationError
}

export function isDispatchError(error: unknown): error is DispatchError {
	return error instanceof DispatchError
}

/**
 * Coerce a thrown value into an Error, keeping Error instances as they are
 */
export function toError(value: unknown): Error {
	if (value instanceof Error) {
		return value
	}
	return new Error(typeof value === 'string' ? value : `Non-error value thrown: ${String(value)}`)
}
