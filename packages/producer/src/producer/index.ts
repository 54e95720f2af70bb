/**
 * Producer module exports
 */

export { Producer, withProducer } from './producer.js'
export { buildRecord } from './record-builder.js'
export { createCompletion, type Completion } from './completion.js'
export { ProduceTarget } from './types.js'

export type {
	WireRecord,
	RecordMetadata,
	SendCallback,
	ProducerTransport,
	TransportFactory,
	ProducerOptions,
	ProducerState,
} from './types.js'
