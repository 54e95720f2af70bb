// Producer
export * from '@/producer/index.js'

// Transports
export { KafkaJsTransport, createKafkaJsTransport } from '@/transport/kafkajs.js'

// Records
export { topic, type Topic } from '@/topic.js'
export { headers, EMPTY_HEADERS, type Headers, type HeadersInit, type HeaderValue } from '@/headers.js'
export { serializer, string, json, buffer, fromCodec, type Serializer, type Encoder } from '@/serializer.js'

// Configuration
export { resolveProducerConfig, connectionString, type ProducerConfig, type ResolvedProducerConfig } from '@/config.js'

// Errors
export {
	ProducerError,
	SerializationError,
	DispatchError,
	ProducerClosedError,
	ProducerSetupError,
	InvalidConfigError,
	isProducerError,
	isSerializationError,
	isDispatchError,
	type ProducerErrorKind,
	type RecordPart,
} from '@/errors.js'

// Logger
export { createLogger, noopLogger, resolveLogger, type Logger, type LogLevel, type LogContext } from '@/logger.js'
