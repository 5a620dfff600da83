// Errors
export {
	PublisherErrors,
	describePublisherError,
	toError,
	toStatusCode,
	type PublisherError,
	type PublisherErrorType,
} from './errors.js';

// Synchronization
export { Mutex } from './sync/mutex.js';

// Record format
export {
	DataSourceType,
	valueListIdentifier,
	valueListSchema,
	type ValueList,
	type ValueListMeta,
} from './format/value-list.js';
export type { AppendOverflow, FrameRegion, RecordSerializer } from './format/serializer.js';
export { RateCache } from './format/rate-cache.js';
export { JsonValueListSerializer, encodeValueList } from './format/json-value-list.js';

// Buffer
export { FrameBuffer, MAX_BUFFER_SIZE, MIN_BUFFER_SIZE } from './buffer/frame-buffer.js';

// Connection
export type {
	ProtocolVersion,
	QualityOfService,
	TlsSettings,
	TransportClient,
	TransportConnectOptions,
} from './connection/transport.js';
export { MqttTransport } from './connection/mqtt-transport.js';
export {
	ConnectionManager,
	type ConnectionSettings,
	type ConnectionStats,
} from './connection/connection-manager.js';

// Endpoints
export type { EndpointSettings } from './publisher/settings.js';
export { Endpoint, type EndpointDeps, type EndpointStats } from './publisher/endpoint.js';
export {
	DEFAULT_KEEPALIVE_SECONDS,
	DEFAULT_PORT,
	DEFAULT_TOPIC,
	NODE_CONFIG_KEYS,
	parseNodeConfig,
} from './config/node-config.js';
export {
	EndpointRegistry,
	NODE_SECTION,
	type EndpointCapability,
	type EndpointOutcome,
	type RegistryDeps,
} from './registry/endpoint-registry.js';

// Metrics
export { PublisherMetrics } from './metrics.js';
