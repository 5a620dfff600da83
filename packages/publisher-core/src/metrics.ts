import { Counter, Gauge, Histogram, Registry } from 'prom-client';

/**
 * Metrics registry and collectors for the publisher endpoints.
 * Every collector is labelled by endpoint name, so one instance serves all endpoints.
 */
export class PublisherMetrics {
	public readonly registry: Registry;

	// Write path
	public readonly recordsWritten: Counter;
	public readonly writeFailures: Counter;
	public readonly bufferFillBytes: Gauge;

	// Flush path
	public readonly batchesPublished: Counter;
	public readonly bytesPublished: Counter;
	public readonly batchesDropped: Counter;
	public readonly publishFailures: Counter;
	public readonly publishDuration: Histogram;

	// Connection
	public readonly connectAttempts: Counter;
	public readonly connectFailures: Counter;

	constructor(prefix = 'mqtt_writer') {
		this.registry = new Registry();

		this.recordsWritten = new Counter({
			name: `${prefix}_records_written_total`,
			help: 'Records appended to an endpoint buffer',
			labelNames: ['endpoint'],
			registers: [this.registry],
		});

		this.writeFailures = new Counter({
			name: `${prefix}_write_failures_total`,
			help: 'Writes that returned an error',
			labelNames: ['endpoint', 'reason'],
			registers: [this.registry],
		});

		this.bufferFillBytes = new Gauge({
			name: `${prefix}_buffer_fill_bytes`,
			help: 'Bytes currently held in the endpoint buffer',
			labelNames: ['endpoint'],
			registers: [this.registry],
		});

		this.batchesPublished = new Counter({
			name: `${prefix}_batches_published_total`,
			help: 'Batches handed to the broker',
			labelNames: ['endpoint'],
			registers: [this.registry],
		});

		this.bytesPublished = new Counter({
			name: `${prefix}_bytes_published_total`,
			help: 'Payload bytes handed to the broker',
			labelNames: ['endpoint'],
			registers: [this.registry],
		});

		this.batchesDropped = new Counter({
			name: `${prefix}_batches_dropped_total`,
			help: 'Batches discarded without being published',
			labelNames: ['endpoint', 'reason'],
			registers: [this.registry],
		});

		this.publishFailures = new Counter({
			name: `${prefix}_publish_failures_total`,
			help: 'Publish calls rejected by the transport',
			labelNames: ['endpoint'],
			registers: [this.registry],
		});

		this.publishDuration = new Histogram({
			name: `${prefix}_publish_duration_seconds`,
			help: 'Time spent connecting and publishing one batch',
			labelNames: ['endpoint'],
			buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5, 30],
			registers: [this.registry],
		});

		this.connectAttempts = new Counter({
			name: `${prefix}_connect_attempts_total`,
			help: 'Connect and reconnect attempts',
			labelNames: ['endpoint'],
			registers: [this.registry],
		});

		this.connectFailures = new Counter({
			name: `${prefix}_connect_failures_total`,
			help: 'Connect and reconnect attempts that failed',
			labelNames: ['endpoint'],
			registers: [this.registry],
		});
	}

	/**
	 * Get metrics in Prometheus format
	 */
	async getMetrics(): Promise<string> {
		return this.registry.metrics();
	}

	/**
	 * Get content type for Prometheus
	 */
	getContentType(): string {
		return this.registry.contentType;
	}
}
