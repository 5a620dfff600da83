import { err, ok, type Result } from 'neverthrow';
import type { EndpointContext, Logger } from '@mqtt-writer/logging';
import { FrameBuffer } from '../buffer/frame-buffer.js';
import { ConnectionManager, type ConnectionStats } from '../connection/connection-manager.js';
import type { TransportClient } from '../connection/transport.js';
import { PublisherErrors, describePublisherError, toError, type PublisherError } from '../errors.js';
import { JsonValueListSerializer } from '../format/json-value-list.js';
import type { RecordSerializer } from '../format/serializer.js';
import type { ValueList } from '../format/value-list.js';
import { PublisherMetrics } from '../metrics.js';
import { Mutex } from '../sync/mutex.js';
import type { EndpointSettings } from './settings.js';

/**
 * Collaborators of an endpoint
 */
export interface EndpointDeps<H> {
	transport: TransportClient<H>;
	logger: Logger;
	/** Shared metrics; a private instance is created when omitted */
	metrics?: PublisherMetrics;
	/** Record encoder; JSON value lists honouring StoreRates when omitted */
	serializer?: RecordSerializer<ValueList>;
}

/**
 * Endpoint statistics
 */
export interface EndpointStats extends ConnectionStats {
	name: string;
	recordsWritten: number;
	writeFailures: number;
	batchesPublished: number;
	batchesDropped: number;
	bufferFill: number;
	bufferCapacity: number;
	batchOpenedAt: Date;
	shutDown: boolean;
}

/**
 * One configured publish destination: a frame buffer, a broker connection and
 * the lock that serializes every operation on them.
 *
 * write() appends a record, flushing once and retrying once when the buffer is
 * full. flush() publishes the batch when it is due and not empty. Both hold
 * the lock for their whole duration, network I/O included, so producers of a
 * stalled endpoint wait; other endpoints are unaffected.
 */
export class Endpoint<H> {
	readonly name: string;

	private readonly settings: EndpointSettings;
	private readonly logger: Logger;
	private readonly metrics: PublisherMetrics;
	private readonly lock = new Mutex();
	private readonly buffer: FrameBuffer<ValueList>;
	private readonly connection: ConnectionManager<H>;

	private shutDown = false;
	private recordsWritten = 0;
	private writeFailures = 0;
	private batchesPublished = 0;
	private batchesDropped = 0;

	constructor(settings: EndpointSettings, deps: EndpointDeps<H>) {
		this.name = settings.name;
		this.settings = settings;
		this.metrics = deps.metrics ?? new PublisherMetrics();

		const context: EndpointContext = {
			endpoint: settings.name,
			host: settings.host,
			port: settings.port,
			topic: settings.topic,
		};
		this.logger = deps.logger.child({ component: 'Endpoint', ...context });

		const serializer = deps.serializer ?? new JsonValueListSerializer({ storeRates: settings.storeRates });
		this.buffer = new FrameBuffer(settings.bufferSize, serializer);
		this.buffer.reset();

		this.connection = new ConnectionManager(
			{
				endpoint: settings.name,
				host: settings.host,
				port: settings.port,
				clientId: settings.clientId,
				keepaliveSeconds: settings.keepaliveSeconds,
				protocolVersion: settings.protocolVersion,
				topic: settings.topic,
				qos: settings.qos,
				...(settings.tls && { tls: settings.tls }),
			},
			deps.transport,
			this.logger,
			this.metrics,
		);
	}

	/**
	 * Create an endpoint, reporting a buffer that cannot be allocated as a resource error.
	 */
	static create<H>(settings: EndpointSettings, deps: EndpointDeps<H>): Result<Endpoint<H>, PublisherError> {
		try {
			return ok(new Endpoint(settings, deps));
		} catch (error) {
			return err(PublisherErrors.resource(settings.name, toError(error).message));
		}
	}

	/**
	 * Name under which the host knows this endpoint's write and flush callbacks
	 */
	get callbackName(): string {
		return `mqtt/${this.name}`;
	}

	/**
	 * Serialize one record into the current batch.
	 */
	async write(record: ValueList): Promise<Result<void, PublisherError>> {
		return this.lock.runExclusive(async () => {
			const result = await this.writeLocked(record);
			if (result.isErr()) {
				this.writeFailures++;
				this.metrics.writeFailures.inc({ endpoint: this.name, reason: result.error.type });
			}
			return result;
		});
	}

	/**
	 * Publish the current batch if it is older than timeoutMs and holds records.
	 * A timeout of zero or less flushes regardless of age.
	 */
	async flush(timeoutMs: number): Promise<Result<void, PublisherError>> {
		return this.lock.runExclusive(async () => {
			const ready = await this.initialize();
			if (ready.isErr()) {
				return ready;
			}
			return this.flushLocked(timeoutMs);
		});
	}

	/**
	 * Flush what is buffered once, then release the connection. Errors of the
	 * final flush are logged and otherwise ignored. Callers must stop writing first.
	 */
	async shutdown(): Promise<void> {
		await this.lock.runExclusive(async () => {
			if (this.shutDown) {
				return;
			}
			this.shutDown = true;

			if (this.connection.hasHandle) {
				const flushed = await this.flushLocked(0);
				if (flushed.isErr()) {
					this.logger.warn(
						{ error: describePublisherError(flushed.error) },
						'Final flush failed during shutdown',
					);
				}
			}

			await this.connection.close();
			this.metrics.bufferFillBytes.remove({ endpoint: this.name });
			this.logger.info('Endpoint shut down');
		});
	}

	getStats(): EndpointStats {
		return {
			...this.connection.getStats(),
			name: this.name,
			recordsWritten: this.recordsWritten,
			writeFailures: this.writeFailures,
			batchesPublished: this.batchesPublished,
			batchesDropped: this.batchesDropped,
			bufferFill: this.buffer.fill,
			bufferCapacity: this.buffer.capacity,
			batchOpenedAt: new Date(this.buffer.batchOpenedAt),
			shutDown: this.shutDown,
		};
	}

	private async writeLocked(record: ValueList): Promise<Result<void, PublisherError>> {
		const ready = await this.initialize();
		if (ready.isErr()) {
			return ready;
		}

		let appended = this.buffer.append(record);
		if (appended.isErr()) {
			const flushed = await this.flushLocked(0);
			if (flushed.isErr()) {
				this.buffer.reset();
				return flushed;
			}

			appended = this.buffer.append(record);
			if (appended.isErr()) {
				return err(
					PublisherErrors.overflow(this.name, appended.error.recordBytes, this.buffer.capacity),
				);
			}
		}

		this.recordsWritten++;
		this.metrics.recordsWritten.inc({ endpoint: this.name });
		this.metrics.bufferFillBytes.set({ endpoint: this.name }, this.buffer.fill);
		this.logger.debug(
			{
				fill: this.buffer.fill,
				capacity: this.buffer.capacity,
				percent: Math.round((1000 * this.buffer.fill) / this.buffer.capacity) / 10,
			},
			'Record buffered',
		);

		return ok(undefined);
	}

	private async flushLocked(timeoutMs: number): Promise<Result<void, PublisherError>> {
		this.logger.debug({ timeoutMs, fill: this.buffer.fill }, 'Flush requested');

		if (!this.buffer.isDue(timeoutMs)) {
			return ok(undefined);
		}

		if (this.buffer.isEffectivelyEmpty()) {
			this.buffer.touch();
			return ok(undefined);
		}

		const finalized = this.buffer.finalize();
		if (finalized.isErr()) {
			this.batchesDropped++;
			this.metrics.batchesDropped.inc({ endpoint: this.name, reason: 'framing' });
			this.logger.error({ reason: finalized.error }, 'Finalizing batch failed, batch dropped');
			return err(PublisherErrors.framing(this.name, finalized.error));
		}

		const payload = finalized.value;
		const stopTimer = this.metrics.publishDuration.startTimer({ endpoint: this.name });
		const published = await this.connection
			.ensureConnected()
			.andThen(() => this.connection.publish(payload));
		stopTimer();

		// The batch is consumed whatever the outcome.
		this.buffer.reset();
		this.metrics.bufferFillBytes.set({ endpoint: this.name }, this.buffer.fill);

		if (published.isErr()) {
			this.batchesDropped++;
			this.metrics.batchesDropped.inc({ endpoint: this.name, reason: published.error.type });
			return published;
		}

		this.batchesPublished++;
		this.metrics.batchesPublished.inc({ endpoint: this.name });
		this.metrics.bytesPublished.inc({ endpoint: this.name }, payload.length);
		return published;
	}

	/**
	 * First use connects and opens a fresh batch. Once a transport handle
	 * exists, later reconnects happen on flush.
	 */
	private async initialize(): Promise<Result<void, PublisherError>> {
		if (this.shutDown) {
			return err(PublisherErrors.initialization(this.name, new Error('Endpoint is shut down')));
		}
		if (this.connection.hasHandle) {
			return ok(undefined);
		}

		const connected = await this.connection.ensureConnected();
		if (connected.isErr()) {
			return err(PublisherErrors.initialization(this.name, connected.error));
		}

		this.buffer.reset();
		this.logger.info({ clientId: this.settings.clientId }, 'Endpoint connected');
		return ok(undefined);
	}
}
