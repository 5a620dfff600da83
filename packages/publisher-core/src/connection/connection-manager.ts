import { err, errAsync, okAsync, ResultAsync, type Result } from 'neverthrow';
import { ComplaintThrottle, type Logger } from '@mqtt-writer/logging';
import { PublisherErrors, toError, type PublisherError } from '../errors.js';
import type { PublisherMetrics } from '../metrics.js';
import type {
	QualityOfService,
	TransportClient,
	TransportConnectOptions,
} from './transport.js';

/**
 * Connection settings of one endpoint
 */
export interface ConnectionSettings extends TransportConnectOptions {
	/** Endpoint name, used for logs, metrics and error values */
	endpoint: string;
	topic: string;
	qos: QualityOfService;
}

/**
 * Connection statistics
 */
export interface ConnectionStats {
	connectAttempts: number;
	connectFailures: number;
	publishAttempts: number;
	publishFailures: number;
	connected: boolean;
	lastConnectedAt: Date | null;
}

/**
 * Owns one endpoint's transport handle and its optimistic "connected" flag.
 *
 * Not synchronized: the endpoint calls it with its lock held.
 *
 * - ensureConnected(): connect lazily, or reconnect the existing handle, once per call.
 *   There is no backoff; every call while disconnected is one attempt.
 * - publish(): send one payload. Any failure marks the connection down and issues a
 *   best-effort disconnect, whatever the cause, so the next call reconnects.
 * - close(): release the handle. Idempotent.
 *
 * Connect failures and publish failures each have their own complaint throttle: the
 * first failure logs an error, repeats are suppressed, and the first success after
 * them logs one recovery line.
 */
export class ConnectionManager<H> {
	private readonly settings: ConnectionSettings;
	private readonly transport: TransportClient<H>;
	private readonly logger: Logger;
	private readonly metrics: PublisherMetrics | null;
	private readonly connectComplaint: ComplaintThrottle;
	private readonly publishComplaint: ComplaintThrottle;

	private handle: H | null = null;
	private connected = false;

	private connectAttempts = 0;
	private connectFailures = 0;
	private publishAttempts = 0;
	private publishFailures = 0;
	private lastConnectedAt: Date | null = null;

	constructor(
		settings: ConnectionSettings,
		transport: TransportClient<H>,
		logger: Logger,
		metrics: PublisherMetrics | null = null,
	) {
		this.settings = settings;
		this.transport = transport;
		this.metrics = metrics;
		this.logger = logger.child({ component: 'ConnectionManager' });
		this.connectComplaint = new ComplaintThrottle(this.logger, 'cannot-connect');
		this.publishComplaint = new ComplaintThrottle(this.logger, 'cannot-publish');
	}

	/**
	 * Optimistic: true after a successful connect until the next failed publish.
	 */
	get isConnected(): boolean {
		return this.connected;
	}

	get hasHandle(): boolean {
		return this.handle !== null;
	}

	get broker(): string {
		return `${this.settings.host}:${this.settings.port}`;
	}

	/**
	 * Make sure a session is believed to be up, connecting or reconnecting once if not.
	 */
	ensureConnected(): ResultAsync<void, PublisherError> {
		if (this.connected) {
			return okAsync(undefined);
		}

		this.connectAttempts++;
		this.metrics?.connectAttempts.inc({ endpoint: this.settings.endpoint });

		const existing = this.handle;
		const attempt =
			existing === null
				? this.transport.connect(this.settings).then((handle) => {
						this.handle = handle;
					})
				: this.transport.reconnect(existing);

		return ResultAsync.fromPromise(attempt, (error) => toError(error))
			.map(() => {
				this.connected = true;
				this.lastConnectedAt = new Date();
				this.logger.debug(
					{ broker: this.broker, reconnect: existing !== null },
					'Connected to broker',
				);
				this.connectComplaint.clear(`Successfully reconnected to broker "${this.broker}"`, {
					endpoint: this.settings.endpoint,
				});
			})
			.mapErr((cause) => {
				this.connectFailures++;
				this.metrics?.connectFailures.inc({ endpoint: this.settings.endpoint });
				this.connectComplaint.report(
					existing === null ? 'Connecting to broker failed' : 'Reconnecting to broker failed',
					{ err: cause, endpoint: this.settings.endpoint, broker: this.broker },
				);
				return PublisherErrors.connection(this.settings.endpoint, this.broker, cause);
			});
	}

	/**
	 * Publish one payload on the configured topic and QoS, retain off.
	 * Callers must have called ensureConnected() first.
	 */
	publish(payload: Buffer): ResultAsync<void, PublisherError> {
		const handle = this.handle;
		if (!this.connected || handle === null) {
			return errAsync(
				PublisherErrors.publish(
					this.settings.endpoint,
					this.settings.topic,
					new Error('Not connected to broker'),
				),
			);
		}

		this.publishAttempts++;

		return ResultAsync.fromPromise(
			this.transport.publish(handle, this.settings.topic, payload, this.settings.qos, false),
			(error) => toError(error),
		)
			.map(() => {
				this.publishComplaint.clear(`Publishing to broker "${this.broker}" recovered`, {
					endpoint: this.settings.endpoint,
				});
			})
			.orElse((cause) => this.handlePublishFailure(handle, cause));
	}

	/**
	 * Disconnect if connected, stop I/O and release the handle.
	 */
	async close(): Promise<void> {
		const handle = this.handle;
		if (handle === null) {
			return;
		}

		if (this.connected) {
			this.connected = false;
			await this.bestEffort('disconnect', () => this.transport.disconnect(handle));
		}

		await this.bestEffort('destroy', () => this.transport.destroy(handle));
		this.handle = null;
	}

	getStats(): ConnectionStats {
		return {
			connectAttempts: this.connectAttempts,
			connectFailures: this.connectFailures,
			publishAttempts: this.publishAttempts,
			publishFailures: this.publishFailures,
			connected: this.connected,
			lastConnectedAt: this.lastConnectedAt,
		};
	}

	/**
	 * Marks the connection down whatever the error; the next ensureConnected() reconnects.
	 */
	private handlePublishFailure(handle: H, cause: Error): ResultAsync<void, PublisherError> {
		this.publishFailures++;
		this.metrics?.publishFailures.inc({ endpoint: this.settings.endpoint });
		this.connected = false;

		this.publishComplaint.report('Publishing to broker failed', {
			err: cause,
			endpoint: this.settings.endpoint,
			broker: this.broker,
			topic: this.settings.topic,
		});

		return new ResultAsync(
			this.bestEffort('disconnect', () => this.transport.disconnect(handle)).then(
				(): Result<void, PublisherError> =>
					err(PublisherErrors.publish(this.settings.endpoint, this.settings.topic, cause)),
			),
		);
	}

	private async bestEffort(operation: string, fn: () => Promise<void>): Promise<void> {
		try {
			await fn();
		} catch (error) {
			this.logger.debug({ err: error, broker: this.broker, operation }, 'Transport cleanup failed');
		}
	}
}
