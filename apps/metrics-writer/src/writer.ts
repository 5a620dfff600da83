import { errAsync, okAsync, type ResultAsync } from 'neverthrow';
import { loadConfigTree, type ConfigTree, type ConfigTreeError } from '@mqtt-writer/config';
import type { Logger } from '@mqtt-writer/logging';
import {
	EndpointRegistry,
	describePublisherError,
	type EndpointOutcome,
	type PublisherError,
	type PublisherMetrics,
	type TransportClient,
	type ValueList,
} from '@mqtt-writer/publisher-core';
import { FlushScheduler } from './flush-scheduler.js';

/**
 * Where the configuration tree comes from
 */
export type ConfigSource = { path: string } | { tree: ConfigTree };

/**
 * Writer options
 */
export interface WriterConfig<H> {
	config: ConfigSource;
	transport: TransportClient<H>;
	logger: Logger;
	flushIntervalMs: number;
	flushTimeoutMs: number;
	metrics?: PublisherMetrics;
	/** Client id of nodes without ClientId; the local hostname when omitted */
	defaultClientId?: string;
}

/**
 * Errors that abort startup
 */
export type WriterStartError =
	| { type: 'config'; error: ConfigTreeError }
	| { type: 'no_endpoints'; rejected: PublisherError[] };

/**
 * Render a startup error as one line.
 */
export function describeStartError(error: WriterStartError): string {
	switch (error.type) {
		case 'config':
			return error.error.type === 'unreadable'
				? `cannot read ${error.error.path}: ${error.error.cause.message}`
				: `malformed configuration in ${error.error.path}: ${error.error.message}`;
		case 'no_endpoints':
			return error.rejected.length > 0
				? `no endpoint could be configured: ${error.rejected.map(describePublisherError).join('; ')}`
				: 'no Node block configured';
	}
}

/** Write failures that nothing else reports */
const UNREPORTED: ReadonlySet<PublisherError['type']> = new Set(['overflow', 'framing', 'resource']);

/**
 * Running writer: endpoints plus the flush timer.
 */
export class MetricsWriter<H> {
	readonly registry: EndpointRegistry<H>;

	private readonly scheduler: FlushScheduler;
	private readonly logger: Logger;
	private readonly pending = new Set<Promise<EndpointOutcome[]>>();
	private stopping: Promise<void> | null = null;

	constructor(registry: EndpointRegistry<H>, scheduler: FlushScheduler, logger: Logger) {
		this.registry = registry;
		this.scheduler = scheduler;
		this.logger = logger.child({ component: 'MetricsWriter' });
	}

	get isStopping(): boolean {
		return this.stopping !== null;
	}

	/**
	 * Hand a record to every endpoint. Ignored once stop() was called.
	 */
	async write(record: ValueList): Promise<EndpointOutcome[]> {
		if (this.stopping) {
			this.logger.debug('Writer stopping, record dropped');
			return [];
		}

		const writing = this.registry.write(record);
		this.pending.add(writing);
		try {
			const outcomes = await writing;
			for (const { endpoint, result } of outcomes) {
				if (result.isErr() && UNREPORTED.has(result.error.type)) {
					this.logger.warn({ endpoint, error: describePublisherError(result.error) }, 'Record not written');
				}
			}
			return outcomes;
		} finally {
			this.pending.delete(writing);
		}
	}

	/**
	 * Flush every endpoint; a timeout of 0 publishes whatever is buffered.
	 */
	async flush(timeoutMs = 0): Promise<EndpointOutcome[]> {
		return this.registry.flush(timeoutMs);
	}

	/**
	 * Stop the timer, wait for writes in flight, then shut the endpoints down.
	 * Repeated calls share the first call's promise.
	 */
	stop(): Promise<void> {
		if (!this.stopping) {
			this.stopping = this.shutdown();
		}
		return this.stopping;
	}

	private async shutdown(): Promise<void> {
		this.logger.info({ pendingWrites: this.pending.size }, 'Stopping metrics writer');
		await this.scheduler.stop();
		await Promise.allSettled([...this.pending]);
		await this.registry.shutdown();
		this.logger.info({ endpoints: this.registry.getStats() }, 'Metrics writer stopped');
	}
}

function resolveTree(source: ConfigSource): ResultAsync<ConfigTree, WriterStartError> {
	if ('tree' in source) {
		return okAsync(source.tree);
	}
	return loadConfigTree(source.path).mapErr((error): WriterStartError => ({ type: 'config', error }));
}

/**
 * Load the configuration, register the endpoints and start the flush timer.
 */
export function startWriter<H>(config: WriterConfig<H>): ResultAsync<MetricsWriter<H>, WriterStartError> {
	const logger = config.logger;

	return resolveTree(config.config).andThen((tree) => {
		const { registry, errors } = EndpointRegistry.fromConfig(tree, {
			transport: config.transport,
			logger,
			...(config.metrics && { metrics: config.metrics }),
			...(config.defaultClientId !== undefined && { defaultClientId: config.defaultClientId }),
		});

		if (registry.size === 0) {
			return errAsync<MetricsWriter<H>, WriterStartError>({ type: 'no_endpoints', rejected: errors });
		}

		registry.init();

		const scheduler = new FlushScheduler(registry, logger, {
			intervalMs: config.flushIntervalMs,
			timeoutMs: config.flushTimeoutMs,
		});
		scheduler.start();

		logger.info(
			{ endpoints: registry.names, rejected: errors.length, flushIntervalMs: config.flushIntervalMs },
			'Metrics writer started',
		);
		return okAsync<MetricsWriter<H>, WriterStartError>(new MetricsWriter(registry, scheduler, logger));
	});
}
