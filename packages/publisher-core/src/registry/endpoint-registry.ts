import { err, ok, type Result } from 'neverthrow';
import { configSectionSchema, type ConfigTree } from '@mqtt-writer/config';
import type { Logger } from '@mqtt-writer/logging';
import { parseNodeConfig } from '../config/node-config.js';
import type { TransportClient } from '../connection/transport.js';
import { PublisherErrors, describePublisherError, type PublisherError } from '../errors.js';
import type { ValueList } from '../format/value-list.js';
import { PublisherMetrics } from '../metrics.js';
import { Endpoint, type EndpointStats } from '../publisher/endpoint.js';

/** Configuration section holding one block per endpoint */
export const NODE_SECTION = 'Node';

/**
 * Write and flush entry points of one endpoint, as handed to the host
 */
export interface EndpointCapability {
	name: string;
	write(record: ValueList): Promise<Result<void, PublisherError>>;
	flush(timeoutMs: number): Promise<Result<void, PublisherError>>;
}

/**
 * Registry dependencies
 */
export interface RegistryDeps<H> {
	transport: TransportClient<H>;
	logger: Logger;
	metrics?: PublisherMetrics;
	/** Client id of nodes without ClientId; the local hostname when omitted */
	defaultClientId?: string;
}

/**
 * Outcome of one endpoint's write or flush
 */
export interface EndpointOutcome {
	endpoint: string;
	result: Result<void, PublisherError>;
}

/**
 * All configured endpoints of the process.
 *
 * Endpoints are independent: write() and flush() run them concurrently and a
 * stalled broker only holds up its own endpoint.
 */
export class EndpointRegistry<H> {
	readonly metrics: PublisherMetrics;

	private readonly endpoints = new Map<string, Endpoint<H>>();
	private readonly logger: Logger;

	constructor(logger: Logger, metrics: PublisherMetrics = new PublisherMetrics()) {
		this.logger = logger.child({ component: 'EndpointRegistry' });
		this.metrics = metrics;
	}

	/**
	 * Build a registry from a configuration tree.
	 *
	 * A section or node that fails to configure is logged, reported in
	 * `errors` and left out; the remaining nodes are registered.
	 */
	static fromConfig<H>(
		tree: ConfigTree,
		deps: RegistryDeps<H>,
	): { registry: EndpointRegistry<H>; errors: PublisherError[] } {
		const registry = new EndpointRegistry<H>(deps.logger, deps.metrics);
		const errors: PublisherError[] = [];

		const reject = (error: PublisherError) => {
			registry.logger.error({ error: describePublisherError(error) }, 'Endpoint not registered');
			errors.push(error);
		};

		for (const [section, value] of Object.entries(tree)) {
			if (section.toLowerCase() !== NODE_SECTION.toLowerCase()) {
				reject(PublisherErrors.configuration(section, `unknown option "${section}"`));
				continue;
			}

			const blocks = configSectionSchema.safeParse(value);
			if (!blocks.success) {
				reject(PublisherErrors.configuration(section, 'expected named Node blocks'));
				continue;
			}

			for (const [name, block] of Object.entries(blocks.data)) {
				const created = parseNodeConfig(name, block, deps.defaultClientId).andThen((settings) =>
					Endpoint.create(settings, {
						transport: deps.transport,
						logger: deps.logger,
						metrics: registry.metrics,
					}),
				);
				if (created.isErr()) {
					reject(created.error);
					continue;
				}
				const added = registry.add(created.value);
				if (added.isErr()) {
					reject(added.error);
				}
			}
		}

		return { registry, errors };
	}

	/**
	 * Register an endpoint under its name. Names are unique.
	 */
	add(endpoint: Endpoint<H>): Result<void, PublisherError> {
		if (this.endpoints.has(endpoint.name)) {
			return err(
				PublisherErrors.configuration(endpoint.name, `endpoint "${endpoint.name}" is already registered`),
			);
		}
		this.endpoints.set(endpoint.name, endpoint);
		this.logger.debug({ endpoint: endpoint.name, callback: endpoint.callbackName }, 'Endpoint registered');
		return ok(undefined);
	}

	get size(): number {
		return this.endpoints.size;
	}

	get names(): string[] {
		return [...this.endpoints.keys()];
	}

	/**
	 * Process-wide transport setup. MQTT.js keeps no global state, so this
	 * only announces what is registered.
	 */
	init(): void {
		this.logger.info({ endpoints: this.names }, 'Endpoints initialized');
	}

	capabilities(): EndpointCapability[] {
		return [...this.endpoints.values()].map((endpoint) => ({
			name: endpoint.callbackName,
			write: (record) => endpoint.write(record),
			flush: (timeoutMs) => endpoint.flush(timeoutMs),
		}));
	}

	/**
	 * Hand one record to every endpoint.
	 */
	async write(record: ValueList): Promise<EndpointOutcome[]> {
		return Promise.all(
			[...this.endpoints.values()].map(async (endpoint) => ({
				endpoint: endpoint.name,
				result: await endpoint.write(record),
			})),
		);
	}

	/**
	 * Flush the named endpoint, or all of them. An unknown name yields no outcome.
	 */
	async flush(timeoutMs: number, name?: string): Promise<EndpointOutcome[]> {
		const targets =
			name === undefined
				? [...this.endpoints.values()]
				: [this.endpoints.get(name)].filter((endpoint): endpoint is Endpoint<H> => endpoint !== undefined);

		return Promise.all(
			targets.map(async (endpoint) => ({
				endpoint: endpoint.name,
				result: await endpoint.flush(timeoutMs),
			})),
		);
	}

	getStats(): EndpointStats[] {
		return [...this.endpoints.values()].map((endpoint) => endpoint.getStats());
	}

	/**
	 * Shut every endpoint down. Producers must have stopped writing.
	 */
	async shutdown(): Promise<void> {
		await Promise.all([...this.endpoints.values()].map((endpoint) => endpoint.shutdown()));
		this.logger.info({ endpoints: this.names }, 'Endpoints shut down');
	}
}
