import Fastify, { type FastifyInstance } from 'fastify';
import type { Logger } from '@mqtt-writer/logging';
import type { EndpointStats, PublisherMetrics } from '@mqtt-writer/publisher-core';
import { endpointRoutes } from './routes/endpoints.js';
import { metricsRoutes } from './routes/metrics.js';

/**
 * What the monitoring routes read: the shared metrics and per-endpoint stats.
 * An EndpointRegistry satisfies it.
 */
export interface MonitoringSource {
	readonly metrics: PublisherMetrics;
	getStats(): EndpointStats[];
}

/**
 * Options handed to every monitoring route plugin
 */
export interface MonitoringRouteOptions {
	source: MonitoringSource;
}

/**
 * Create the monitoring HTTP app
 */
export async function createMonitoringApp(source: MonitoringSource, logger: Logger): Promise<FastifyInstance> {
	const log = logger.child({ component: 'MonitoringServer' });
	const app = Fastify({ logger: false });

	app.addHook('onResponse', async (request, reply) => {
		log.debug(
			{
				method: request.method,
				path: request.url,
				status: reply.statusCode,
				duration: Math.round(reply.elapsedTime),
			},
			'Request completed',
		);
	});

	await app.register(metricsRoutes, { prefix: '/metrics', source });
	await app.register(endpointRoutes, { prefix: '/monitoring/endpoints', source });

	return app;
}
