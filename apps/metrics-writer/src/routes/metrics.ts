import type { FastifyPluginAsync } from 'fastify';
import type { MonitoringRouteOptions } from '../app.js';

export const metricsRoutes: FastifyPluginAsync<MonitoringRouteOptions> = async (fastify, { source }) => {
	fastify.get('/', async (_request, reply) => {
		const body = await source.metrics.getMetrics();
		return reply.type(source.metrics.getContentType()).send(body);
	});
};
