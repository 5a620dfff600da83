import type { FastifyPluginAsync } from 'fastify';
import type { MonitoringRouteOptions } from '../app.js';

export const endpointRoutes: FastifyPluginAsync<MonitoringRouteOptions> = async (fastify, { source }) => {
	// GET /monitoring/endpoints
	fastify.get('/', async () => {
		return { endpoints: source.getStats() };
	});

	// GET /monitoring/endpoints/:name
	fastify.get<{ Params: { name: string } }>('/:name', async (request, reply) => {
		const stats = source.getStats().find((entry) => entry.name === request.params.name);
		if (!stats) {
			return reply.code(404).send({ status: 'error', message: `unknown endpoint "${request.params.name}"` });
		}
		return stats;
	});
};
