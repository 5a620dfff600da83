import { createLogger, type Logger } from '@mqtt-writer/logging';
import { MqttTransport } from '@mqtt-writer/publisher-core';
import type { FastifyInstance } from 'fastify';
import type { MqttClient } from 'mqtt';
import { createMonitoringApp } from './app.js';
import { loadEnv, type Env } from './env.js';
import { readRecords } from './input/jsonl-reader.js';
import { describeStartError, startWriter, type MetricsWriter } from './writer.js';

export { createMonitoringApp, type MonitoringRouteOptions, type MonitoringSource } from './app.js';
export { loadEnv, envSchema, type Env } from './env.js';
export { parseRecordLine, readRecords, type ReadSummary } from './input/jsonl-reader.js';
export { FlushScheduler, type Flushable, type FlushSchedulerConfig } from './flush-scheduler.js';
export {
	MetricsWriter,
	describeStartError,
	startWriter,
	type ConfigSource,
	type WriterConfig,
	type WriterStartError,
} from './writer.js';

function createAppLogger(env: Env): Logger {
	return createLogger({
		level: env.LOG_LEVEL,
		serviceName: 'mqtt-writer',
		pretty: env.NODE_ENV === 'development',
		base: { instanceId: env.INSTANCE_ID },
	});
}

/**
 * Start the writer against MQTT brokers, configured from the environment,
 * and the monitoring server unless it is disabled.
 */
export async function startFromEnv(
	env: Env = loadEnv(),
): Promise<{ writer: MetricsWriter<MqttClient>; server: FastifyInstance | null; logger: Logger }> {
	const logger = createAppLogger(env);

	const started = await startWriter({
		config: { path: env.MQTT_WRITER_CONFIG },
		transport: new MqttTransport(logger),
		logger,
		flushIntervalMs: env.FLUSH_INTERVAL_MS,
		flushTimeoutMs: env.FLUSH_TIMEOUT_MS,
	});

	if (started.isErr()) {
		throw new Error(describeStartError(started.error));
	}
	const writer = started.value;

	if (!env.MONITORING_ENABLED) {
		return { writer, server: null, logger };
	}

	const server = await createMonitoringApp(writer.registry, logger);
	try {
		await server.listen({ port: env.MONITORING_PORT, host: env.MONITORING_HOST });
	} catch (error) {
		await writer.stop();
		throw error;
	}
	logger.info({ host: env.MONITORING_HOST, port: env.MONITORING_PORT }, 'Monitoring server listening');

	return { writer, server, logger };
}

// Run when executed as main module
const isMainModule =
	typeof process !== 'undefined' &&
	process.argv[1] &&
	(process.argv[1].endsWith('/index.ts') || process.argv[1].endsWith('/index.js'));

if (isMainModule) {
	const { writer, server, logger } = await startFromEnv();
	const input = new AbortController();

	let shuttingDown = false;
	const shutdown = async (reason: string) => {
		if (shuttingDown) return;
		shuttingDown = true;

		logger.info({ reason }, 'Shutting down');

		// Safety timeout so shutdown doesn't hang on an unresponsive broker
		const forceShutdown = setTimeout(() => {
			logger.error('Forced shutdown after timeout');
			process.exit(1);
		}, 30_000);
		forceShutdown.unref();

		// 1. Stop reading input
		input.abort();

		// 2. Stop accepting HTTP requests
		await server?.close();

		// 3. Stop the flush timer, drain writes, final flush and disconnect
		await writer.stop();

		logger.info('Graceful shutdown complete');
		process.exit(0);
	};

	process.on('SIGINT', () => shutdown('SIGINT'));
	process.on('SIGTERM', () => shutdown('SIGTERM'));

	const summary = await readRecords(
		process.stdin,
		async (record) => {
			await writer.write(record);
		},
		logger,
		input.signal,
	);
	logger.info(summary, 'Input finished');
	await shutdown('end of input');
}
