import { CommonEnvSchemas, parseEnv, z } from '@mqtt-writer/config';

/**
 * Metrics writer environment configuration
 */
export const envSchema = z.object({
	NODE_ENV: CommonEnvSchemas.nodeEnv,

	// Logging
	LOG_LEVEL: CommonEnvSchemas.logLevel,

	// Instance identification
	INSTANCE_ID: z.string().default(() => `mqtt-writer-${Date.now()}`),

	/**
	 * Path of the JSON configuration tree holding the Node blocks.
	 * Default: ./mqtt-writer.json
	 */
	MQTT_WRITER_CONFIG: z.string().min(1).default('./mqtt-writer.json'),

	/**
	 * How often the flush timer fires, in milliseconds.
	 * Default: 10000 (10 seconds)
	 */
	FLUSH_INTERVAL_MS: CommonEnvSchemas.positiveInt.prefault('10000'),

	/**
	 * Minimum batch age before a timed flush publishes it, in milliseconds.
	 * 0 publishes on every tick.
	 * Default: 10000 (10 seconds)
	 */
	FLUSH_TIMEOUT_MS: CommonEnvSchemas.durationMs.prefault('10000'),

	// Monitoring server (/metrics, /monitoring/endpoints)
	MONITORING_ENABLED: CommonEnvSchemas.boolean.prefault('true'),
	MONITORING_PORT: CommonEnvSchemas.positiveInt.prefault('9464'),
	MONITORING_HOST: z.string().default('0.0.0.0'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse the process environment; throws on invalid values.
 */
export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
	return parseEnv(envSchema, source);
}
