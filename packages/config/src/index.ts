import 'dotenv/config';
import { z } from 'zod/v4';

export { z } from 'zod/v4';
export {
	configSectionSchema,
	loadConfigTree,
	parseConfigTree,
	type ConfigSection,
	type ConfigTree,
	type ConfigTreeError,
} from './config-tree.js';

/**
 * Parse environment variables with Zod schema validation.
 * Throws a descriptive error if validation fails.
 */
export function parseEnv<T extends z.ZodRawShape>(
	schema: z.ZodObject<T>,
	env: Record<string, string | undefined> = process.env,
): z.infer<z.ZodObject<T>> {
	const result = schema.safeParse(env);

	if (!result.success) {
		throw new Error(`Environment validation failed:\n${formatIssues(result.error)}`);
	}

	return result.data;
}

/**
 * Render zod issues as indented "path: message" lines.
 */
export function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => {
			const path = issue.path.map(String).join('.');
			return path ? `  ${path}: ${issue.message}` : `  ${issue.message}`;
		})
		.join('\n');
}

/**
 * Common environment variable schemas for reuse.
 *
 * Note: In zod v4, .default() on a transformed schema expects the OUTPUT type.
 * Use .prefault() to provide an INPUT default (applied before parsing).
 */
export const CommonEnvSchemas = {
	/** Log level enum */
	logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

	/** Node environment */
	nodeEnv: z.enum(['development', 'production', 'test']).default('development'),

	/** Boolean from string */
	boolean: z
		.string()
		.transform((v) => v === 'true' || v === '1')
		.prefault('false'),

	/** Positive integer from string */
	positiveInt: z
		.string()
		.transform((v) => Number.parseInt(v, 10))
		.pipe(z.number().int().positive()),

	/** Duration in milliseconds from string */
	durationMs: z
		.string()
		.transform((v) => Number.parseInt(v, 10))
		.pipe(z.number().int().min(0)),
};
