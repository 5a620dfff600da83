import { readFile } from 'node:fs/promises';
import { err, ok, Result, ResultAsync } from 'neverthrow';
import { z } from 'zod/v4';

/**
 * Object of named entries: the blocks of a section, or the keys of a block.
 */
export type ConfigSection = Record<string, unknown>;

/**
 * Parsed configuration file. Top-level keys name sections; a section holds
 * named blocks.
 *
 * ```json
 * { "Node": { "primary": { "Host": "broker.local", "Port": 1883 } } }
 * ```
 *
 * Only the top level is checked here. Sections and blocks are validated by
 * their consumers, so one bad entry does not reject the file.
 */
export type ConfigTree = Record<string, unknown>;

/**
 * Errors raised while reading a configuration tree
 */
export type ConfigTreeError =
	| { type: 'unreadable'; path: string; cause: Error }
	| { type: 'malformed'; path: string; message: string };

/** Plain JSON object with string keys; rejects arrays, null and scalars */
export const configSectionSchema = z.record(z.string(), z.unknown());

/**
 * Parse configuration text into a tree.
 *
 * @param path - Origin of the text, only used in error values
 */
export function parseConfigTree(text: string, path = '<inline>'): Result<ConfigTree, ConfigTreeError> {
	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (error) {
		return err({
			type: 'malformed',
			path,
			message: error instanceof Error ? error.message : String(error),
		});
	}

	const parsed = configSectionSchema.safeParse(raw);
	if (!parsed.success) {
		const message = parsed.error.issues
			.map((issue) => `${issue.path.map(String).join('.') || '<root>'}: ${issue.message}`)
			.join('; ');
		return err({ type: 'malformed', path, message });
	}

	return ok(parsed.data);
}

/**
 * Read and parse a configuration file.
 */
export function loadConfigTree(path: string): ResultAsync<ConfigTree, ConfigTreeError> {
	return ResultAsync.fromPromise(readFile(path, 'utf8'), (error) => ({
		type: 'unreadable' as const,
		path,
		cause: error instanceof Error ? error : new Error(String(error)),
	})).andThen((text) => parseConfigTree(text, path));
}
