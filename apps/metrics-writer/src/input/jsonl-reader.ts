import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { err, ok, type Result } from 'neverthrow';
import { formatIssues } from '@mqtt-writer/config';
import type { Logger } from '@mqtt-writer/logging';
import { valueListSchema, type ValueList } from '@mqtt-writer/publisher-core';

/**
 * Counts of one read pass
 */
export interface ReadSummary {
	accepted: number;
	rejected: number;
}

/**
 * Parse one JSON line into a value list.
 */
export function parseRecordLine(line: string): Result<ValueList, string> {
	let raw: unknown;
	try {
		raw = JSON.parse(line);
	} catch (error) {
		return err(error instanceof Error ? error.message : String(error));
	}

	const parsed = valueListSchema.safeParse(raw);
	if (!parsed.success) {
		return err(formatIssues(parsed.error).trim());
	}
	return ok(parsed.data);
}

/**
 * Read value lists from a stream of JSON lines until it ends or the signal
 * aborts. Blank lines are ignored; invalid lines are logged and skipped.
 * Each record is handed to onRecord, which is awaited before the next line.
 */
export async function readRecords(
	input: Readable,
	onRecord: (record: ValueList) => Promise<void>,
	logger: Logger,
	signal?: AbortSignal,
): Promise<ReadSummary> {
	const log = logger.child({ component: 'JsonlReader' });
	const lines = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY });
	const summary: ReadSummary = { accepted: 0, rejected: 0 };

	const stop = () => lines.close();
	signal?.addEventListener('abort', stop, { once: true });

	try {
		let lineNumber = 0;
		for await (const line of lines) {
			lineNumber++;
			if (line.trim() === '') {
				continue;
			}

			const parsed = parseRecordLine(line);
			if (parsed.isErr()) {
				summary.rejected++;
				log.warn({ line: lineNumber, reason: parsed.error }, 'Skipping invalid record line');
				continue;
			}

			summary.accepted++;
			await onRecord(parsed.value);
		}
	} finally {
		signal?.removeEventListener('abort', stop);
		lines.close();
	}

	return summary;
}
