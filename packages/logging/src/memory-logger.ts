import pino, { type Logger } from 'pino';

/**
 * One parsed log line captured by a memory logger.
 */
export interface CapturedLogLine {
	level: string;
	msg: string;
	[key: string]: unknown;
}

/**
 * Logger that keeps every line in memory instead of writing to stdout.
 * Used by tests that assert on what was (or was not) logged.
 */
export interface MemoryLogger {
	logger: Logger;
	lines: CapturedLogLine[];
	/** Lines at the given level, optionally narrowed to one message */
	at(level: string, msg?: string): CapturedLogLine[];
	clear(): void;
}

export function createMemoryLogger(level: pino.LevelWithSilent = 'trace'): MemoryLogger {
	const lines: CapturedLogLine[] = [];

	const logger = pino(
		{
			level,
			base: undefined,
			timestamp: false,
			formatters: {
				level: (label) => ({ level: label }),
			},
		},
		{
			write(line: string) {
				const parsed: unknown = JSON.parse(line);
				if (isCapturedLine(parsed)) {
					lines.push(parsed);
				}
			},
		},
	);

	return {
		logger,
		lines,
		at(atLevel: string, msg?: string) {
			return lines.filter((l) => l.level === atLevel && (msg === undefined || l.msg === msg));
		},
		clear() {
			lines.length = 0;
		},
	};
}

function isCapturedLine(value: unknown): value is CapturedLogLine {
	return (
		typeof value === 'object' &&
		value !== null &&
		'level' in value &&
		typeof value.level === 'string' &&
		'msg' in value &&
		typeof value.msg === 'string'
	);
}
