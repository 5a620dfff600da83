/**
 * Publisher error types using discriminated unions for neverthrow
 */

/**
 * Every way a write, flush or endpoint setup can fail.
 *
 * - configuration: unknown key, out-of-range value or missing Host
 * - resource: buffer or endpoint could not be allocated
 * - initialization: first-use setup (connect + buffer reset) failed
 * - connection: connect or reconnect failed
 * - publish: the transport rejected a send; the connection is marked down
 * - framing: the serializer could not close the batch; the batch is dropped
 * - overflow: a record does not fit even into an empty buffer
 */
export type PublisherError =
	| { type: 'configuration'; endpoint: string; message: string }
	| { type: 'resource'; endpoint: string; message: string }
	| { type: 'initialization'; endpoint: string; cause: PublisherError | Error }
	| { type: 'connection'; endpoint: string; broker: string; cause: Error }
	| { type: 'publish'; endpoint: string; topic: string; cause: Error }
	| { type: 'framing'; endpoint: string; message: string }
	| { type: 'overflow'; endpoint: string; recordBytes: number; capacity: number };

export type PublisherErrorType = PublisherError['type'];

/**
 * Helper to create publisher errors
 */
export const PublisherErrors = {
	configuration: (endpoint: string, message: string): PublisherError => ({
		type: 'configuration',
		endpoint,
		message,
	}),
	resource: (endpoint: string, message: string): PublisherError => ({
		type: 'resource',
		endpoint,
		message,
	}),
	initialization: (endpoint: string, cause: PublisherError | Error): PublisherError => ({
		type: 'initialization',
		endpoint,
		cause,
	}),
	connection: (endpoint: string, broker: string, cause: Error): PublisherError => ({
		type: 'connection',
		endpoint,
		broker,
		cause,
	}),
	publish: (endpoint: string, topic: string, cause: Error): PublisherError => ({
		type: 'publish',
		endpoint,
		topic,
		cause,
	}),
	framing: (endpoint: string, message: string): PublisherError => ({
		type: 'framing',
		endpoint,
		message,
	}),
	overflow: (endpoint: string, recordBytes: number, capacity: number): PublisherError => ({
		type: 'overflow',
		endpoint,
		recordBytes,
		capacity,
	}),
};

/**
 * Format error message based on error type
 */
export function describePublisherError(error: PublisherError): string {
	switch (error.type) {
		case 'configuration':
			return `${error.endpoint}: invalid configuration: ${error.message}`;
		case 'resource':
			return `${error.endpoint}: resource allocation failed: ${error.message}`;
		case 'initialization': {
			const cause =
				error.cause instanceof Error ? error.cause.message : describePublisherError(error.cause);
			return `${error.endpoint}: initialization failed: ${cause}`;
		}
		case 'connection':
			return `${error.endpoint}: cannot connect to ${error.broker}: ${error.cause.message}`;
		case 'publish':
			return `${error.endpoint}: publish to "${error.topic}" failed: ${error.cause.message}`;
		case 'framing':
			return `${error.endpoint}: cannot finalize batch: ${error.message}`;
		case 'overflow':
			return `${error.endpoint}: record of ${error.recordBytes} bytes does not fit a ${error.capacity} byte buffer`;
	}
}

/**
 * Map a result to the status code convention of host callbacks: 0 on success, -1 on failure.
 */
export function toStatusCode(result: { isOk(): boolean }): number {
	return result.isOk() ? 0 : -1;
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}
