import type { Result } from 'neverthrow';

/**
 * Writable view of a frame buffer handed to a serializer.
 *
 * `fill` bytes at the start of `data` are in use; `free` bytes follow.
 * A serializer advances both when it writes.
 */
export interface FrameRegion {
	readonly data: Buffer;
	fill: number;
	free: number;
}

/**
 * Returned by append when the encoded record does not fit the free region.
 */
export interface AppendOverflow {
	type: 'overflow';
	recordBytes: number;
}

/**
 * Encodes records into a frame: opening marker, records, closing marker.
 *
 * append must be check-then-write: on overflow the region (and any state the
 * serializer keeps) is exactly as it was before the call.
 */
export interface RecordSerializer<R> {
	/** Fill count at or below which a frame holds no records */
	readonly emptyFrameSize: number;

	/** Write the opening marker into a freshly zeroed region */
	initialize(frame: FrameRegion): void;

	/** Encode one record after the existing content */
	append(frame: FrameRegion, record: R): Result<void, AppendOverflow>;

	/** Write the closing marker */
	finalize(frame: FrameRegion): Result<void, string>;
}
