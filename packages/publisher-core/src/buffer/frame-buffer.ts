import { err, ok, type Result } from 'neverthrow';
import type { AppendOverflow, FrameRegion, RecordSerializer } from '../format/serializer.js';

/**
 * Smallest and largest accepted buffer capacities, in bytes
 */
export const MIN_BUFFER_SIZE = 1024;
export const MAX_BUFFER_SIZE = 1024 * 128;

/**
 * Fixed-capacity byte region holding one batch of framed records.
 *
 * The buffer never frames anything itself: opening, appending and closing are
 * delegated to the serializer. After every reset the region holds the
 * serializer's opening marker, so fill is never zero while the buffer is live.
 */
export class FrameBuffer<R> implements FrameRegion {
	readonly data: Buffer;
	fill = 0;
	free: number;

	private readonly serializer: RecordSerializer<R>;
	private openedAt = 0;

	constructor(capacity: number, serializer: RecordSerializer<R>) {
		this.data = Buffer.alloc(capacity);
		this.free = capacity;
		this.serializer = serializer;
	}

	get capacity(): number {
		return this.data.length;
	}

	/**
	 * Time (ms since epoch) the current batch was opened or last touched.
	 */
	get batchOpenedAt(): number {
		return this.openedAt;
	}

	/**
	 * Zero the region, restart the batch clock and write the opening marker.
	 */
	reset(): void {
		this.data.fill(0);
		this.fill = 0;
		this.free = this.data.length;
		this.openedAt = Date.now();
		this.serializer.initialize(this);
	}

	/**
	 * Append one record. On overflow nothing changes.
	 */
	append(record: R): Result<void, AppendOverflow> {
		return this.serializer.append(this, record);
	}

	/**
	 * Close the batch and return a copy of its bytes.
	 *
	 * The copy outlives the next reset, which matters when the transport keeps
	 * the payload queued. A batch that cannot be closed is dropped: the buffer
	 * is reset before the error is returned.
	 */
	finalize(): Result<Buffer, string> {
		const closed = this.serializer.finalize(this);
		if (closed.isErr()) {
			this.reset();
			return err(closed.error);
		}
		return ok(Buffer.from(this.data.subarray(0, this.fill)));
	}

	/**
	 * Whether no record has been appended since the last reset.
	 */
	isEffectivelyEmpty(): boolean {
		return this.fill <= this.serializer.emptyFrameSize;
	}

	/**
	 * Restart the staleness clock without touching the content.
	 */
	touch(): void {
		this.openedAt = Date.now();
	}

	/**
	 * Whether the batch is old enough to flush. A timeout of zero or less is always due.
	 */
	isDue(timeoutMs: number): boolean {
		if (timeoutMs <= 0) {
			return true;
		}
		return Date.now() - this.openedAt >= timeoutMs;
	}
}
