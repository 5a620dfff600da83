import { err, ok, type Result } from 'neverthrow';
import { RateCache } from './rate-cache.js';
import type { AppendOverflow, FrameRegion, RecordSerializer } from './serializer.js';
import type { ValueList } from './value-list.js';

const OPEN = '[';
const CLOSE = ']';
const SEPARATOR = ',';

/**
 * Options for the JSON value list serializer
 */
export interface JsonValueListOptions {
	/** Emit counter, derive and absolute sources as per-second rates */
	storeRates?: boolean;
}

/**
 * Render a number the way JSON consumers expect; NaN and infinities become null.
 */
function formatNumber(value: number): string {
	return Number.isFinite(value) ? String(value) : 'null';
}

/**
 * Encode one value list as a JSON object.
 *
 * @param values - Values to emit in place of vl.values (rates when storing rates)
 */
export function encodeValueList(vl: ValueList, values: readonly number[] = vl.values): string {
	const parts = [
		`"values":[${values.map(formatNumber).join(',')}]`,
		`"dstypes":[${vl.dsTypes.map((t) => JSON.stringify(t)).join(',')}]`,
		`"dsnames":[${vl.dsNames.map((n) => JSON.stringify(n)).join(',')}]`,
		`"time":${vl.time.toFixed(3)}`,
		`"interval":${vl.interval.toFixed(3)}`,
		`"host":${JSON.stringify(vl.host)}`,
		`"plugin":${JSON.stringify(vl.plugin)}`,
		`"plugin_instance":${JSON.stringify(vl.pluginInstance)}`,
		`"type":${JSON.stringify(vl.type)}`,
		`"type_instance":${JSON.stringify(vl.typeInstance)}`,
	];

	if (vl.meta && Object.keys(vl.meta).length > 0) {
		parts.push(`"meta":${JSON.stringify(vl.meta)}`);
	}

	return `{${parts.join(',')}}`;
}

/**
 * Frames value lists as a JSON array: `[` + records separated by `,` + `]`.
 *
 * One byte of every frame is reserved for the closing bracket, so a record is
 * accepted only if the frame can still be closed after it.
 */
export class JsonValueListSerializer implements RecordSerializer<ValueList> {
	readonly emptyFrameSize = OPEN.length + CLOSE.length;

	private readonly storeRates: boolean;
	private readonly rateCache = new RateCache();

	constructor(options: JsonValueListOptions = {}) {
		this.storeRates = options.storeRates ?? false;
	}

	initialize(frame: FrameRegion): void {
		this.write(frame, OPEN);
	}

	append(frame: FrameRegion, record: ValueList): Result<void, AppendOverflow> {
		const values = this.storeRates ? this.rateCache.rates(record) : record.values;
		const encoded = encodeValueList(record, values);
		const recordBytes = Buffer.byteLength(encoded, 'utf8');

		const prefix = frame.fill > OPEN.length ? SEPARATOR : '';
		const needed = prefix.length + recordBytes + CLOSE.length;
		if (needed > frame.free) {
			return err({ type: 'overflow', recordBytes });
		}

		this.write(frame, prefix + encoded);
		if (this.storeRates) {
			this.rateCache.commit(record);
		}
		return ok(undefined);
	}

	finalize(frame: FrameRegion): Result<void, string> {
		if (frame.fill < OPEN.length || frame.data[0] !== OPEN.charCodeAt(0)) {
			return err('frame was not initialized');
		}
		if (frame.free < CLOSE.length) {
			return err('no space left for the closing marker');
		}

		this.write(frame, CLOSE);
		return ok(undefined);
	}

	private write(frame: FrameRegion, text: string): void {
		const written = frame.data.write(text, frame.fill, 'utf8');
		frame.fill += written;
		frame.free -= written;
	}
}
