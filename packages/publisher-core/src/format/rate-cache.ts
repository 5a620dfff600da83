import { DataSourceType, valueListIdentifier, type ValueList } from './value-list.js';

const COUNTER32_MAX = 4294967295;
/** 2^64, exact as a double */
const COUNTER64_WRAP = 2 ** 64;

interface Sample {
	value: number;
	time: number;
}

/**
 * Previous samples per series and data source, used to turn counter, derive
 * and absolute values into per-second rates.
 *
 * rates() only reads; commit() records the samples once they have actually
 * been written, so a value list that overflowed and is retried computes the
 * same rates the second time.
 */
export class RateCache {
	private readonly samples = new Map<string, Sample[]>();

	/**
	 * Per-second rates for every data source of the value list.
	 * Gauges pass through; the first sample of a non-gauge series is NaN.
	 */
	rates(vl: ValueList): number[] {
		const previous = this.samples.get(valueListIdentifier(vl));

		return vl.values.map((value, index) => {
			const dsType = vl.dsTypes[index] ?? DataSourceType.GAUGE;
			if (dsType === DataSourceType.GAUGE) {
				return value;
			}

			const last = previous?.[index];
			if (!last) {
				return Number.NaN;
			}

			const elapsed = vl.time - last.time;
			if (elapsed <= 0) {
				return Number.NaN;
			}

			switch (dsType) {
				case DataSourceType.COUNTER:
					return counterDelta(last.value, value) / elapsed;
				case DataSourceType.DERIVE:
					return (value - last.value) / elapsed;
				case DataSourceType.ABSOLUTE:
					return value / elapsed;
			}
		});
	}

	/**
	 * Remember the value list's samples as the new baseline.
	 */
	commit(vl: ValueList): void {
		this.samples.set(
			valueListIdentifier(vl),
			vl.values.map((value) => ({ value, time: vl.time })),
		);
	}

	get size(): number {
		return this.samples.size;
	}
}

/**
 * Difference between two counter readings, accounting for a 32 or 64 bit wrap.
 *
 * Readings arrive as doubles, so 64 bit counters above 2^53 are already
 * rounded to the nearest representable value. `COUNTER64_WRAP - previous` is
 * exact for readings of 2^63 and up, so the delta of a wrap near the top of
 * the range is exact while it stays below 2^53; larger deltas carry the
 * double's rounding.
 */
function counterDelta(previous: number, current: number): number {
	if (current >= previous) {
		return current - previous;
	}
	if (previous <= COUNTER32_MAX) {
		return COUNTER32_MAX - previous + current + 1;
	}
	return COUNTER64_WRAP - previous + current;
}
