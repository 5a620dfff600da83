import { z } from 'zod/v4';

/**
 * How a data source's raw values are to be interpreted.
 */
export const DataSourceType = {
	GAUGE: 'gauge',
	COUNTER: 'counter',
	DERIVE: 'derive',
	ABSOLUTE: 'absolute',
} as const;

export type DataSourceType = (typeof DataSourceType)[keyof typeof DataSourceType];

/**
 * Metadata attached to a value list
 */
export type ValueListMeta = Record<string, string | number | boolean>;

/**
 * One metric sample set: a value per data source, identified by
 * host/plugin[-instance]/type[-instance].
 */
export interface ValueList {
	host: string;
	plugin: string;
	pluginInstance: string;
	type: string;
	typeInstance: string;
	/** Sample time, seconds since the epoch */
	time: number;
	/** Collection interval in seconds */
	interval: number;
	values: number[];
	dsTypes: DataSourceType[];
	dsNames: string[];
	meta?: ValueListMeta;
}

/**
 * Schema for value lists entering from outside the process (e.g. JSON lines).
 * Values may be null, which is read as NaN.
 */
export const valueListSchema = z
	.object({
		host: z.string().min(1),
		plugin: z.string().min(1),
		pluginInstance: z.string().default(''),
		type: z.string().min(1),
		typeInstance: z.string().default(''),
		time: z.number().nonnegative(),
		interval: z.number().positive(),
		values: z.array(z.number().nullable().transform((v) => v ?? Number.NaN)).min(1),
		dsTypes: z.array(z.enum(['gauge', 'counter', 'derive', 'absolute'])),
		dsNames: z.array(z.string().min(1)),
		meta: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])).optional(),
	})
	.refine((vl) => vl.values.length === vl.dsTypes.length && vl.values.length === vl.dsNames.length, {
		message: 'values, dsTypes and dsNames must have the same length',
		path: ['values'],
	});

/**
 * Identifier of the series a value list belongs to.
 */
export function valueListIdentifier(vl: ValueList): string {
	const plugin = vl.pluginInstance ? `${vl.plugin}-${vl.pluginInstance}` : vl.plugin;
	const type = vl.typeInstance ? `${vl.type}-${vl.typeInstance}` : vl.type;
	return `${vl.host}/${plugin}/${type}`;
}
