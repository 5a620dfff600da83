import type { ValueList } from '../../format/value-list.js';

/**
 * Build a single-gauge value list, overriding any field.
 */
export function makeValueList(overrides: Partial<ValueList> = {}): ValueList {
	return {
		host: 'web01',
		plugin: 'cpu',
		pluginInstance: '0',
		type: 'percent',
		typeInstance: 'idle',
		time: 1700000000,
		interval: 10,
		values: [97.5],
		dsTypes: ['gauge'],
		dsNames: ['value'],
		...overrides,
	};
}

/**
 * Encoded form of makeValueList() with no overrides.
 */
export const DEFAULT_RECORD_JSON =
	'{"values":[97.5],"dstypes":["gauge"],"dsnames":["value"],"time":1700000000.000,"interval":10.000,' +
	'"host":"web01","plugin":"cpu","plugin_instance":"0","type":"percent","type_instance":"idle"}';
