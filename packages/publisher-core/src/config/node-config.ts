import { hostname } from 'node:os';
import { err, ok, type Result } from 'neverthrow';
import { configSectionSchema, z } from '@mqtt-writer/config';
import { MAX_BUFFER_SIZE, MIN_BUFFER_SIZE } from '../buffer/frame-buffer.js';
import { PublisherErrors, type PublisherError } from '../errors.js';
import type { EndpointSettings } from '../publisher/settings.js';

export const DEFAULT_PORT = 8883;
export const DEFAULT_TOPIC = 'collectd';
export const DEFAULT_KEEPALIVE_SECONDS = 60;

/**
 * Node settings while keys are being applied; TLS is assembled at the end.
 */
interface NodeDraft {
	host?: string;
	port: number;
	clientId: string;
	caPath?: string;
	clientKeyPath?: string;
	clientCertPath?: string;
	insecure: boolean;
	qos: 0 | 1;
	topic: string;
	storeRates: boolean;
	bufferSize: number;
	protocolVersion: 3 | 4 | 5;
	keepaliveSeconds: number;
}

const TRUE_WORDS = ['true', 'yes', 'on'];
const FALSE_WORDS = ['false', 'no', 'off'];

const stringValue = z.string().min(1, 'must not be empty');

const booleanValue = z.union([
	z.boolean(),
	z
		.string()
		.transform((v) => v.toLowerCase())
		.refine((v) => TRUE_WORDS.includes(v) || FALSE_WORDS.includes(v), 'must be a boolean')
		.transform((v) => TRUE_WORDS.includes(v)),
]);

/** Integers may be written as numbers or numeric strings. */
const integerValue = z.union([
	z.number(),
	z
		.string()
		.regex(/^-?\d+$/, 'must be an integer')
		.transform((v) => Number.parseInt(v, 10)),
]);

const portValue = integerValue.pipe(z.number().int().min(1).max(65535));
const qosValue = integerValue.pipe(z.union([z.literal(0), z.literal(1)]));
const bufferSizeValue = integerValue.pipe(z.number().int().min(MIN_BUFFER_SIZE).max(MAX_BUFFER_SIZE));
const protocolVersionValue = integerValue.pipe(z.union([z.literal(3), z.literal(4), z.literal(5)]));
const keepaliveValue = integerValue.pipe(z.number().int().min(1).max(65535));

/**
 * Binds a schema to the draft field it sets
 */
interface KeyHandler {
	key: string;
	apply(draft: NodeDraft, value: unknown): Result<void, string>;
}

function handler<T>(key: string, schema: z.ZodType<T>, set: (draft: NodeDraft, value: T) => void): KeyHandler {
	return {
		key,
		apply(draft, value) {
			const parsed = schema.safeParse(value);
			if (!parsed.success) {
				return err(parsed.error.issues.map((issue) => issue.message).join(', '));
			}
			set(draft, parsed.data);
			return ok(undefined);
		},
	};
}

/**
 * Recognised keys of a Node block. Lookup ignores case.
 */
const KEY_TABLE: readonly KeyHandler[] = [
	handler('Host', stringValue, (d, v) => {
		d.host = v;
	}),
	handler('Port', portValue, (d, v) => {
		d.port = v;
	}),
	handler('ClientId', stringValue, (d, v) => {
		d.clientId = v;
	}),
	handler('CAPath', stringValue, (d, v) => {
		d.caPath = v;
	}),
	handler('ClientKey', stringValue, (d, v) => {
		d.clientKeyPath = v;
	}),
	handler('ClientCert', stringValue, (d, v) => {
		d.clientCertPath = v;
	}),
	handler('Insecure', booleanValue, (d, v) => {
		d.insecure = v;
	}),
	handler('QoS', qosValue, (d, v) => {
		d.qos = v;
	}),
	handler('Topic', stringValue, (d, v) => {
		d.topic = v;
	}),
	handler('StoreRates', booleanValue, (d, v) => {
		d.storeRates = v;
	}),
	handler('BufferSize', bufferSizeValue, (d, v) => {
		d.bufferSize = v;
	}),
	handler('ProtocolVersion', protocolVersionValue, (d, v) => {
		d.protocolVersion = v;
	}),
	handler('Keepalive', keepaliveValue, (d, v) => {
		d.keepaliveSeconds = v;
	}),
];

const KEYS_BY_NAME = new Map(KEY_TABLE.map((entry) => [entry.key.toLowerCase(), entry]));

/**
 * Names of all recognised keys, in table order
 */
export const NODE_CONFIG_KEYS: readonly string[] = KEY_TABLE.map((entry) => entry.key);

/**
 * Resolve one Node block into endpoint settings.
 *
 * A block that is not an object, the first unknown key or invalid value,
 * or a missing Host rejects the whole node.
 *
 * @param defaultClientId - Used when the block has no ClientId; the local hostname by default
 */
export function parseNodeConfig(
	name: string,
	block: unknown,
	defaultClientId: string = hostname(),
): Result<EndpointSettings, PublisherError> {
	const entries = configSectionSchema.safeParse(block);
	if (!entries.success) {
		return err(PublisherErrors.configuration(name, 'expected a block of key/value settings'));
	}

	const draft: NodeDraft = {
		port: DEFAULT_PORT,
		clientId: defaultClientId,
		insecure: false,
		qos: 0,
		topic: DEFAULT_TOPIC,
		storeRates: false,
		bufferSize: MAX_BUFFER_SIZE,
		protocolVersion: 4,
		keepaliveSeconds: DEFAULT_KEEPALIVE_SECONDS,
	};

	for (const [key, value] of Object.entries(entries.data)) {
		const entry = KEYS_BY_NAME.get(key.toLowerCase());
		if (!entry) {
			return err(PublisherErrors.configuration(name, `unknown option "${key}"`));
		}
		const applied = entry.apply(draft, value);
		if (applied.isErr()) {
			return err(PublisherErrors.configuration(name, `invalid ${entry.key}: ${applied.error}`));
		}
	}

	if (draft.host === undefined) {
		return err(PublisherErrors.configuration(name, 'no Host defined'));
	}

	return ok({
		name,
		host: draft.host,
		port: draft.port,
		clientId: draft.clientId,
		topic: draft.topic,
		qos: draft.qos,
		bufferSize: draft.bufferSize,
		storeRates: draft.storeRates,
		protocolVersion: draft.protocolVersion,
		keepaliveSeconds: draft.keepaliveSeconds,
		...(draft.caPath !== undefined && {
			tls: {
				caPath: draft.caPath,
				insecure: draft.insecure,
				...(draft.clientKeyPath !== undefined && { clientKeyPath: draft.clientKeyPath }),
				...(draft.clientCertPath !== undefined && { clientCertPath: draft.clientCertPath }),
			},
		}),
	});
}
