import { describe, it, expect } from 'vitest';
import { NODE_CONFIG_KEYS, parseNodeConfig } from '../config/node-config.js';

describe('parseNodeConfig', () => {
	it('should apply defaults to a block with only a Host', () => {
		const result = parseNodeConfig('primary', { Host: 'broker.test' }, 'collector-1');

		expect(result._unsafeUnwrap()).toEqual({
			name: 'primary',
			host: 'broker.test',
			port: 8883,
			clientId: 'collector-1',
			topic: 'collectd',
			qos: 0,
			bufferSize: 131072,
			storeRates: false,
			protocolVersion: 4,
			keepaliveSeconds: 60,
		});
	});

	it('should match keys without regard to case', () => {
		const result = parseNodeConfig('primary', {
			host: 'broker.test',
			PORT: 1883,
			topic: 'metrics/raw',
			qos: 1,
			storerates: 'yes',
			buffersize: '4096',
		});

		expect(result._unsafeUnwrap()).toMatchObject({
			host: 'broker.test',
			port: 1883,
			topic: 'metrics/raw',
			qos: 1,
			storeRates: true,
			bufferSize: 4096,
		});
	});

	it('should enable TLS when a CA file is configured', () => {
		const result = parseNodeConfig('secure', {
			Host: 'broker.test',
			CAPath: '/etc/ssl/ca.pem',
			ClientCert: '/etc/ssl/client.pem',
			Insecure: true,
		});

		expect(result._unsafeUnwrap().tls).toEqual({
			caPath: '/etc/ssl/ca.pem',
			clientCertPath: '/etc/ssl/client.pem',
			insecure: true,
		});
	});

	it('should leave TLS off without a CA file', () => {
		const result = parseNodeConfig('plain', { Host: 'broker.test', ClientKey: '/etc/ssl/key.pem' });

		expect(result._unsafeUnwrap().tls).toBeUndefined();
	});

	it('should reject a block without Host', () => {
		const result = parseNodeConfig('primary', { Port: 1883 });

		expect(result._unsafeUnwrapErr()).toEqual({
			type: 'configuration',
			endpoint: 'primary',
			message: 'no Host defined',
		});
	});

	it('should reject unknown keys', () => {
		const result = parseNodeConfig('primary', { Host: 'broker.test', Retain: true });

		expect(result._unsafeUnwrapErr()).toEqual({
			type: 'configuration',
			endpoint: 'primary',
			message: 'unknown option "Retain"',
		});
	});

	it.each([
		['QoS', 2],
		['qos', -1],
		['BufferSize', 1023],
		['BufferSize', 131073],
		['Port', 0],
		['Port', 'mqtt'],
		['ProtocolVersion', 6],
		['Insecure', 'maybe'],
		['Topic', ''],
		['Keepalive', 0],
		['Port', null],
		['Host', ['a', 'b']],
	])('should reject %s = %j', (key, value) => {
		const result = parseNodeConfig('primary', { Host: 'broker.test', [key]: value });

		expect(result._unsafeUnwrapErr()).toMatchObject({ type: 'configuration', endpoint: 'primary' });
	});

	it('should name the canonical key in value errors', () => {
		const result = parseNodeConfig('primary', { Host: 'broker.test', buffersize: 512 });

		expect(result._unsafeUnwrapErr()).toMatchObject({
			message: expect.stringMatching(/^invalid BufferSize: /),
		});
	});

	it('should reject a block that is not an object', () => {
		const result = parseNodeConfig('primary', 'broker.test');

		expect(result._unsafeUnwrapErr()).toEqual({
			type: 'configuration',
			endpoint: 'primary',
			message: 'expected a block of key/value settings',
		});
	});

	it('should reject a keepalive of zero by name', () => {
		const result = parseNodeConfig('primary', { Host: 'broker.test', Keepalive: 0 });

		expect(result._unsafeUnwrapErr()).toMatchObject({
			message: expect.stringMatching(/^invalid Keepalive: /),
		});
	});

	it('should accept a keepalive of one second', () => {
		expect(parseNodeConfig('primary', { Host: 'h', Keepalive: 1 })._unsafeUnwrap().keepaliveSeconds).toBe(1);
	});

	it('should accept the buffer size bounds', () => {
		expect(parseNodeConfig('a', { Host: 'h', BufferSize: 1024 }).isOk()).toBe(true);
		expect(parseNodeConfig('b', { Host: 'h', BufferSize: 131072 }).isOk()).toBe(true);
	});

	it('should list every recognised key', () => {
		expect(NODE_CONFIG_KEYS).toEqual([
			'Host',
			'Port',
			'ClientId',
			'CAPath',
			'ClientKey',
			'ClientCert',
			'Insecure',
			'QoS',
			'Topic',
			'StoreRates',
			'BufferSize',
			'ProtocolVersion',
			'Keepalive',
		]);
	});
});
