import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createMemoryLogger, type MemoryLogger } from '@mqtt-writer/logging';
import { MqttTransport } from '../connection/mqtt-transport.js';
import type { TransportConnectOptions } from '../connection/transport.js';

const broker = vi.hoisted(() => {
	const options: unknown[] = [];
	const published: Array<{ topic: string; payload: string; qos: unknown; retain: unknown }> = [];
	const behaviour: { refuse: boolean; lateError: Error | null } = { refuse: false, lateError: null };
	let ended = 0;
	return {
		options,
		published,
		behaviour,
		get ended() {
			return ended;
		},
		end() {
			ended++;
		},
		reset() {
			options.length = 0;
			published.length = 0;
			behaviour.refuse = false;
			behaviour.lateError = null;
			ended = 0;
		},
	};
});

vi.mock('mqtt', async () => {
	const { EventEmitter } = await import('node:events');

	class FakeMqttClient extends EventEmitter {
		connected = false;

		constructor(options: unknown) {
			super();
			broker.options.push(options);
			this.settle();
		}

		reconnect(): this {
			this.settle();
			return this;
		}

		async publishAsync(topic: string, payload: Buffer, opts: { qos: unknown; retain: unknown }): Promise<void> {
			broker.published.push({ topic, payload: payload.toString(), qos: opts.qos, retain: opts.retain });
		}

		publish(
			topic: string,
			payload: Buffer,
			opts: { qos: unknown; retain: unknown },
			callback: (error?: Error) => void,
		): this {
			broker.published.push({ topic, payload: payload.toString(), qos: opts.qos, retain: opts.retain });
			setImmediate(() => callback(broker.behaviour.lateError ?? undefined));
			return this;
		}

		async endAsync(): Promise<void> {
			this.connected = false;
			broker.end();
		}

		private settle(): void {
			setImmediate(() => {
				if (broker.behaviour.refuse) {
					this.emit('error', new Error('Connection refused: Not authorized'));
					this.emit('close');
					return;
				}
				this.connected = true;
				this.emit('connect');
			});
		}
	}

	return { connect: (options: unknown) => new FakeMqttClient(options) };
});

const connectOptions: TransportConnectOptions = {
	host: 'broker.test',
	port: 1883,
	clientId: 'writer-test',
	keepaliveSeconds: 30,
	protocolVersion: 5,
};

describe('MqttTransport', () => {
	let log: MemoryLogger;
	let transport: MqttTransport;

	beforeEach(() => {
		broker.reset();
		log = createMemoryLogger();
		transport = new MqttTransport(log.logger);
	});

	describe('connect', () => {
		it('should open a clean session without automatic reconnects', async () => {
			const client = await transport.connect(connectOptions);

			expect(client.connected).toBe(true);
			expect(broker.options[0]).toEqual({
				host: 'broker.test',
				port: 1883,
				protocol: 'mqtt',
				clientId: 'writer-test',
				keepalive: 30,
				protocolVersion: 5,
				clean: true,
				reconnectPeriod: 0,
				connectTimeout: 30_000,
			});
		});

		it('should end the client and reject when the broker refuses', async () => {
			broker.behaviour.refuse = true;

			await expect(transport.connect(connectOptions)).rejects.toThrow('Connection refused: Not authorized');
			expect(broker.ended).toBe(1);
		});

		describe('with TLS', () => {
			let dir: string;

			beforeEach(async () => {
				dir = await mkdtemp(join(tmpdir(), 'mqtt-transport-'));
				await writeFile(join(dir, 'ca.pem'), 'test-ca');
				await writeFile(join(dir, 'client.key'), 'test-key');
			});

			afterEach(async () => {
				await rm(dir, { recursive: true, force: true });
			});

			it('should load the configured files and switch to mqtts', async () => {
				await transport.connect({
					...connectOptions,
					tls: { caPath: join(dir, 'ca.pem'), clientKeyPath: join(dir, 'client.key'), insecure: true },
				});

				expect(broker.options[0]).toMatchObject({
					protocol: 'mqtts',
					ca: Buffer.from('test-ca'),
					key: Buffer.from('test-key'),
					rejectUnauthorized: false,
				});
				expect(broker.options[0]).not.toHaveProperty('cert');
			});

			it('should fail when a file cannot be read', async () => {
				await expect(
					transport.connect({ ...connectOptions, tls: { caPath: join(dir, 'missing.pem'), insecure: false } }),
				).rejects.toThrow(/ENOENT/);
				expect(broker.options).toHaveLength(0);
			});
		});
	});

	describe('publish', () => {
		it('should wait for the socket write at QoS 0', async () => {
			const client = await transport.connect(connectOptions);

			await transport.publish(client, 'metrics/test', Buffer.from('[1]'), 0, false);

			expect(broker.published).toEqual([{ topic: 'metrics/test', payload: '[1]', qos: 0, retain: false }]);
		});

		it('should hand off QoS 1 and log a late failure', async () => {
			const client = await transport.connect(connectOptions);
			broker.behaviour.lateError = new Error('outgoing store full');

			await transport.publish(client, 'metrics/test', Buffer.from('[2]'), 1, false);
			await new Promise((resolve) => setImmediate(resolve));

			expect(broker.published).toEqual([{ topic: 'metrics/test', payload: '[2]', qos: 1, retain: false }]);
			expect(log.at('warn', 'Queued publish failed after hand-off')).toHaveLength(1);
		});

		it('should reject while disconnected', async () => {
			const client = await transport.connect(connectOptions);
			await transport.disconnect(client);

			await expect(transport.publish(client, 'metrics/test', Buffer.from('[]'), 0, false)).rejects.toThrow(
				'MQTT client is not connected',
			);
		});
	});

	describe('reconnect', () => {
		it('should re-establish the session of a disconnected client', async () => {
			const client = await transport.connect(connectOptions);
			await transport.disconnect(client);

			await transport.reconnect(client);

			expect(client.connected).toBe(true);
			expect(broker.options).toHaveLength(1);
		});

		it('should reject when the broker refuses the new session', async () => {
			const client = await transport.connect(connectOptions);
			await transport.disconnect(client);
			broker.behaviour.refuse = true;

			await expect(transport.reconnect(client)).rejects.toThrow('Connection refused: Not authorized');
			expect(client.connected).toBe(false);
		});
	});

	it('should end the client on destroy', async () => {
		const client = await transport.connect(connectOptions);

		await transport.destroy(client);

		expect(client.connected).toBe(false);
		expect(broker.ended).toBe(1);
	});
});
