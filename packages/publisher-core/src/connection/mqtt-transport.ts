import { readFile } from 'node:fs/promises';
import { connect, type IClientOptions, type MqttClient } from 'mqtt';
import type { Logger } from '@mqtt-writer/logging';
import type {
	QualityOfService,
	TlsSettings,
	TransportClient,
	TransportConnectOptions,
} from './transport.js';

/**
 * How long MQTT.js waits for CONNACK before giving up on a connect or reconnect
 */
const CONNECT_TIMEOUT_MS = 30_000;

/**
 * MQTT transport on MQTT.js.
 *
 * Automatic reconnection is switched off (reconnectPeriod 0): the connection
 * manager decides when to reconnect. Socket I/O runs on the event loop, so
 * connect doubles as "start the I/O loop" and destroy as "stop it".
 */
export class MqttTransport implements TransportClient<MqttClient> {
	private readonly logger: Logger;

	constructor(logger: Logger) {
		this.logger = logger.child({ component: 'MqttTransport' });
	}

	async connect(options: TransportConnectOptions): Promise<MqttClient> {
		const clientOptions: IClientOptions = {
			host: options.host,
			port: options.port,
			protocol: options.tls ? 'mqtts' : 'mqtt',
			clientId: options.clientId,
			keepalive: options.keepaliveSeconds,
			protocolVersion: options.protocolVersion,
			clean: true,
			reconnectPeriod: 0,
			connectTimeout: CONNECT_TIMEOUT_MS,
		};

		if (options.tls) {
			Object.assign(clientOptions, await this.loadTls(options.tls));
		}

		const client = connect(clientOptions);
		this.observe(client, options);

		try {
			await waitForSession(client);
		} catch (error) {
			await client.endAsync(true);
			throw error;
		}

		return client;
	}

	async reconnect(client: MqttClient): Promise<void> {
		if (client.connected) {
			return;
		}
		const session = waitForSession(client);
		client.reconnect();
		await session;
	}

	async publish(
		client: MqttClient,
		topic: string,
		payload: Buffer,
		qos: QualityOfService,
		retain: boolean,
	): Promise<void> {
		if (!client.connected) {
			throw new Error('MQTT client is not connected');
		}

		if (qos === 0) {
			await client.publishAsync(topic, payload, { qos, retain });
			return;
		}

		// QoS 1: hand off to the outgoing store; the PUBACK is not waited for.
		client.publish(topic, payload, { qos, retain }, (error) => {
			if (error) {
				this.logger.warn({ err: error, topic }, 'Queued publish failed after hand-off');
			}
		});
	}

	async disconnect(client: MqttClient): Promise<void> {
		await client.endAsync(true);
	}

	async destroy(client: MqttClient): Promise<void> {
		await client.endAsync(true);
		client.removeAllListeners();
	}

	private async loadTls(tls: TlsSettings): Promise<Partial<IClientOptions>> {
		const [ca, key, cert] = await Promise.all([
			readFile(tls.caPath),
			tls.clientKeyPath ? readFile(tls.clientKeyPath) : Promise.resolve(undefined),
			tls.clientCertPath ? readFile(tls.clientCertPath) : Promise.resolve(undefined),
		]);

		return {
			ca,
			...(key && { key }),
			...(cert && { cert }),
			rejectUnauthorized: !tls.insecure,
		};
	}

	/**
	 * Attach the listeners every client needs. MQTT.js emits 'error' events and an
	 * EventEmitter without an error listener throws; failures are surfaced through
	 * the awaited operations, so the events are only traced here.
	 */
	private observe(client: MqttClient, options: TransportConnectOptions): void {
		const broker = `${options.host}:${options.port}`;

		client.on('error', (error) => {
			this.logger.debug({ err: error, broker }, 'MQTT client error');
		});
		client.on('close', () => {
			this.logger.debug({ broker }, 'MQTT connection closed');
		});
	}
}

/**
 * Resolve on the next CONNACK; reject on the first error or close before it.
 */
function waitForSession(client: MqttClient): Promise<void> {
	return new Promise<void>((resolve, reject) => {
		const cleanup = () => {
			client.off('connect', onConnect);
			client.off('error', onError);
			client.off('close', onClose);
		};
		const onConnect = () => {
			cleanup();
			resolve();
		};
		const onError = (error: Error) => {
			cleanup();
			reject(error);
		};
		const onClose = () => {
			cleanup();
			reject(new Error('Connection closed before the session was established'));
		};

		client.on('connect', onConnect);
		client.on('error', onError);
		client.on('close', onClose);
	});
}
