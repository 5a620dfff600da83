/**
 * Transport abstraction for delivering batches to a publish/subscribe broker.
 *
 * The connection manager only talks to this interface; the MQTT adapter and
 * test doubles implement it.
 */

/** Delivery quality requested per publish: 0 best-effort, 1 at-least-once */
export type QualityOfService = 0 | 1;

/** MQTT protocol levels: 3 = 3.1, 4 = 3.1.1, 5 = 5.0 */
export type ProtocolVersion = 3 | 4 | 5;

/**
 * TLS material, as file paths
 */
export interface TlsSettings {
	caPath: string;
	clientKeyPath?: string;
	clientCertPath?: string;
	/** Skip broker hostname verification */
	insecure: boolean;
}

/**
 * Everything needed to open a broker session
 */
export interface TransportConnectOptions {
	host: string;
	port: number;
	clientId: string;
	keepaliveSeconds: number;
	protocolVersion: ProtocolVersion;
	tls?: TlsSettings;
}

/** Transport interface for pushing payloads to a broker. */
export interface TransportClient<H> {
	/** Opens a new session and starts its I/O. Rejects if the broker cannot be reached. */
	connect(options: TransportConnectOptions): Promise<H>;
	/** Re-opens the session of an existing handle. */
	reconnect(handle: H): Promise<void>;
	/** Sends one payload. Does not wait for broker acknowledgment. */
	publish(handle: H, topic: string, payload: Buffer, qos: QualityOfService, retain: boolean): Promise<void>;
	/** Closes the session; the handle stays usable for reconnect. */
	disconnect(handle: H): Promise<void>;
	/** Stops I/O and releases the handle for good. */
	destroy(handle: H): Promise<void>;
}
