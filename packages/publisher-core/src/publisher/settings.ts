import type { ProtocolVersion, QualityOfService, TlsSettings } from '../connection/transport.js';

/**
 * Resolved configuration of one endpoint
 */
export interface EndpointSettings {
	/** Node name from the configuration, unique per registry */
	name: string;
	host: string;
	port: number;
	clientId: string;
	topic: string;
	qos: QualityOfService;
	/** Frame buffer capacity in bytes */
	bufferSize: number;
	/** Publish counter, derive and absolute values as per-second rates */
	storeRates: boolean;
	protocolVersion: ProtocolVersion;
	keepaliveSeconds: number;
	/** Present when a CA file is configured */
	tls?: TlsSettings;
}
