import type {
	QualityOfService,
	TransportClient,
	TransportConnectOptions,
} from '../../connection/transport.js';

/**
 * Handle issued by the fake transport
 */
export interface FakeSession {
	id: number;
	options: TransportConnectOptions;
	connected: boolean;
	destroyed: boolean;
}

export interface PublishedMessage {
	topic: string;
	payload: string;
	qos: QualityOfService;
	retain: boolean;
}

/**
 * In-process broker stand-in. Failures are scripted per call kind; every call
 * is recorded.
 */
export class FakeTransport implements TransportClient<FakeSession> {
	readonly published: PublishedMessage[] = [];
	readonly calls: string[] = [];
	readonly sessions: FakeSession[] = [];

	/** Failures consumed one per call, in order */
	readonly failures: { connect: Error[]; reconnect: Error[]; publish: Error[] } = {
		connect: [],
		reconnect: [],
		publish: [],
	};

	/** When set, publish waits for it before completing */
	publishGate: Promise<void> | null = null;

	async connect(options: TransportConnectOptions): Promise<FakeSession> {
		this.calls.push('connect');
		const failure = this.failures.connect.shift();
		if (failure) {
			throw failure;
		}
		const session: FakeSession = { id: this.sessions.length + 1, options, connected: true, destroyed: false };
		this.sessions.push(session);
		return session;
	}

	async reconnect(session: FakeSession): Promise<void> {
		this.calls.push('reconnect');
		const failure = this.failures.reconnect.shift();
		if (failure) {
			throw failure;
		}
		session.connected = true;
	}

	async publish(
		session: FakeSession,
		topic: string,
		payload: Buffer,
		qos: QualityOfService,
		retain: boolean,
	): Promise<void> {
		this.calls.push('publish');
		if (this.publishGate) {
			await this.publishGate;
		}
		const failure = this.failures.publish.shift();
		if (failure) {
			throw failure;
		}
		if (!session.connected) {
			throw new Error('session is not connected');
		}
		this.published.push({ topic, payload: payload.toString('utf8'), qos, retain });
	}

	async disconnect(session: FakeSession): Promise<void> {
		this.calls.push('disconnect');
		session.connected = false;
	}

	async destroy(session: FakeSession): Promise<void> {
		this.calls.push('destroy');
		session.connected = false;
		session.destroyed = true;
	}

	failNextConnects(count: number, message = 'connection refused'): void {
		for (let i = 0; i < count; i++) {
			this.failures.connect.push(new Error(message));
		}
	}

	failNextReconnects(count: number, message = 'connection refused'): void {
		for (let i = 0; i < count; i++) {
			this.failures.reconnect.push(new Error(message));
		}
	}

	failNextPublishes(count: number, message = 'broken pipe'): void {
		for (let i = 0; i < count; i++) {
			this.failures.publish.push(new Error(message));
		}
	}

	/** Published payloads parsed as JSON arrays */
	batches(): unknown[][] {
		return this.published.map((message) => {
			const parsed: unknown = JSON.parse(message.payload);
			return Array.isArray(parsed) ? parsed : [];
		});
	}
}
