import { ok, type Result } from 'neverthrow';
import type { Logger } from '@mqtt-writer/logging';
import { describePublisherError, type EndpointOutcome } from '@mqtt-writer/publisher-core';

/**
 * Flush scheduler configuration
 */
export interface FlushSchedulerConfig {
	/** How often to trigger a flush */
	intervalMs: number;
	/** Minimum batch age passed to each flush */
	timeoutMs: number;
}

/**
 * Anything that can flush its endpoints
 */
export interface Flushable {
	flush(timeoutMs: number): Promise<EndpointOutcome[]>;
}

/**
 * Periodic flush trigger.
 *
 * Ticks that fire while the previous flush is still running are skipped.
 * Failures are already reported by the endpoints and only traced here.
 */
export class FlushScheduler {
	private readonly config: FlushSchedulerConfig;
	private readonly target: Flushable;
	private readonly logger: Logger;

	private intervalHandle: NodeJS.Timeout | null = null;
	private inFlight: Promise<void> | null = null;
	private running = false;
	private skippedTicks = 0;

	constructor(target: Flushable, logger: Logger, config: FlushSchedulerConfig) {
		this.target = target;
		this.config = config;
		this.logger = logger.child({ component: 'FlushScheduler' });
	}

	get isRunning(): boolean {
		return this.running;
	}

	get skipped(): number {
		return this.skippedTicks;
	}

	/**
	 * Start the timer
	 */
	start(): Result<void, never> {
		if (this.running) {
			this.logger.warn('Flush scheduler already running');
			return ok(undefined);
		}

		this.running = true;
		this.logger.info(
			{ intervalMs: this.config.intervalMs, timeoutMs: this.config.timeoutMs },
			'Starting flush scheduler',
		);
		this.intervalHandle = setInterval(() => this.runScheduledFlush(), this.config.intervalMs);

		return ok(undefined);
	}

	/**
	 * Stop the timer and wait for a flush in progress.
	 */
	async stop(): Promise<void> {
		this.running = false;
		if (this.intervalHandle) {
			clearInterval(this.intervalHandle);
			this.intervalHandle = null;
		}
		if (this.inFlight) {
			await this.inFlight;
		}
	}

	private runScheduledFlush(): void {
		if (!this.running) return;

		if (this.inFlight) {
			this.skippedTicks++;
			this.logger.debug('Previous flush still running, tick skipped');
			return;
		}

		this.inFlight = this.flushOnce().finally(() => {
			this.inFlight = null;
		});
	}

	private async flushOnce(): Promise<void> {
		let outcomes: EndpointOutcome[];
		try {
			outcomes = await this.target.flush(this.config.timeoutMs);
		} catch (error) {
			this.logger.error({ err: error }, 'Timed flush threw');
			return;
		}

		for (const { endpoint, result } of outcomes) {
			if (result.isErr()) {
				this.logger.debug({ endpoint, error: describePublisherError(result.error) }, 'Timed flush failed');
			}
		}
	}
}
