import type { Logger } from 'pino';

/**
 * Complaint throttle - logs a failure condition once and stays quiet while it persists.
 *
 * State machine: INACTIVE -> ACTIVE on the first report, ACTIVE -> INACTIVE on clear.
 * Repeated reports while ACTIVE are counted but not logged; the single recovery
 * line emitted by clear() carries that count.
 *
 * One instance tracks one condition. Owners that watch several conditions keep
 * one throttle each.
 */
export class ComplaintThrottle {
	private readonly logger: Logger;
	private readonly condition: string;

	private active = false;
	private suppressed = 0;
	private activeSince: Date | null = null;

	constructor(logger: Logger, condition: string) {
		this.logger = logger;
		this.condition = condition;
	}

	/**
	 * Whether the condition is currently being complained about.
	 */
	get isActive(): boolean {
		return this.active;
	}

	/**
	 * Reports suppressed since the condition became active.
	 */
	get suppressedCount(): number {
		return this.suppressed;
	}

	/**
	 * Report the condition. Logs at error level only on the INACTIVE -> ACTIVE edge.
	 *
	 * @returns true when a line was logged
	 */
	report(message: string, context: Record<string, unknown> = {}): boolean {
		if (this.active) {
			this.suppressed++;
			return false;
		}

		this.active = true;
		this.suppressed = 0;
		this.activeSince = new Date();
		this.logger.error({ ...context, condition: this.condition }, message);
		return true;
	}

	/**
	 * Clear the condition. Logs one info line on the ACTIVE -> INACTIVE edge.
	 *
	 * @returns true when a line was logged
	 */
	clear(message: string, context: Record<string, unknown> = {}): boolean {
		if (!this.active) {
			return false;
		}

		const activeForMs = this.activeSince ? Date.now() - this.activeSince.getTime() : 0;
		this.logger.info(
			{
				...context,
				condition: this.condition,
				suppressedReports: this.suppressed,
				activeForMs,
			},
			message,
		);

		this.active = false;
		this.suppressed = 0;
		this.activeSince = null;
		return true;
	}
}
