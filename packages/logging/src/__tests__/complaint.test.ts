import { describe, it, expect, beforeEach } from 'vitest';
import { ComplaintThrottle } from '../complaint.js';
import { createMemoryLogger, type MemoryLogger } from '../memory-logger.js';

describe('ComplaintThrottle', () => {
	let memory: MemoryLogger;
	let throttle: ComplaintThrottle;

	beforeEach(() => {
		memory = createMemoryLogger();
		throttle = new ComplaintThrottle(memory.logger, 'cannot-publish');
	});

	it('should start inactive', () => {
		expect(throttle.isActive).toBe(false);
		expect(throttle.suppressedCount).toBe(0);
	});

	it('should log the first report at error level', () => {
		const logged = throttle.report('publish failed', { host: 'broker' });

		expect(logged).toBe(true);
		expect(throttle.isActive).toBe(true);
		expect(memory.lines).toHaveLength(1);
		expect(memory.lines[0]).toMatchObject({
			level: 'error',
			msg: 'publish failed',
			host: 'broker',
			condition: 'cannot-publish',
		});
	});

	it('should suppress repeated reports while active', () => {
		for (let i = 0; i < 5; i++) {
			throttle.report('publish failed');
		}

		expect(memory.at('error')).toHaveLength(1);
		expect(throttle.suppressedCount).toBe(4);
	});

	it('should log exactly one recovery line after reports', () => {
		throttle.report('publish failed');
		throttle.report('publish failed');
		throttle.report('publish failed');

		expect(throttle.clear('reconnected')).toBe(true);
		expect(throttle.clear('reconnected')).toBe(false);

		const recovered = memory.at('info');
		expect(recovered).toHaveLength(1);
		expect(recovered[0]).toMatchObject({
			msg: 'reconnected',
			condition: 'cannot-publish',
			suppressedReports: 2,
		});
		expect(throttle.isActive).toBe(false);
		expect(throttle.suppressedCount).toBe(0);
	});

	it('should not log on clear when never reported', () => {
		expect(throttle.clear('reconnected')).toBe(false);
		expect(memory.lines).toHaveLength(0);
	});

	it('should complain again after recovering', () => {
		throttle.report('publish failed');
		throttle.clear('reconnected');
		throttle.report('publish failed');

		expect(memory.at('error')).toHaveLength(2);
		expect(throttle.isActive).toBe(true);
	});
});
