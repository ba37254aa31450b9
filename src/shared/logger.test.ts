import { describe, it, expect, afterEach, vi } from 'vitest';
import { logger, PerformanceTimer } from './logger';

function lastLine(spy: { mock: { calls: unknown[][] } }) {
    const calls = spy.mock.calls;
    return JSON.parse(String(calls[calls.length - 1][0]));
}

describe('logger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('writes one JSON object per entry', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});

        logger.info('add-task', 'Task relayed', { taskName: 'Water plants' });

        const line = lastLine(log);
        expect(line.level).toBe('INFO');
        expect(line.component).toBe('add-task');
        expect(line.message).toBe('Task relayed');
        expect(line.data).toEqual({ taskName: 'Water plants' });
        expect(typeof line.timestamp).toBe('string');
    });

    it('sends errors to stderr with the error details', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});

        logger.error('add-task', 'Relaying task failed', new TypeError('fetch failed'));

        const line = lastLine(error);
        expect(line.level).toBe('ERROR');
        expect(line.error.name).toBe('TypeError');
        expect(line.error.message).toBe('fetch failed');
    });

    it('formats validation entries as field and reason', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});

        logger.validation('add-task', 'task_time', 'absent');

        expect(lastLine(log).message).toBe('task_time: absent');
        expect(lastLine(log).level).toBe('VALIDATION');
    });

    it('logs the duration of a timed operation', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});

        const duration = new PerformanceTimer('add-task', 'relay').end();

        const line = lastLine(log);
        expect(line.message).toBe('Performance: relay');
        expect(line.data.durationMs).toBe(duration);
    });
});
