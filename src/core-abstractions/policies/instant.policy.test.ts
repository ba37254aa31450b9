import { describe, it, expect } from 'vitest';
import { LocalTimeInstantPolicy, toEpochSeconds } from './instant.policy';
import { InvalidStartDateError } from '../errors/task-form.errors';
import { StartDate } from '../value-objects/start-date';
import { StartTime } from '../value-objects/start-time';

function date(raw: string): StartDate {
    const result = StartDate.parse(raw);
    if (!result.ok) throw result.error;
    return result.value;
}

function time(raw: string): StartTime {
    const result = StartTime.parse(raw);
    if (!result.ok) throw result.error;
    return result.value;
}

describe('LocalTimeInstantPolicy', () => {
    const policy = new LocalTimeInstantPolicy();

    it('composes the fields in local time with zero seconds', () => {
        const result = policy.compose(date('2024-3-15'), time('9:30'));
        expect(result.ok).toBe(true);
        if (result.ok) {
            expect(result.value.getFullYear()).toBe(2024);
            expect(result.value.getMonth()).toBe(2);
            expect(result.value.getDate()).toBe(15);
            expect(result.value.getHours()).toBe(9);
            expect(result.value.getMinutes()).toBe(30);
            expect(result.value.getSeconds()).toBe(0);
            expect(result.value.getMilliseconds()).toBe(0);
        }
    });

    it('keeps the absolute instant in the process time zone', () => {
        // Test runs pin TZ to America/New_York: 09:30 EDT is 13:30 UTC
        const result = policy.compose(date('2024-3-15'), time('9:30'));
        expect(result.ok && result.value.toISOString()).toBe('2024-03-15T13:30:00.000Z');
    });

    it('keeps years below 100 in the first century', () => {
        const result = policy.compose(date('50-3-15'), time('9:30'));
        expect(result.ok).toBe(true);
        if (result.ok) {
            expect(result.value.getFullYear()).toBe(50);
            expect(result.value.getMonth()).toBe(2);
            expect(result.value.getDate()).toBe(15);
            expect(result.value.getHours()).toBe(9);
        }
    });

    it('accepts a leap day in a leap year', () => {
        expect(policy.compose(date('2024-2-29'), time('0:0')).ok).toBe(true);
    });

    it.each(['2023-2-29', '2024-2-30', '2024-4-31', '2024-13-1', '2024-0-10', '2024-3-0', '0-3-15', '10000-1-1'])(
        'rejects %s as an impossible start date',
        raw => {
            const result = policy.compose(date(raw), time('9:30'));
            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error).toBeInstanceOf(InvalidStartDateError);
                expect(result.error.reason).toBe('impossible');
                expect(result.error.message).toBe(`Invalid value for start date: "${raw}" is not a date on the calendar`);
            }
        }
    );

    it('rejects a time of day outside the clock', () => {
        const result = policy.compose(date('2024-3-15'), time('24:00'));
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error).toBeInstanceOf(InvalidStartDateError);
            expect(result.error.message).toBe('Invalid value for start date: "2024-3-15 24:00" is not a valid time of day');
        }
        expect(policy.compose(date('2024-3-15'), time('9:60')).ok).toBe(false);
        expect(policy.compose(date('2024-3-15'), time('-1:30')).ok).toBe(false);
    });
});

describe('toEpochSeconds', () => {
    it('drops the sub-second part', () => {
        expect(toEpochSeconds(new Date(1710495000999))).toBe(1710495000);
        expect(toEpochSeconds(new Date(Date.UTC(2024, 2, 15, 9, 30)))).toBe(1710495000);
    });
});
