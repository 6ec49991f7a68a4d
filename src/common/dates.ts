import { BadRequestException } from '@nestjs/common';

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

function toEpochDay(isoDate: string): number {
    const [year, month, day] = isoDate.split('-').map(Number);
    return Date.UTC(year, month - 1, day) / DAY_MS;
}

/** True for a real calendar date written as YYYY-MM-DD (rejects 2024-02-30). */
export function isIsoDate(value: string): boolean {
    if (!ISO_DATE.test(value)) return false;
    return new Date(toEpochDay(value) * DAY_MS).toISOString().slice(0, 10) === value;
}

export function assertIsoDate(value: string, field: string): string {
    if (!isIsoDate(value)) {
        throw new BadRequestException({ key: 'date.invalid', vars: { field, value } });
    }
    return value;
}

/** Calendar date (UTC) of a timestamp. */
export function toIsoDate(timestamp: Date | string): string {
    const date = typeof timestamp === 'string' ? new Date(timestamp) : timestamp;
    return date.toISOString().slice(0, 10);
}

export function today(now: Date = new Date()): string {
    return toIsoDate(now);
}

export function addDays(isoDate: string, days: number): string {
    return new Date((toEpochDay(isoDate) + days) * DAY_MS).toISOString().slice(0, 10);
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: string, to: string): number {
    return toEpochDay(to) - toEpochDay(from);
}
