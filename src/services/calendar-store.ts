import { ToolExecutionFault } from '../core/errors.js';
import { logThought } from '../utils/logger.js';

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const TIME_PATTERN = /^(\d{1,2}):(\d{2})$/;
const DAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

export interface DaySlots {
    date: string;
    available_times: string[];
    day_of_week: string;
}

export interface Booking {
    meetingId: string;
    date: string;
    time: string;
    title: string;
    duration: number;
}

export type BookingResult =
    | { success: true; message: string; meeting_id: string }
    | { success: false; message: string; available_alternatives: string[] };

interface MinuteRange {
    start: number;
    end: number;
}

/** `"09:30"` → 570. Returns null for anything that is not a valid clock time. */
export function parseClockTime(value: string): number | null {
    const match = TIME_PATTERN.exec(value.trim());
    if (!match) return null;
    const hours = Number(match[1]);
    const minutes = Number(match[2]);
    if (hours > 24 || minutes > 59 || (hours === 24 && minutes > 0)) return null;
    return hours * 60 + minutes;
}

function parseRange(range: string): MinuteRange | null {
    const [from, to] = range.split('-');
    if (from === undefined || to === undefined) return null;
    const start = parseClockTime(from);
    const end = parseClockTime(to);
    if (start === null || end === null || end <= start) return null;
    return { start, end };
}

export function dayOfWeek(date: string): string {
    const parsed = new Date(`${date}T00:00:00Z`);
    return DAY_NAMES[parsed.getUTCDay()] ?? 'Unknown';
}

export function meetingIdFor(date: string, time: string): string {
    return `meeting_${date}_${time}`.replace(/[-:]/g, '');
}

/**
 * In-memory calendar: the free ranges per day plus the meetings booked during
 * this process. Bookings run one at a time so two requests for the same slot
 * cannot both pass the availability check.
 */
export class CalendarStore {
    readonly #slots: Map<string, string[]>;
    readonly #bookings: Booking[] = [];
    #tail: Promise<unknown> = Promise.resolve();

    constructor(availableSlots: Record<string, string[]>) {
        this.#slots = new Map(Object.entries(availableSlots).map(([date, ranges]) => [date, [...ranges]]));
    }

    /** Free ranges for one date (empty when the date is unknown). */
    rangesFor(date: string): string[] {
        return [...(this.#slots.get(date) ?? [])];
    }

    /** Days with at least one free range, in calendar order. */
    listAvailable(): DaySlots[] {
        return [...this.#slots.entries()]
            .filter(([, ranges]) => ranges.length > 0)
            .sort(([a], [b]) => a.localeCompare(b))
            .map(([date, ranges]) => ({ date, available_times: [...ranges], day_of_week: dayOfWeek(date) }));
    }

    /** Raw slot table, as exposed through the calendar resource. */
    snapshot(): Record<string, string[]> {
        return Object.fromEntries([...this.#slots.entries()].map(([date, ranges]) => [date, [...ranges]]));
    }

    bookings(): Booking[] {
        return this.#bookings.map((booking) => ({ ...booking }));
    }

    /** True when `[time, time + duration)` fits one free range and overlaps no booking. */
    isAvailable(date: string, time: string, duration = 60): boolean {
        const start = parseClockTime(time);
        if (start === null || duration <= 0) return false;
        const end = start + duration;

        const fitsRange = this.rangesFor(date)
            .map(parseRange)
            .some((range) => range !== null && range.start <= start && end <= range.end);
        if (!fitsRange) return false;

        return !this.#bookings.some((booking) => {
            if (booking.date !== date) return false;
            const bookedStart = parseClockTime(booking.time);
            if (bookedStart === null) return false;
            return start < bookedStart + booking.duration && bookedStart < end;
        });
    }

    /**
     * Book a meeting. Throws `ToolExecutionFault` for ill-formed input; an
     * unavailable slot is a normal `{success:false}` result listing that day's ranges.
     */
    book(date: string, time: string, title: string, duration = 60): Promise<BookingResult> {
        const run = this.#tail.then(() => this.#bookNow(date, time, title, duration));
        // The chain must survive a rejected booking.
        this.#tail = run.catch(() => undefined);
        return run;
    }

    async #bookNow(date: string, time: string, title: string, duration: number): Promise<BookingResult> {
        if (!DATE_PATTERN.test(date)) {
            throw new ToolExecutionFault(`Invalid date '${date}': expected YYYY-MM-DD.`);
        }
        if (parseClockTime(time) === null) {
            throw new ToolExecutionFault(`Invalid time '${time}': expected HH:MM.`);
        }
        if (title.trim().length === 0) {
            throw new ToolExecutionFault('A meeting title is required.');
        }
        if (!Number.isInteger(duration) || duration <= 0) {
            throw new ToolExecutionFault(`Invalid duration '${duration}': expected a positive number of minutes.`);
        }

        if (!this.isAvailable(date, time, duration)) {
            await logThought(`[CalendarStore] Slot ${date} ${time} (${duration} min) unavailable.`);
            return {
                success: false,
                message: `The time slot ${date} at ${time} is not available`,
                available_alternatives: this.rangesFor(date),
            };
        }

        const meetingId = meetingIdFor(date, time);
        this.#bookings.push({ meetingId, date, time, title, duration });
        await logThought(`[CalendarStore] Booked '${title}' on ${date} at ${time} (${duration} min).`);
        return {
            success: true,
            message: `Meeting '${title}' scheduled for ${date} at ${time}`,
            meeting_id: meetingId,
        };
    }
}
