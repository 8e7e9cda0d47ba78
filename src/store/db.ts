import { readFileSync } from 'node:fs';
import { AvailabilityScheduleSchema } from '../schemas';
import { AvailabilityErrorCode, AvailabilityLoadError } from '../errors';
import type { AvailabilitySchedule } from '../types';

/**
 * In-memory availability store
 *
 * Holds date -> time slot -> remaining table count, loaded once from the
 * availability file. Iteration follows the file's insertion order.
 *
 * The store takes no locks itself: the booking engine that owns it serializes
 * the check-then-decrement sequence.
 *
 * Note: counts live for the process lifetime only and are never written back.
 */
export class AvailabilityStore {
    private readonly schedule: Map<string, Map<string, number>> = new Map();

    private constructor(schedule: AvailabilitySchedule) {
        for (const [date, slots] of Object.entries(schedule)) {
            this.schedule.set(date, new Map(Object.entries(slots)));
        }
    }

    /**
     * Load the store from a JSON availability file
     *
     * @param source - Path to the availability file
     * @throws {AvailabilityLoadError} File unreadable, not JSON, or not a valid schedule
     */
    static load(source: string): AvailabilityStore {
        let raw: string;
        try {
            raw = readFileSync(source, 'utf-8');
        } catch (err) {
            throw new AvailabilityLoadError(`Cannot read availability file ${source}`, {
                code: AvailabilityErrorCode.FILE_READ_ERROR,
                source,
                cause: err
            });
        }

        let data: unknown;
        try {
            data = JSON.parse(raw);
        } catch (err) {
            throw new AvailabilityLoadError(`Availability file ${source} is not valid JSON`, {
                code: AvailabilityErrorCode.FILE_INVALID_FORMAT,
                source,
                cause: err
            });
        }

        return AvailabilityStore.fromSchedule(data, source);
    }

    /**
     * Build a store from already-parsed data, applying the same validation as `load`
     *
     * @throws {AvailabilityLoadError} Data is not a date -> time -> count mapping
     */
    static fromSchedule(data: unknown, source?: string): AvailabilityStore {
        const parsed = AvailabilityScheduleSchema.safeParse(data);
        if (!parsed.success) {
            throw new AvailabilityLoadError(
                `Malformed availability data${source ? ` in ${source}` : ''}: ${parsed.error.issues[0]?.message ?? 'invalid schedule'}`,
                {
                    code: AvailabilityErrorCode.FILE_INVALID_FORMAT,
                    source,
                    cause: parsed.error
                }
            );
        }
        return new AvailabilityStore(parsed.data);
    }

    /**
     * All dates in file order
     */
    dates(): string[] {
        return Array.from(this.schedule.keys());
    }

    hasDate(date: string): boolean {
        return this.schedule.has(date);
    }

    /**
     * Time slots of a date as [time, count] pairs in file order
     *
     * @returns Slots of the date, undefined if the date is unknown
     */
    slots(date: string): Array<[string, number]> | undefined {
        const day = this.schedule.get(date);
        return day ? Array.from(day.entries()) : undefined;
    }

    /**
     * @returns Remaining tables, undefined if the date or time is unknown
     */
    getCount(date: string, time: string): number | undefined {
        return this.schedule.get(date)?.get(time);
    }

    /**
     * Sum of remaining tables across all slots of a date (0 for unknown dates)
     */
    totalRemaining(date: string): number {
        const day = this.schedule.get(date);
        if (!day) return 0;
        let total = 0;
        for (const count of day.values()) total += count;
        return total;
    }

    /**
     * Take one table from a slot
     *
     * @returns Remaining tables after the decrement
     * @throws {RangeError} Slot unknown or already at zero
     */
    decrement(date: string, time: string): number {
        const day = this.schedule.get(date);
        const count = day?.get(time);
        if (!day || count === undefined) {
            throw new RangeError(`Unknown slot ${date} ${time}`);
        }
        if (count <= 0) {
            throw new RangeError(`Slot ${date} ${time} is fully booked`);
        }
        day.set(time, count - 1);
        return count - 1;
    }

    /**
     * Plain-object copy of the current counts
     */
    snapshot(): AvailabilitySchedule {
        const out: AvailabilitySchedule = {};
        for (const [date, day] of this.schedule) {
            out[date] = Object.fromEntries(day);
        }
        return out;
    }
}
