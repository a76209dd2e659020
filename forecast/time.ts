/**
 * Municipal Forecast Pipeline — Time Utilities
 *
 * Forecast dates are wall-clock values of the municipality. They are held as
 * Date objects at the matching UTC instant and always read back with UTC
 * getters, so results never depend on the host time zone.
 */

const DAY_FIRST_DATE = /^(\d{2})\/(\d{2})\/(\d{4})$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const HOUR_SLOT = /^(\d{2}):00$/;

const HOUR_MS = 3_600_000;

/**
 * Parse `dd/mm/yyyy` or `yyyy-mm-dd` into a calendar date.
 * Returns null for any other shape and for impossible dates such as 31/02.
 */
export function parseCalendarDate(value: string): Date | null {
    const text = value.trim();
    const dayFirst = DAY_FIRST_DATE.exec(text);
    if (dayFirst) {
        return calendarDate(Number(dayFirst[3]), Number(dayFirst[2]), Number(dayFirst[1]));
    }
    const iso = ISO_DATE.exec(text);
    if (iso) {
        return calendarDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
    }
    return null;
}

function calendarDate(year: number, month: number, day: number): Date | null {
    const date = new Date(Date.UTC(year, month - 1, day));
    // Date.UTC rolls overflowing days into the next month; reject those.
    if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
        return null;
    }
    return date;
}

/**
 * Format an hour of day as a fixed-width `HH:00` slot.
 */
export function formatHourSlot(hour: number): string {
    return `${String(hour).padStart(2, '0')}:00`;
}

/**
 * Read the hour back out of an `HH:00` slot, or null if the slot is malformed.
 */
export function parseHourSlot(slot: string): number | null {
    const match = HOUR_SLOT.exec(slot);
    if (!match) return null;
    const hour = Number(match[1]);
    return hour <= 23 ? hour : null;
}

/**
 * Combine a calendar date and an hour of day into one timestamp.
 */
export function combineDateAndHour(date: Date, hour: number): Date {
    return new Date(date.getTime() + hour * HOUR_MS);
}

/**
 * `yyyy-mm-dd HH:MM:SS`
 */
export function formatDateTime(date: Date): string {
    return date.toISOString().slice(0, 19).replace('T', ' ');
}

/**
 * `dd/mm/yyyy`
 */
export function formatDayFirstDate(date: Date): string {
    const day = pad2(date.getUTCDate());
    const month = pad2(date.getUTCMonth() + 1);
    return `${day}/${month}/${date.getUTCFullYear()}`;
}

/**
 * `dd/mm/yyyy HH:MM:SS`, used for collection timestamps.
 */
export function formatDayFirstDateTime(date: Date): string {
    const time = [date.getUTCHours(), date.getUTCMinutes(), date.getUTCSeconds()].map(pad2).join(':');
    return `${formatDayFirstDate(date)} ${time}`;
}

/**
 * `YYYYMMDD_HHMMSS`, used to name fallback files.
 */
export function formatFileStamp(date: Date): string {
    const iso = date.toISOString();
    return `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`;
}

function pad2(value: number): string {
    return String(value).padStart(2, '0');
}
