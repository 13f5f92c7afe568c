const MONTHS = [
    'January', 'February', 'March', 'April', 'May', 'June',
    'July', 'August', 'September', 'October', 'November', 'December'
];

function pad(value: number, width = 2): string {
    return value.toString().padStart(width, '0');
}

/**
 * ISO 8601 timestamp without milliseconds, in UTC.
 *
 * @example
 * toXmlSchema(new Date(Date.UTC(2024, 2, 5, 9, 30))); // "2024-03-05T09:30:00+00:00"
 */
export function toXmlSchema(date: Date): string {
    return (
        `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}` +
        `T${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}+00:00`
    );
}

/**
 * Default text form of a date in templates: "2024-03-05 09:30:00 +0000".
 */
export function toDisplayTimestamp(date: Date): string {
    return (
        `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
        `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())} +0000`
    );
}

/**
 * "05 Mar 2024"
 */
export function toShortDateString(date: Date): string {
    return `${pad(date.getUTCDate())} ${MONTHS[date.getUTCMonth()].slice(0, 3)} ${date.getUTCFullYear()}`;
}

/**
 * "05 March 2024"
 */
export function toLongDateString(date: Date): string {
    return `${pad(date.getUTCDate())} ${MONTHS[date.getUTCMonth()]} ${date.getUTCFullYear()}`;
}

/**
 * Whether a value is a usable Date (not `Invalid Date`).
 */
export function isValidDate(value: unknown): value is Date {
    return value instanceof Date && !Number.isNaN(value.getTime());
}
