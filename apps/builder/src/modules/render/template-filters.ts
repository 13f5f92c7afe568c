import { escapeXml } from '../../lib/xml.js';
import { slugify } from '../../lib/slugify.js';
import { isPlainObject } from '../../lib/objects.js';
import {
    isValidDate,
    toDisplayTimestamp,
    toLongDateString,
    toShortDateString,
    toXmlSchema
} from '../../lib/dates.js';

/**
 * Values a filter sees besides its input: the site settings used by URL filters.
 */
export interface IFilterEnvironment {
    readonly url: string;
    readonly baseurl: string;
}

/**
 * A filter receives the piped value and its evaluated arguments.
 * Throwing an Error marks the token as invalid; the caller adds the location.
 */
export type TemplateFilter = (value: unknown, args: readonly unknown[], env: IFilterEnvironment) => unknown;

/**
 * Text form of a template value.
 *
 * `null`/`undefined` render as nothing, dates as "YYYY-MM-DD HH:MM:SS +0000",
 * arrays as their items concatenated, mappings as JSON.
 */
export function stringifyValue(value: unknown): string {
    if (value === null || value === undefined) {
        return '';
    }
    if (typeof value === 'string') {
        return value;
    }
    if (value instanceof Date) {
        return toDisplayTimestamp(value);
    }
    if (Array.isArray(value)) {
        return value.map(stringifyValue).join('');
    }
    if (typeof value === 'object') {
        return JSON.stringify(value);
    }
    return String(value);
}

function toDate(value: unknown, filter: string): Date {
    const date = value instanceof Date ? value : new Date(stringifyValue(value));
    if (!isValidDate(date)) {
        throw new Error(`${filter} expects a date, got "${stringifyValue(value)}"`);
    }
    return date;
}

function relativeUrl(value: unknown, env: IFilterEnvironment): string {
    const input = stringifyValue(value);
    if (/^[a-z][a-z0-9+.-]*:/i.test(input)) {
        return input;
    }
    return `${env.baseurl}${input.startsWith('/') ? input : `/${input}`}`;
}

function sizeOf(value: unknown): number {
    if (Array.isArray(value) || typeof value === 'string') {
        return value.length;
    }
    return isPlainObject(value) ? Object.keys(value).length : 0;
}

/**
 * Filters available in `{{ value | filter: arg }}` tokens.
 */
export const TEMPLATE_FILTERS: Readonly<Record<string, TemplateFilter>> = {
    default: (value, args) =>
        value === undefined || value === null || value === false || value === '' ||
        (Array.isArray(value) && value.length === 0)
            ? args[0]
            : value,
    escape: value => escapeXml(stringifyValue(value)),
    xml_escape: value => escapeXml(stringifyValue(value)),
    downcase: value => stringifyValue(value).toLowerCase(),
    upcase: value => stringifyValue(value).toUpperCase(),
    slugify: value => slugify(stringifyValue(value)),
    strip_html: value => stringifyValue(value).replace(/<[^>]*>/g, ''),
    append: (value, args) => stringifyValue(value) + stringifyValue(args[0]),
    prepend: (value, args) => stringifyValue(args[0]) + stringifyValue(value),
    jsonify: value => JSON.stringify(value ?? null),
    size: value => sizeOf(value),
    join: (value, args) =>
        Array.isArray(value)
            ? value.map(stringifyValue).join(args[0] === undefined ? ' ' : stringifyValue(args[0]))
            : stringifyValue(value),
    relative_url: (value, _args, env) => relativeUrl(value, env),
    absolute_url: (value, _args, env) => {
        const relative = relativeUrl(value, env);
        return relative.startsWith('/') ? `${env.url}${relative}` : relative;
    },
    date_to_xmlschema: value => toXmlSchema(toDate(value, 'date_to_xmlschema')),
    date_to_string: value => toShortDateString(toDate(value, 'date_to_string')),
    date_to_long_string: value => toLongDateString(toDate(value, 'date_to_long_string'))
};
