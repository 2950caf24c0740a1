/**
 * Property Normalization
 *
 * Converts raw Notion page properties into the flat PropertyValue model.
 *
 * Raw properties are validated against a closed set of known kinds.
 * Unknown kinds (formula, relation, rollup, files, ...) and malformed
 * known kinds normalize to "no value" rather than failing, so new Notion
 * property types never break a read.
 */

import { z } from 'zod';
import { PropertyMap, PropertyValue } from './types';

const richTextSchema = z.array(z.object({ plain_text: z.string() }));

const optionSchema = z.object({ name: z.string().nullish() });

const dateSchema = z.object({
    start: z.string().nullish(),
    end: z.string().nullish(),
});

const personSchema = z.object({ name: z.string().nullish() });

const base = { id: z.string().optional() };

export const remotePropertySchema = z.discriminatedUnion('type', [
    z.object({ ...base, type: z.literal('title'), title: richTextSchema }),
    z.object({ ...base, type: z.literal('rich_text'), rich_text: richTextSchema }),
    z.object({ ...base, type: z.literal('select'), select: optionSchema.nullable() }),
    z.object({ ...base, type: z.literal('status'), status: optionSchema.nullable() }),
    z.object({ ...base, type: z.literal('multi_select'), multi_select: z.array(optionSchema) }),
    z.object({ ...base, type: z.literal('checkbox'), checkbox: z.boolean() }),
    z.object({ ...base, type: z.literal('number'), number: z.number().nullable() }),
    z.object({ ...base, type: z.literal('url'), url: z.string().nullable() }),
    z.object({ ...base, type: z.literal('email'), email: z.string().nullable() }),
    z.object({ ...base, type: z.literal('phone_number'), phone_number: z.string().nullable() }),
    z.object({ ...base, type: z.literal('date'), date: dateSchema.nullable() }),
    z.object({ ...base, type: z.literal('created_time'), created_time: z.string() }),
    z.object({ ...base, type: z.literal('last_edited_time'), last_edited_time: z.string().nullish() }),
    z.object({ ...base, type: z.literal('people'), people: z.array(personSchema) }),
]);

export type RemoteProperty = z.infer<typeof remotePropertySchema>;

export type RemotePropertyKind = RemoteProperty['type'];

const BARE_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

const LOCAL_DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

function text(value: string | null | undefined): PropertyValue | undefined {
    return value ? { type: 'text', value } : undefined;
}

function textList(values: Array<string | null | undefined>): PropertyValue | undefined {
    const present = values.filter((value): value is string => typeof value === 'string' && value.length > 0);
    return present.length > 0 ? { type: 'text_list', value: present } : undefined;
}

function timestamp(value: Date | undefined): PropertyValue | undefined {
    return value ? { type: 'timestamp', value } : undefined;
}

/**
 * Concatenate rich text runs and trim; undefined when nothing is left
 */
export function richTextToString(runs: Array<{ plain_text: string }>): string | undefined {
    const trimmed = runs.map((run) => run.plain_text).join('').trim();
    return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Parse a Notion date or date-time string into a UTC instant
 *
 * A bare calendar date becomes midnight UTC. A date-time keeps its
 * offset and is converted to UTC; without an offset it is read as UTC.
 */
export function parseNotionDate(value: string): Date | undefined {
    const bare = BARE_DATE.exec(value);
    if (bare) {
        const [year, month, day] = [Number(bare[1]), Number(bare[2]), Number(bare[3])];
        const midnight = new Date(Date.UTC(year, month - 1, day));
        // Date.UTC rolls 2024-02-30 over into March
        return midnight.getUTCMonth() === month - 1 && midnight.getUTCDate() === day ? midnight : undefined;
    }

    const parsed = new Date(LOCAL_DATE_TIME.test(value) ? `${value}Z` : value);
    return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}

/**
 * Normalize one raw property
 *
 * @returns The value, or undefined when the property carries nothing representable
 */
export function propertyToValue(raw: unknown): PropertyValue | undefined {
    const parsed = remotePropertySchema.safeParse(raw);
    if (!parsed.success) {
        return undefined;
    }

    const property = parsed.data;
    switch (property.type) {
        case 'title':
            return text(richTextToString(property.title));
        case 'rich_text':
            return text(richTextToString(property.rich_text));
        case 'select':
            return text(property.select?.name);
        case 'status':
            return text(property.status?.name);
        case 'multi_select':
            return textList(property.multi_select.map((option) => option.name));
        case 'checkbox':
            return { type: 'boolean', value: property.checkbox };
        case 'number':
            return property.number !== null && Number.isFinite(property.number)
                ? { type: 'number', value: property.number }
                : undefined;
        case 'url':
            return text(property.url);
        case 'email':
            return text(property.email);
        case 'phone_number':
            return text(property.phone_number);
        case 'date':
            return timestamp(property.date?.start ? parseNotionDate(property.date.start) : undefined);
        case 'created_time':
            return timestamp(parseNotionDate(property.created_time));
        case 'last_edited_time':
            return timestamp(property.last_edited_time ? parseNotionDate(property.last_edited_time) : undefined);
        case 'people':
            return textList(property.people.map((person) => person.name));
        default: {
            const unreachable: never = property;
            return unreachable;
        }
    }
}

export interface PropertyMapOptions {
    /**
     * Key the map by display name (default) or by Notion property id.
     * Properties without an id fall back to their name.
     */
    keyBy?: 'name' | 'id';
}

const propertyIdSchema = z.object({ id: z.string().min(1) });

/**
 * Add an own enumerable key, including names like `__proto__` that plain
 * assignment would treat as the prototype
 */
export function defineEntry<T>(target: Record<string, T>, key: string, value: T): void {
    Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Normalize every property of a page, keeping only those with a value
 */
export function pageToProperties(
    properties: Readonly<Record<string, unknown>>,
    options: PropertyMapOptions = {},
): PropertyMap {
    const keyBy = options.keyBy ?? 'name';
    const result: PropertyMap = {};

    for (const [name, raw] of Object.entries(properties)) {
        const value = propertyToValue(raw);
        if (!value) continue;

        if (keyBy === 'id') {
            const id = propertyIdSchema.safeParse(raw);
            defineEntry(result, id.success ? id.data.id : name, value);
        } else {
            defineEntry(result, name, value);
        }
    }

    return result;
}
