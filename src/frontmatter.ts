/**
 * Frontmatter rendering
 *
 * Serializes a PropertyMap into a `---` delimited header of
 * `key: "value"` lines. Keys are sorted so the output does not depend
 * on the order Notion returned the properties in.
 */

import { defineEntry } from './properties';
import { PropertyMap, PropertyValue } from './types';

export function propertyValueToString(value: PropertyValue): string {
    switch (value.type) {
        case 'text':
            return value.value;
        case 'number':
            return String(value.value);
        case 'boolean':
            return value.value ? 'true' : 'false';
        case 'text_list':
            return value.value.join(', ');
        case 'timestamp':
            return value.value.toISOString();
    }
}

/**
 * Untagged JSON form of a value (used by the HTTP JSON response)
 */
export function propertyValueToJson(value: PropertyValue): string | number | boolean | string[] {
    switch (value.type) {
        case 'timestamp':
            return value.value.toISOString();
        case 'text_list':
            return [...value.value];
        default:
            return value.value;
    }
}

export function propertiesToJson(properties: PropertyMap): Record<string, string | number | boolean | string[]> {
    const json: Record<string, string | number | boolean | string[]> = {};
    for (const [key, value] of Object.entries(properties)) {
        defineEntry(json, key, propertyValueToJson(value));
    }
    return json;
}

/**
 * Escape a value for a double-quoted frontmatter line.
 * Backslashes go first so the escapes added after them stay intact.
 */
export function escapeFrontmatterValue(value: string): string {
    return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

/**
 * Prepend properties to a markdown body as frontmatter
 *
 * An empty map returns the body unchanged.
 */
export function applyFrontmatter(properties: PropertyMap, markdown: string): string {
    const keys = Object.keys(properties).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    if (keys.length === 0) {
        return markdown;
    }

    let frontmatter = '---\n';
    for (const key of keys) {
        const escaped = escapeFrontmatterValue(propertyValueToString(properties[key]));
        frontmatter += `${key}: "${escaped}"\n`;
    }
    frontmatter += '---\n\n';

    return frontmatter + markdown;
}
