export type PageResponseFormat = 'json' | 'markdown';

/**
 * Pick the response format of GET /page/:id
 *
 * A markdown Content-Type wins; otherwise the first Accept item that names
 * markdown or JSON decides; JSON by default.
 */
export function pageResponseFormat(contentType: string | undefined, accept: string | undefined): PageResponseFormat {
    if (contentType?.startsWith('text/markdown')) {
        return 'markdown';
    }

    if (accept) {
        for (const item of accept.split(',').map((part) => part.trim())) {
            if (item.startsWith('text/markdown') || item.startsWith('text/*')) {
                return 'markdown';
            }

            if (item.startsWith('application/json') || item.startsWith('application/*') || item === '*/*') {
                return 'json';
            }
        }
    }

    return 'json';
}
