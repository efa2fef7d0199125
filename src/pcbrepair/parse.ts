import { parseContent } from './content-parser.js';
import { parseDescription } from './description-parser.js';
import type { DecodedContainer, ParsedRepairFile } from './types.js';

/**
 * Parses both documents of a decoded container.
 */
export function parseRepairFile(decoded: Pick<DecodedContainer, 'content' | 'description'>): ParsedRepairFile {
    return {
        content: parseContent(decoded.content),
        description: parseDescription(decoded.description),
    };
}
