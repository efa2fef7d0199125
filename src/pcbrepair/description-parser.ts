import {
    HEADER_FIELD_SEPARATOR, HEADER_LINE_BREAK, TABLE_FIELD_SEPARATOR, TABLE_SKIPPED_ROWS
} from './format.js';
import { MissingHeaderError } from './errors.js';
import { decodeText, parseU64Field } from './fields.js';
import { readRecords } from './records.js';
import type { BomComponent, Description } from './types.js';

const HEADER_FIELDS = 5;
const TABLE_FIELDS = 5;

/**
 * Parses the description document: a `|`-separated board header line, then a
 * tab-separated bill of materials whose first two rows are titles.
 */
export function parseDescription(description: Uint8Array): Description {
    const text = decodeText(description);

    const headerLine = text.split(HEADER_LINE_BREAK)[0];
    const header = headerLine.split(HEADER_FIELD_SEPARATOR);
    if (header.length < HEADER_FIELDS) {
        throw new MissingHeaderError(header.length);
    }

    // The table is read from the start of the document; the header line is one
    // of the skipped rows.
    const rows = readRecords(text, TABLE_FIELD_SEPARATOR).slice(TABLE_SKIPPED_ROWS);

    const components: BomComponent[] = [];
    for (const { fields, row } of rows) {
        if (fields.length < TABLE_FIELDS) continue;

        components.push({
            partNumber: fields[0],
            description: fields[1],
            quantity: parseU64Field(fields[2], row),
            location: [...new Set(fields[3].split(/\s+/).filter((token) => token.length > 0))],
            alternatePartNumber: fields[4],
        });
    }

    return {
        boardModel: header[0],
        revision: header[1],
        extendedBoardModel: header[2],
        extendedRevision: header[3],
        partNumber: header[4],
        components,
    };
}

