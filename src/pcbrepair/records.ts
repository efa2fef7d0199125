const QUOTE = '"';

export interface DelimitedRecord {
    readonly fields: string[];
    /** 1-based line the record starts on. */
    readonly row: number;
}

enum ReadState {
    StartRecord,
    StartField,
    InField,
    InQuotedField,
    AfterQuote,
}

/**
 * Splits a delimited document into records. A field that opens with `"` may
 * hold the delimiter and line breaks, and `""` inside it is a literal quote;
 * text after the closing quote is kept. `\r\n`, `\r` and `\n` each end a
 * record, and blank lines produce no record.
 */
export function readRecords(text: string, delimiter: string): DelimitedRecord[] {
    const records: DelimitedRecord[] = [];
    let fields: string[] = [];
    let field = '';
    let state = ReadState.StartRecord;
    let line = 1;
    let recordLine = 1;

    const endRecord = () => {
        fields.push(field);
        records.push({ fields, row: recordLine });
        fields = [];
        field = '';
        state = ReadState.StartRecord;
    };

    for (let i = 0; i < text.length; i++) {
        let ch = text[i];
        if (ch === '\r' && text[i + 1] === '\n') {
            ch = '\r\n';
            i++;
        }
        const isBreak = ch === '\r\n' || ch === '\r' || ch === '\n';

        if (state === ReadState.StartRecord && !isBreak) {
            recordLine = line;
        }

        if (state === ReadState.InQuotedField) {
            if (ch === QUOTE) {
                state = ReadState.AfterQuote;
            } else {
                field += ch;
            }
        } else if (isBreak) {
            if (state !== ReadState.StartRecord) endRecord();
        } else if (ch === delimiter) {
            fields.push(field);
            field = '';
            state = ReadState.StartField;
        } else if (ch === QUOTE && state === ReadState.AfterQuote) {
            field += QUOTE;
            state = ReadState.InQuotedField;
        } else if (ch === QUOTE && (state === ReadState.StartRecord || state === ReadState.StartField)) {
            state = ReadState.InQuotedField;
        } else {
            field += ch;
            state = ReadState.InField;
        }

        if (isBreak) line++;
    }

    if (state !== ReadState.StartRecord) endRecord();
    return records;
}
