import { Units, CONTENT_FIELD_SEPARATOR, ANNOTATION_ROW, DATA_ROW } from './format.js';
import { MalformedRecordError } from './errors.js';
import { decodeText, parseDecimalField, parseU64Field, parseUnsignedField, U16_MAX } from './fields.js';
import { readRecords } from './records.js';
import type {
    ParsedContent, SymbolRecord, PinRecord, TestViaRecord,
    GraphicDataRecord, ClassedGraphicDataRecord, GraphicFields
} from './types.js';

/**
 * Section the parser is in. Set by `A` rows; decides how `S` rows are read.
 */
export enum SectionState {
    Unknown = 'UNKNOWN',
    Symbol = 'SYMBOL',
    Pin = 'PIN',
    Via = 'VIA',
    TestVia = 'TEST_VIA',
    GraphicData = 'GRAPHIC_DATA',
    ClassedGraphicData = 'CLASSED_GRAPHIC_DATA',
}

const SECTION_OPENERS: ReadonlyMap<string, SectionState> = new Map([
    ['REFDES', SectionState.Symbol],
    ['NET_NAME', SectionState.Pin],
    ['VIAID', SectionState.Via],
    ['TESTVIA', SectionState.TestVia],
    ['GRAPHIC_DATA_NAME', SectionState.GraphicData],
    ['CLASS', SectionState.ClassedGraphicData],
]);

/** Sub-annotations inside a section; they leave the state alone. */
const SUB_ANNOTATIONS: ReadonlySet<string> = new Set(['LOGOInfo', 'UnDrawSym']);

const UNIT_ANNOTATION = 'UNIT';
const MILS_LITERAL = 'mils';

/** Minimum field count (including the leading `S`) per record kind. */
const DATA_ROW_ARITY: Readonly<Record<SectionState, number>> = {
    [SectionState.Unknown]: 0,
    [SectionState.Via]: 0,
    [SectionState.Symbol]: 6,
    [SectionState.Pin]: 9,
    [SectionState.TestVia]: 10,
    [SectionState.GraphicData]: 16,
    [SectionState.ClassedGraphicData]: 16,
};

function graphicFields(fields: readonly string[], start: number): GraphicFields {
    return [
        fields[start], fields[start + 1], fields[start + 2],
        fields[start + 3], fields[start + 4], fields[start + 5],
        fields[start + 6], fields[start + 7], fields[start + 8],
    ];
}

/**
 * Single-pass parser for the `!`-delimited content document.
 */
export class ContentParser {
    private state: SectionState = SectionState.Unknown;
    private units: Units = Units.Mils;
    private readonly symbols: SymbolRecord[] = [];
    private readonly pins: PinRecord[] = [];
    private readonly testVias: TestViaRecord[] = [];
    private readonly graphicData: GraphicDataRecord[] = [];
    private readonly classedGraphicData: ClassedGraphicDataRecord[] = [];

    constructor(private readonly text: string) { }

    static fromBytes(content: Uint8Array): ContentParser {
        return new ContentParser(decodeText(content));
    }

    parse(): ParsedContent {
        for (const { fields, row } of readRecords(this.text, CONTENT_FIELD_SEPARATOR)) {
            if (fields[0] === ANNOTATION_ROW) {
                this.handleAnnotation(fields, row);
            } else if (fields[0] === DATA_ROW) {
                this.handleData(fields, row);
            }
        }

        return {
            units: this.units,
            symbols: this.symbols,
            pins: this.pins,
            testVias: this.testVias,
            graphicData: this.graphicData,
            classedGraphicData: this.classedGraphicData,
        };
    }

    private handleAnnotation(fields: readonly string[], row: number): void {
        if (fields.length < 2) {
            throw new MalformedRecordError('Annotation row without a section name', row);
        }
        const name = fields[1];

        if (name === UNIT_ANNOTATION) {
            if (fields.length < 3) {
                throw new MalformedRecordError('UNIT annotation without a value', row);
            }
            this.units = fields[2] === MILS_LITERAL ? Units.Mils : Units.Millimeters;
            return;
        }
        if (SUB_ANNOTATIONS.has(name)) return;

        this.state = SECTION_OPENERS.get(name) ?? SectionState.Unknown;
    }

    private handleData(fields: readonly string[], row: number): void {
        const arity = DATA_ROW_ARITY[this.state];
        if (fields.length < arity) {
            throw new MalformedRecordError(
                `${this.state} row has ${fields.length} fields, expected at least ${arity}`,
                row
            );
        }

        switch (this.state) {
            case SectionState.Symbol:
                this.symbols.push({
                    refdes: fields[1],
                    compInsertionCode: parseU64Field(fields[2], row),
                    symName: fields[3],
                    symMirror: fields[4] === 'YES',
                    symRotate: parseUnsignedField(fields[5], row, U16_MAX),
                });
                break;
            case SectionState.Pin:
                this.pins.push({
                    netName: fields[1],
                    refdes: fields[2],
                    pinNumber: fields[3],
                    pinName: fields[4],
                    pinX: parseDecimalField(fields[5], row),
                    pinY: parseDecimalField(fields[6], row),
                    testPoint: fields[7],
                    radius: parseDecimalField(fields[8], row),
                });
                break;
            case SectionState.TestVia:
                this.testVias.push({
                    testVia: fields[1],
                    netName: fields[2],
                    refdes: fields[3],
                    pinNumber: fields[4],
                    pinName: fields[5],
                    viaX: parseDecimalField(fields[6], row),
                    viaY: parseDecimalField(fields[7], row),
                    testPoint: fields[8],
                    radius: parseDecimalField(fields[9], row),
                });
                break;
            case SectionState.GraphicData:
                this.graphicData.push({
                    graphicDataName: fields[1],
                    graphicDataNumber: parseU64Field(fields[2], row),
                    recordTag: fields[3],
                    graphicData: graphicFields(fields, 4),
                    subclass: fields[13],
                    symName: fields[14],
                    refdes: fields[15],
                });
                break;
            case SectionState.ClassedGraphicData:
                this.classedGraphicData.push({
                    className: fields[1],
                    subclass: fields[2],
                    graphicDataName: fields[3],
                    graphicDataNumber: parseU64Field(fields[4], row),
                    recordTag: fields[5],
                    graphicData: graphicFields(fields, 6),
                    netName: fields[15],
                });
                break;
            case SectionState.Via:
            case SectionState.Unknown:
                // No record type for these sections.
                break;
        }
    }
}

export function parseContent(content: Uint8Array): ParsedContent {
    return ContentParser.fromBytes(content).parse();
}
