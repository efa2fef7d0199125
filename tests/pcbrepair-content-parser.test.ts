import { describe, it, expect } from 'vitest';
import { parseContent, ContentParser } from '../src/pcbrepair/content-parser.js';
import { Units } from '../src/pcbrepair/format.js';
import { BadDecimalError, BadIntegerError, MalformedRecordError } from '../src/pcbrepair/errors.js';
import { rows, sampleContent } from './helpers/fixtures.js';

const PIN_ROW = 'S!N1!U1!1!A!10!20!!0.5';

describe('Content parser state machine', () => {
    it('reads units and a pin row', () => {
        const parsed = parseContent(rows('A!UNIT!mils', 'A!NET_NAME', PIN_ROW));

        expect(parsed.units).toBe(Units.Mils);
        expect(parsed.pins).toHaveLength(1);
        const [pin] = parsed.pins;
        expect(pin.netName).toBe('N1');
        expect(pin.refdes).toBe('U1');
        expect(pin.pinNumber).toBe('1');
        expect(pin.pinName).toBe('A');
        expect(pin.pinX.toString()).toBe('10');
        expect(pin.pinY.toString()).toBe('20');
        expect(pin.testPoint).toBe('');
        expect(pin.radius.toString()).toBe('0.5');
    });

    it('keeps the section across LOGOInfo and UnDrawSym', () => {
        const parsed = parseContent(rows(
            'A!NET_NAME', PIN_ROW,
            'A!LOGOInfo', 'S!N2!U1!2!B!30!40!!0.5',
            'A!UnDrawSym', 'S!N3!U1!3!C!50!60!!0.5'
        ));
        expect(parsed.pins.map((p) => p.netName)).toEqual(['N1', 'N2', 'N3']);
    });

    it('drops data rows after an unrecognized section', () => {
        const parsed = parseContent(rows('A!NET_NAME', PIN_ROW, 'A!SOMETHING_ELSE', 'S!N2!U1!2!B!30!40!!0.5'));
        expect(parsed.pins).toHaveLength(1);
    });

    it('drops data rows in the via section', () => {
        const parsed = parseContent(rows('A!VIAID!X!Y', 'S!V1!1!2', 'S!V2', 'A!NET_NAME', PIN_ROW));
        expect(parsed.pins).toHaveLength(1);
        expect(parsed.testVias).toHaveLength(0);
    });

    it('drops data rows before any section', () => {
        expect(parseContent(rows(PIN_ROW)).pins).toHaveLength(0);
    });

    it('does not change state on UNIT', () => {
        const parsed = parseContent(rows('A!NET_NAME', 'A!UNIT!mm', PIN_ROW));
        expect(parsed.units).toBe(Units.Millimeters);
        expect(parsed.pins).toHaveLength(1);
    });

    it('defaults to mils and treats any other unit as millimeters', () => {
        expect(parseContent(rows('A!NET_NAME', PIN_ROW)).units).toBe(Units.Mils);
        expect(parseContent(rows('A!UNIT!MILS')).units).toBe(Units.Millimeters);
        expect(parseContent(rows('A!UNIT!mm', 'A!UNIT!mils')).units).toBe(Units.Mils);
    });

    it('ignores rows of other kinds and blank lines', () => {
        const parsed = parseContent(rows('A!NET_NAME', '', 'J!whatever', '', PIN_ROW));
        expect(parsed.pins).toHaveLength(1);
    });

    it('accepts LF-only line breaks', () => {
        const text = new TextEncoder().encode(`A!NET_NAME\n${PIN_ROW}\n`);
        expect(parseContent(text).pins).toHaveLength(1);
    });
});

describe('Content parser records', () => {
    it('parses the sample document', () => {
        const parsed = ContentParser.fromBytes(sampleContent()).parse();
        expect(parsed.symbols).toEqual([
            { refdes: 'U1', compInsertionCode: 1n, symName: 'QFN4', symMirror: false, symRotate: 90 },
            { refdes: 'R7', compInsertionCode: 2n, symName: 'R0402', symMirror: true, symRotate: 0 },
        ]);
        expect(parsed.pins.map((p) => `${p.refdes}.${p.pinNumber}`)).toEqual(['U1.1', 'U1.2', 'U1.3', 'R7.1', 'R7.2']);
    });

    it('parses test vias', () => {
        const parsed = parseContent(rows('A!TESTVIA', 'S!TV1!GND!U2!4!GND!1,5!-2.25!TP9!0,3'));
        expect(parsed.testVias).toHaveLength(1);
        const [via] = parsed.testVias;
        expect(via.testVia).toBe('TV1');
        expect(via.netName).toBe('GND');
        expect(via.refdes).toBe('U2');
        expect(via.pinNumber).toBe('4');
        expect(via.pinName).toBe('GND');
        expect(via.viaX.toString()).toBe('1.5');
        expect(via.viaY.toString()).toBe('-2.25');
        expect(via.testPoint).toBe('TP9');
        expect(via.radius.toString()).toBe('0.3');
    });

    it('parses graphic data', () => {
        const parsed = parseContent(rows(
            'A!GRAPHIC_DATA_NAME',
            'S!LINE!7!1!a!b!c!d!e!f!g!h!i!SILK!QFN4!U1'
        ));
        expect(parsed.graphicData).toEqual([{
            graphicDataName: 'LINE',
            graphicDataNumber: 7n,
            recordTag: '1',
            graphicData: ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h', 'i'],
            subclass: 'SILK',
            symName: 'QFN4',
            refdes: 'U1',
        }]);
    });

    it('parses classed graphic data', () => {
        const parsed = parseContent(rows(
            'A!CLASS',
            'S!ETCH!TOP!ARC!3!2!1!2!3!4!5!6!7!8!9!NET5'
        ));
        expect(parsed.classedGraphicData).toEqual([{
            className: 'ETCH',
            subclass: 'TOP',
            graphicDataName: 'ARC',
            graphicDataNumber: 3n,
            recordTag: '2',
            graphicData: ['1', '2', '3', '4', '5', '6', '7', '8', '9'],
            netName: 'NET5',
        }]);
    });

    it('normalizes comma decimal separators', () => {
        const parsed = parseContent(rows('A!NET_NAME', 'S!N1!U1!1!A!10,25!-0,5!!,75'));
        expect(parsed.pins[0].pinX.toString()).toBe('10.25');
        expect(parsed.pins[0].pinY.toString()).toBe('-0.5');
        expect(parsed.pins[0].radius.toString()).toBe('0.75');
    });

    it('keeps a separator inside a quoted field', () => {
        const parsed = parseContent(rows('A!NET_NAME', 'S!N1!U1!1!"A!B"!10!20!!0.5'));
        expect(parsed.pins[0].pinName).toBe('A!B');
        expect(parsed.pins[0].pinX.toString()).toBe('10');
        expect(parsed.pins[0].radius.toString()).toBe('0.5');
    });

    it('reads doubled quotes and line breaks inside quoted fields', () => {
        const parsed = parseContent(rows('A!NET_NAME', 'S!"say ""hi"""!U1!1!"two', 'lines"!10!20!!0.5'));
        expect(parsed.pins[0].netName).toBe('say "hi"');
        expect(parsed.pins[0].pinName).toBe('two\r\nlines');
    });

    it('keeps quotes that do not open a field', () => {
        const parsed = parseContent(rows('A!NET_NAME', 'S!N1!U1!1!5"!10!20!!0.5'));
        expect(parsed.pins[0].pinName).toBe('5"');
    });

    it('reads 64-bit insertion codes and graphic numbers', () => {
        const parsed = parseContent(rows(
            'A!REFDES', 'S!U1!18446744073709551615!QFN!NO!0',
            'A!GRAPHIC_DATA_NAME', 'S!LINE!9007199254740993!1!a!b!c!d!e!f!g!h!i!SILK!QFN4!U1'
        ));
        expect(parsed.symbols[0].compInsertionCode).toBe(18446744073709551615n);
        expect(parsed.graphicData[0].graphicDataNumber).toBe(9007199254740993n);
    });
});

describe('Content parser errors', () => {
    it('aborts on a malformed decimal with the row number', () => {
        const run = () => parseContent(rows('A!NET_NAME', PIN_ROW, 'S!N2!U1!2!B!1.2.3!40!!0.5'));
        expect(run).toThrow(BadDecimalError);
        expect(run).toThrow('Row 3: Invalid decimal field "1.2.3"');
    });

    it('aborts on an empty decimal field', () => {
        expect(() => parseContent(rows('A!NET_NAME', 'S!N1!U1!1!A!!20!!0.5'))).toThrow(BadDecimalError);
    });

    it('aborts on a malformed integer', () => {
        expect(() => parseContent(rows('A!REFDES', 'S!U1!x1!QFN!NO!0'))).toThrow(BadIntegerError);
        expect(() => parseContent(rows('A!REFDES', 'S!U1!-1!QFN!NO!0'))).toThrow(BadIntegerError);
        expect(() => parseContent(rows('A!REFDES', 'S!U1!1!QFN!NO!1.5'))).toThrow(BadIntegerError);
    });

    it('rejects insertion codes that do not fit 64 bits', () => {
        const run = () => parseContent(rows('A!REFDES', 'S!U1!18446744073709551616!QFN!NO!0'));
        expect(run).toThrow(BadIntegerError);
        expect(run).toThrow('Row 2: Invalid integer field "18446744073709551616"');
    });

    it('numbers rows from the line a quoted record starts on', () => {
        const run = () => parseContent(rows('A!NET_NAME', 'S!N1!U1!1!"multi', 'line"!10!20!!0.5', 'S!N2!U1!2!B!x!0!!1'));
        expect(run).toThrow('Row 4: Invalid decimal field "x"');
    });

    it('rejects rotations that do not fit 16 bits', () => {
        expect(parseContent(rows('A!REFDES', 'S!U1!1!QFN!NO!65535')).symbols[0].symRotate).toBe(65535);
        expect(() => parseContent(rows('A!REFDES', 'S!U1!1!QFN!NO!65536'))).toThrow(BadIntegerError);
    });

    it('aborts on a data row with too few fields', () => {
        const run = () => parseContent(rows('A!NET_NAME', 'S!N1!U1!1!A!10!20!'));
        expect(run).toThrow(MalformedRecordError);
        expect(run).toThrow('Row 2: PIN row has 8 fields, expected at least 9');
    });

    it('aborts on annotations without a name or unit value', () => {
        expect(() => parseContent(rows('A'))).toThrow(MalformedRecordError);
        expect(() => parseContent(rows('A!UNIT'))).toThrow(MalformedRecordError);
    });
});
