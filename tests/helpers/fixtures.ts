import { encodeContainer } from '../../src/pcbrepair/encode.js';
import { cfb8Decrypt, getExpandedKey } from '../../src/pcbrepair/cipher.js';
import type { KeyVariant } from '../../src/pcbrepair/format.js';

export const encoder = new TextEncoder();

export function bytes(text: string): Uint8Array {
    return encoder.encode(text);
}

export function rows(...lines: string[]): Uint8Array {
    return bytes(lines.join('\r\n') + '\r\n');
}

export const SAMPLE_CONTENT_ROWS = [
    'A!UNIT!mils',
    'A!REFDES!COMP_INSERTION_CODE!SYM_NAME!SYM_MIRROR!SYM_ROTATE!',
    'S!U1!1!QFN4!NO!90!',
    'S!R7!2!R0402!YES!0!',
    'A!NET_NAME!REFDES!PIN_NUMBER!PIN_NAME!PIN_X!PIN_Y!TEST_POINT!RADIUS!',
    'S!GND!U1!1!GND!0!0!!10!',
    'S!VCC!U1!2!VCC!200!0!!10!',
    'S!SDA!U1!3!SDA!100!300!!10!',
    'S!VCC!R7!1!1!500!500!!5!',
    'S!GND!R7!2!2!540!500!!5!',
];

export const SAMPLE_DESCRIPTION_ROWS = [
    'MB-TEST|1.02|MB-TEST-EXT|1.02A|90MB0TEST',
    'Part\tDescription\tQty\tLocation\tAlt',
    '00-100\tMCU QFN\t1\tU1\t00-101',
    '00-200\tRES 10K 0402\t2\tR7 R8\t',
];

export function sampleContent(padding: string = ''): Uint8Array {
    return rows(...SAMPLE_CONTENT_ROWS, ...(padding ? [`A!COMMENT!${padding}`] : []));
}

export function sampleDescription(): Uint8Array {
    return rows(...SAMPLE_DESCRIPTION_ROWS);
}

/**
 * Encrypts the sample documents under `variant`, choosing padding so that no
 * earlier key trial lands on the zlib header byte by chance.
 */
export function containerRejectedByEarlierTrials(variant: Exclude<KeyVariant, 'none'>): {
    container: Uint8Array;
    content: Uint8Array;
    description: Uint8Array;
} {
    const earlier: KeyVariant[] = variant === 'fz' ? ['none'] : ['none', 'fz'];
    const description = sampleDescription();

    for (let pad = 0; pad < 256; pad++) {
        const content = sampleContent('x'.repeat(pad));
        const container = encodeContainer(content, description, { variant });
        const clash = earlier.some((v) => {
            const plain = v === 'none' ? container : cfb8Decrypt(container, getExpandedKey(v));
            return plain[4] === 0x78;
        });
        if (!clash) return { container, content, description };
    }
    throw new Error('No padding avoided a magic byte clash');
}

export function readU32(buf: Uint8Array, offset: number): number {
    return new DataView(buf.buffer, buf.byteOffset, buf.byteLength).getUint32(offset, true);
}

export function writeU32(buf: Uint8Array, offset: number, value: number): void {
    new DataView(buf.buffer, buf.byteOffset, buf.byteLength).setUint32(offset, value, true);
}
