/**
 * RC6-32/20 block cipher (32-bit words, 20 rounds, lg w = 5).
 *
 * Only the encrypt direction is implemented: the container cipher runs the
 * block function as a keystream generator, so its inverse is never needed.
 */

export const RC6_ROUNDS = 20;
export const RC6_BLOCK_SIZE = 16;
export const RC6_SCHEDULE_WORDS = 2 * RC6_ROUNDS + 4;

const LG_W = 5;
const P32 = 0xB7E15163;
const Q32 = 0x9E3779B9;

/** A pre-expanded round-key schedule of 44 unsigned 32-bit words. */
export type ExpandedKey = readonly number[];

export type BlockWords = [a: number, b: number, c: number, d: number];

function rotl(x: number, n: number): number {
    const s = n & 31;
    return ((x << s) | (x >>> (32 - s))) >>> 0;
}

function readWordLE(bytes: Uint8Array, offset: number): number {
    return (bytes[offset] | (bytes[offset + 1] << 8) | (bytes[offset + 2] << 16) | (bytes[offset + 3] << 24)) >>> 0;
}

export function assertExpandedKey(schedule: readonly number[]): void {
    if (schedule.length !== RC6_SCHEDULE_WORDS) {
        throw new RangeError(`RC6 schedule must have ${RC6_SCHEDULE_WORDS} words, got ${schedule.length}`);
    }
    for (const word of schedule) {
        if (!Number.isInteger(word) || word < 0 || word > 0xFFFFFFFF) {
            throw new RangeError(`RC6 schedule word out of range: ${word}`);
        }
    }
}

/**
 * Encrypts one 16-byte block and returns the four output words (A, B, C, D).
 */
export function rc6EncryptBlock(block: Uint8Array, schedule: ExpandedKey): BlockWords {
    let a = readWordLE(block, 0);
    let b = readWordLE(block, 4);
    let c = readWordLE(block, 8);
    let d = readWordLE(block, 12);

    b = (b + schedule[0]) >>> 0;
    d = (d + schedule[1]) >>> 0;

    for (let i = 1; i <= RC6_ROUNDS; i++) {
        const t = rotl(Math.imul(b, (b << 1) + 1), LG_W);
        const u = rotl(Math.imul(d, (d << 1) + 1), LG_W);
        a = (rotl(a ^ t, u) + schedule[2 * i]) >>> 0;
        c = (rotl(c ^ u, t) + schedule[2 * i + 1]) >>> 0;

        const temp = a;
        a = b;
        b = c;
        c = d;
        d = temp;
    }

    a = (a + schedule[2 * RC6_ROUNDS + 2]) >>> 0;
    c = (c + schedule[2 * RC6_ROUNDS + 3]) >>> 0;

    return [a, b, c, d];
}

/**
 * Standard RC6 key schedule for a 128-bit user key.
 */
export function expandKey(userKey: Uint8Array): number[] {
    if (userKey.length !== 16) {
        throw new RangeError(`RC6 user key must be 16 bytes, got ${userKey.length}`);
    }

    const l = [readWordLE(userKey, 0), readWordLE(userKey, 4), readWordLE(userKey, 8), readWordLE(userKey, 12)];
    const s = new Array<number>(RC6_SCHEDULE_WORDS);

    s[0] = P32;
    for (let i = 1; i < RC6_SCHEDULE_WORDS; i++) {
        s[i] = (s[i - 1] + Q32) >>> 0;
    }

    let a = 0;
    let b = 0;
    let i = 0;
    let j = 0;
    for (let step = 0; step < 3 * RC6_SCHEDULE_WORDS; step++) {
        s[i] = rotl((s[i] + a + b) >>> 0, 3);
        a = s[i];
        l[j] = rotl((l[j] + a + b) >>> 0, (a + b) >>> 0);
        b = l[j];
        i = (i + 1) % RC6_SCHEDULE_WORDS;
        j = (j + 1) % l.length;
    }

    return s;
}
