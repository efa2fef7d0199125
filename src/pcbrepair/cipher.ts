import keySchedules from './key-schedules.json' with { type: 'json' };
import { rc6EncryptBlock, assertExpandedKey, RC6_BLOCK_SIZE, type ExpandedKey } from './rc6.js';
import type { KeyVariant } from './format.js';

/**
 * CFB-8 keystream cipher over RC6.
 *
 * The shift register starts zeroed (no IV) and always holds the 16 most recent
 * ciphertext bytes. One block encryption is spent per byte.
 */

function parseSchedule(name: string, words: readonly string[]): ExpandedKey {
    const schedule = words.map((word) => {
        if (!/^0x[0-9a-f]{8}$/i.test(word)) {
            throw new RangeError(`Key schedule ${name}: malformed word ${word}`);
        }
        return parseInt(word.slice(2), 16);
    });
    assertExpandedKey(schedule);
    return Object.freeze(schedule);
}

/** Expanded key used by FZ files. */
export const FZ_EXPANDED_KEY: ExpandedKey = parseSchedule('fz', keySchedules.fz);

/** Expanded key used by CAE files. */
export const CAE_EXPANDED_KEY: ExpandedKey = parseSchedule('cae', keySchedules.cae);

export function getExpandedKey(variant: Exclude<KeyVariant, 'none'>): ExpandedKey {
    return variant === 'fz' ? FZ_EXPANDED_KEY : CAE_EXPANDED_KEY;
}

function transform(data: Uint8Array, schedule: ExpandedKey, feedCiphertextFromInput: boolean): Uint8Array {
    const out = new Uint8Array(data.length);
    const register = new Uint8Array(RC6_BLOCK_SIZE);

    for (let i = 0; i < data.length; i++) {
        const [a] = rc6EncryptBlock(register, schedule);
        out[i] = data[i] ^ (a & 0xFF);

        register.copyWithin(0, 1);
        register[RC6_BLOCK_SIZE - 1] = feedCiphertextFromInput ? data[i] : out[i];
    }

    return out;
}

/**
 * Decrypts a CFB-8 stream. The input bytes are the ciphertext fed back into
 * the register.
 */
export function cfb8Decrypt(data: Uint8Array, schedule: ExpandedKey): Uint8Array {
    return transform(data, schedule, true);
}

/**
 * Encrypts into a CFB-8 stream. The output bytes are the ciphertext fed back
 * into the register.
 */
export function cfb8Encrypt(data: Uint8Array, schedule: ExpandedKey): Uint8Array {
    return transform(data, schedule, false);
}
