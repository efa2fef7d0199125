import {
    ZLIB_MAGIC, MAGIC_OFFSET, LENGTH_PREFIX_SIZE, POINTER_SIZE,
    DEFAULT_TRIAL_ORDER, DEFAULT_MAX_DECOMPRESSED_SIZE, type KeyVariant
} from './format.js';
import { cfb8Decrypt, getExpandedKey } from './cipher.js';
import { ZlibCodec } from './codecs.js';
import { FramingError, InvalidMagicError, LimitExceededError, RepairFileError } from './errors.js';
import type { DecodedContainer, DecoderOptions } from './types.js';

interface TrialFailure {
    variant: KeyVariant;
    error: RepairFileError;
}

function readU32LE(buf: Uint8Array, offset: number, what: string): number {
    if (!Number.isInteger(offset) || offset < 0 || offset + 4 > buf.length) {
        throw new FramingError(`${what} at offset ${offset} is outside the ${buf.length}-byte buffer`);
    }
    return (buf[offset] | (buf[offset + 1] << 8) | (buf[offset + 2] << 16) | (buf[offset + 3] << 24)) >>> 0;
}

/**
 * Decodes a PCB repair container: strips the vendor encryption (if any) and
 * inflates the content and description documents.
 *
 * The container carries no header saying how it was encrypted, so each
 * candidate key is tried in turn and the zlib header byte behind the content
 * length prefix decides whether a trial is plausible.
 */
export class ContainerDecoder {
    private readonly data: Uint8Array;
    private readonly options: Required<DecoderOptions>;

    constructor(data: Uint8Array, options: DecoderOptions = {}) {
        this.data = data;
        const defaults: Required<DecoderOptions> = {
            logger: null,
            maxDecompressedSize: DEFAULT_MAX_DECOMPRESSED_SIZE,
            variants: DEFAULT_TRIAL_ORDER,
        };
        this.options = { ...defaults, ...options };
    }

    /**
     * Runs every key trial in order and returns the first that unpacks.
     *
     * When all trials fail, the last failure that got past the magic check is
     * thrown; an earlier key can hit the zlib header by chance. If none did, an
     * {@link InvalidMagicError} listing the variants is thrown.
     */
    decode(): DecodedContainer {
        const failures: TrialFailure[] = [];

        for (const variant of this.options.variants) {
            try {
                const decoded = this.tryVariant(variant);
                this.options.logger?.info?.(`Container decoded with key variant '${variant}'`);
                return decoded;
            } catch (err) {
                if (!(err instanceof RepairFileError)) throw err;
                this.options.logger?.warn?.(`Key variant '${variant}' rejected: ${err.message}`);
                failures.push({ variant, error: err });
            }
        }

        for (let i = failures.length - 1; i >= 0; i--) {
            if (!(failures[i].error instanceof InvalidMagicError)) {
                throw failures[i].error;
            }
        }
        const tried = failures.map((f) => f.variant).join(', ');
        throw new InvalidMagicError(`No key variant produced a zlib header (tried: ${tried || 'none'})`);
    }

    /**
     * Runs a single key trial.
     */
    tryVariant(variant: KeyVariant): DecodedContainer {
        const plain = variant === 'none' ? this.data : cfb8Decrypt(this.data, getExpandedKey(variant));

        if (plain.length <= MAGIC_OFFSET || plain[MAGIC_OFFSET] !== ZLIB_MAGIC) {
            throw new InvalidMagicError(`Key variant '${variant}': byte ${MAGIC_OFFSET} is not the zlib header 0x78`);
        }

        const content = this.readContent(plain);
        const description = this.readDescription(plain);

        return { content, description, keyVariant: variant };
    }

    private readContent(plain: Uint8Array): Uint8Array {
        const contentLen = readU32LE(plain, 0, 'Content length');
        this.checkLimit(contentLen, 'Content');
        return ZlibCodec.decompress(plain.subarray(LENGTH_PREFIX_SIZE), contentLen, 'Content');
    }

    private readDescription(plain: Uint8Array): Uint8Array {
        const end = plain.length;

        // Trailing word: distance back from the trailer to the pointer slot.
        const distance = readU32LE(plain, end - POINTER_SIZE, 'Pointer distance');

        // Pointer slot: absolute offset of the description block.
        const slot = end - distance - POINTER_SIZE;
        const descriptionOffset = readU32LE(plain, slot, 'Description pointer');

        const descriptionLen = readU32LE(plain, descriptionOffset, 'Description length');
        this.checkLimit(descriptionLen, 'Description');

        const streamStart = descriptionOffset + LENGTH_PREFIX_SIZE;
        const streamEnd = end - POINTER_SIZE;
        if (streamStart > streamEnd) {
            throw new FramingError(`Description stream starts at ${streamStart}, past the trailer at ${streamEnd}`);
        }

        return ZlibCodec.decompress(plain.subarray(streamStart, streamEnd), descriptionLen, 'Description');
    }

    private checkLimit(declared: number, label: string): void {
        if (declared > this.options.maxDecompressedSize) {
            throw new LimitExceededError(
                `${label} declares ${declared} bytes, above the ${this.options.maxDecompressedSize}-byte limit`
            );
        }
    }
}

export function decodeContainer(raw: Uint8Array, options?: DecoderOptions): DecodedContainer {
    return new ContainerDecoder(raw, options).decode();
}

export function tryDecodeWith(raw: Uint8Array, variant: KeyVariant, options?: DecoderOptions): DecodedContainer {
    return new ContainerDecoder(raw, options).tryVariant(variant);
}
