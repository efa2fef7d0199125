import { deflateSync, inflateSync } from 'node:zlib';
import { CorruptStreamError, SizeMismatchError } from './errors.js';

export interface StreamCodec {
    name: string;
    compress(data: Uint8Array, level?: number): Uint8Array;
    /**
     * Inflates one stream, which must expand to exactly `expectedSize` bytes.
     * Bytes after the end of the stream are ignored.
     */
    decompress(data: Uint8Array, expectedSize: number, label: string): Uint8Array;
}

function isBufferTooLarge(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ERR_BUFFER_TOO_LARGE';
}

/**
 * zlib (RFC 1950) codec used for both embedded documents.
 */
export const ZlibCodec: StreamCodec = {
    name: 'ZLIB',
    compress(data: Uint8Array, level: number = 6) {
        return new Uint8Array(deflateSync(data, { level }));
    },
    decompress(data: Uint8Array, expectedSize: number, label: string) {
        let inflated: Buffer;
        try {
            // One extra byte of headroom so an oversized stream is caught as a mismatch.
            inflated = inflateSync(data, { maxOutputLength: expectedSize + 1 });
        } catch (err) {
            if (isBufferTooLarge(err)) {
                throw new SizeMismatchError(
                    `${label}: decompressed size mismatch (expected ${expectedSize}, stream is larger)`,
                    expectedSize,
                    null
                );
            }
            throw new CorruptStreamError(
                `${label}: zlib stream rejected: ${err instanceof Error ? err.message : String(err)}`,
                err
            );
        }

        if (inflated.length !== expectedSize) {
            throw new SizeMismatchError(
                `${label}: decompressed size mismatch (expected ${expectedSize}, got ${inflated.length})`,
                expectedSize,
                inflated.length
            );
        }
        return new Uint8Array(inflated.buffer, inflated.byteOffset, inflated.byteLength);
    },
};
