/**
 * PCB repair file public API
 *
 * @module pcb-repair-decoder
 */

import { ContainerDecoder, tryDecodeWith } from './pcbrepair/decode.js';
import { encodeContainer } from './pcbrepair/encode.js';
import { parseContent } from './pcbrepair/content-parser.js';
import { parseDescription } from './pcbrepair/description-parser.js';
import { parseRepairFile } from './pcbrepair/parse.js';
import { interpret } from './pcbrepair/interpret.js';
import type {
    DecodedContainer, DecoderOptions, EncoderOptions, InterpreterOptions,
    ParsedRepairFile, InterpretedRepairFile
} from './pcbrepair/types.js';

export type {
    DecodedContainer, DecoderOptions, EncoderOptions, InterpreterOptions, RepairLogger,
    ParsedContent, ParsedRepairFile, SymbolRecord, PinRecord, TestViaRecord,
    GraphicDataRecord, ClassedGraphicDataRecord, GraphicFields,
    Description, BomComponent, InterpretedPin, FootprintInfo, InterpretedRepairFile
} from './pcbrepair/types.js';
export { Units, DEFAULT_TRIAL_ORDER } from './pcbrepair/format.js';
export type { KeyVariant } from './pcbrepair/format.js';
export {
    RepairFileError, InvalidMagicError, SizeMismatchError, FramingError, CorruptStreamError,
    LimitExceededError, RecordError, MalformedRecordError, BadIntegerError, BadDecimalError,
    MissingHeaderError
} from './pcbrepair/errors.js';
export type { RepairFileErrorCode } from './pcbrepair/errors.js';
export { Decimal, MM_PER_MIL } from './pcbrepair/decimal.js';
export { FZ_EXPANDED_KEY, CAE_EXPANDED_KEY, cfb8Decrypt, cfb8Encrypt } from './pcbrepair/cipher.js';
export { rc6EncryptBlock, expandKey } from './pcbrepair/rc6.js';
export type { ExpandedKey } from './pcbrepair/rc6.js';
export { ContainerDecoder, decodeContainer, tryDecodeWith } from './pcbrepair/decode.js';
export { encodeContainer } from './pcbrepair/encode.js';
export { ContentParser, SectionState, parseContent } from './pcbrepair/content-parser.js';
export { parseDescription } from './pcbrepair/description-parser.js';
export { parseRepairFile } from './pcbrepair/parse.js';
export { interpret } from './pcbrepair/interpret.js';
export { renderKicadFootprint, footprintFileName, footprintFileNames } from './export/kicad.js';
export type { KicadFootprintOptions } from './export/kicad.js';

export interface OpenedRepairFile {
    decoded: DecodedContainer;
    parsed: ParsedRepairFile;
    interpreted: InterpretedRepairFile;
}

export const PcbRepair = {
    /**
     * Decrypts (if needed) and inflates a container into its two documents.
     */
    decode: (raw: Uint8Array, options?: DecoderOptions): DecodedContainer => {
        return new ContainerDecoder(raw, options).decode();
    },

    /** Runs a single key trial. */
    decodeWith: tryDecodeWith,

    parseContent,

    parseDescription,

    /**
     * Parses both documents of a decoded container.
     */
    parse: parseRepairFile,

    interpret,

    /**
     * Decode, parse and interpret in one call.
     */
    open: (raw: Uint8Array, options: DecoderOptions & InterpreterOptions = {}): OpenedRepairFile => {
        const decoded = new ContainerDecoder(raw, options).decode();
        const parsed = parseRepairFile(decoded);
        const interpreted = interpret(parsed.content, { logger: options.logger });
        return { decoded, parsed, interpreted };
    },

    /**
     * Builds a container around two documents.
     */
    encode: (content: Uint8Array, description: Uint8Array, options?: EncoderOptions): Uint8Array => {
        return encodeContainer(content, description, options);
    },
};

export default PcbRepair;
