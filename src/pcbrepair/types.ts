import type { Decimal } from './decimal.js';
import type { KeyVariant, Units } from './format.js';

export type RepairLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

export type DecoderOptions = {
    /** Optional logger hook; the decoder never writes to the console itself. */
    logger?: RepairLogger | null;
    /** Upper bound for either declared decompressed length. Default 256 MiB. */
    maxDecompressedSize?: number;
    /** Key trial order. Default `['none', 'fz', 'cae']`. */
    variants?: readonly KeyVariant[];
};

export type EncoderOptions = {
    /** Key the finished container is encrypted with. Default `'none'`. */
    variant?: KeyVariant;
    /** zlib level (0-9) for both documents. Default 6. */
    compressionLevel?: number;
};

export type InterpreterOptions = {
    logger?: RepairLogger | null;
};

export interface DecodedContainer {
    readonly content: Uint8Array;
    readonly description: Uint8Array;
    /** Key trial that produced a valid buffer. */
    readonly keyVariant: KeyVariant;
}

export interface SymbolRecord {
    readonly refdes: string;
    readonly compInsertionCode: bigint;
    readonly symName: string;
    readonly symMirror: boolean;
    /** Rotation in degrees. */
    readonly symRotate: number;
}

/**
 * A pin row. Coordinates and radius are in the document's {@link ParsedContent.units}.
 */
export interface PinRecord {
    readonly netName: string;
    readonly refdes: string;
    readonly pinNumber: string;
    readonly pinName: string;
    readonly pinX: Decimal;
    readonly pinY: Decimal;
    readonly testPoint: string;
    readonly radius: Decimal;
}

export interface TestViaRecord {
    readonly testVia: string;
    readonly netName: string;
    readonly refdes: string;
    readonly pinNumber: string;
    readonly pinName: string;
    readonly viaX: Decimal;
    readonly viaY: Decimal;
    readonly testPoint: string;
    readonly radius: Decimal;
}

/** Nine raw graphic fields; their meaning depends on `recordTag`. */
export type GraphicFields = readonly [string, string, string, string, string, string, string, string, string];

export interface GraphicDataRecord {
    readonly graphicDataName: string;
    readonly graphicDataNumber: bigint;
    readonly recordTag: string;
    readonly graphicData: GraphicFields;
    readonly subclass: string;
    readonly symName: string;
    readonly refdes: string;
}

export interface ClassedGraphicDataRecord {
    readonly className: string;
    readonly subclass: string;
    readonly graphicDataName: string;
    readonly graphicDataNumber: bigint;
    readonly recordTag: string;
    readonly graphicData: GraphicFields;
    readonly netName: string;
}

export interface ParsedContent {
    readonly units: Units;
    readonly symbols: readonly SymbolRecord[];
    readonly pins: readonly PinRecord[];
    readonly testVias: readonly TestViaRecord[];
    readonly graphicData: readonly GraphicDataRecord[];
    readonly classedGraphicData: readonly ClassedGraphicDataRecord[];
}

export interface BomComponent {
    readonly partNumber: string;
    readonly description: string;
    readonly quantity: bigint;
    /** Reference designators, first-seen order, no duplicates. */
    readonly location: readonly string[];
    readonly alternatePartNumber: string;
}

export interface Description {
    readonly boardModel: string;
    readonly revision: string;
    readonly extendedBoardModel: string;
    readonly extendedRevision: string;
    readonly partNumber: string;
    readonly components: readonly BomComponent[];
}

export interface ParsedRepairFile {
    readonly content: ParsedContent;
    readonly description: Description;
}

export interface InterpretedPin {
    readonly name: string;
    readonly number: string;
    readonly xMm: Decimal;
    readonly yMm: Decimal;
    readonly radiusMm: Decimal;
}

export interface FootprintInfo {
    readonly pins: readonly InterpretedPin[];
}

export interface InterpretedRepairFile {
    /** Footprints keyed by refdes, in order of first appearance. */
    readonly footprints: ReadonlyMap<string, FootprintInfo>;
}
