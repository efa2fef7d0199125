import type { Decimal } from '../pcbrepair/decimal.js';
import type { FootprintInfo } from '../pcbrepair/types.js';

export interface KicadFootprintOptions {
    /** Name of the repair file the footprint came from, used in `descr`. */
    source: string;
    /** Generation date, written as the footprint `version`. */
    date: Date;
}

const GENERATOR = 'pcbrepair_fpextract';
const FOOTPRINT_EXTENSION = '.kicad_mod';

function sanitize(name: string): string {
    return name.replace(/[\\/:*?"<>|\x00-\x1f]/g, '_');
}

function formatNumber(value: Decimal): string {
    return value.isZero() ? '0' : value.toFixed();
}

function quote(text: string): string {
    return `"${text.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function formatDate(date: Date): string {
    const y = date.getUTCFullYear().toString().padStart(4, '0');
    const m = (date.getUTCMonth() + 1).toString().padStart(2, '0');
    const d = date.getUTCDate().toString().padStart(2, '0');
    return `${y}${m}${d}`;
}

/**
 * Renders one footprint as a KiCad `.kicad_mod` s-expression. Every pin
 * becomes a round SMD pad.
 */
export function renderKicadFootprint(name: string, info: FootprintInfo, options: KicadFootprintOptions): string {
    const lines: string[] = [
        `(footprint ${quote(name)}`,
        `  (version ${formatDate(options.date)})`,
        `  (generator ${GENERATOR})`,
        `  (descr ${quote(`Automatically generated footprint from ${options.source}`)})`,
        `  (tags "generated")`,
        `  (property "Reference" "U" (at 0 0) (effects (font (size 1 1) (thickness 0.15))))`,
        `  (property "Value" "U1" (at 0 1.5) (effects (font (size 1 1) (thickness 0.15))))`,
        `  (fp_text reference "U" (at 0 0) (layer "F.SilkS")`,
        `    (effects (font (size 1 1) (thickness 0.15)))`,
        `  )`,
        `  (fp_text value "U1" (at 0 1.5) (layer "F.Fab")`,
        `    (effects (font (size 1 1) (thickness 0.15)))`,
        `  )`,
    ];

    for (const pin of info.pins) {
        const size = formatNumber(pin.radiusMm);
        lines.push(
            `  (pad ${quote(pin.number)} smd circle (at ${formatNumber(pin.xMm)} ${formatNumber(pin.yMm)}) (size ${size} ${size}) (layers F.Cu F.Paste F.Mask)`,
            `  )`
        );
    }

    lines.push(')');
    return lines.join('\n') + '\n';
}

/**
 * File name for a footprint; refdes values may contain path separators.
 */
export function footprintFileName(name: string): string {
    return `${sanitize(name)}${FOOTPRINT_EXTENSION}`;
}

/**
 * Assigns each footprint a distinct file name. Names that sanitize to the same
 * file (compared case-insensitively) get a `_2`, `_3`, ... suffix in order.
 */
export function footprintFileNames(names: Iterable<string>): Map<string, string> {
    const taken = new Set<string>();
    const files = new Map<string, string>();

    for (const name of names) {
        const stem = sanitize(name);
        let file = `${stem}${FOOTPRINT_EXTENSION}`;
        for (let n = 2; taken.has(file.toLowerCase()); n++) {
            file = `${stem}_${n}${FOOTPRINT_EXTENSION}`;
        }
        taken.add(file.toLowerCase());
        files.set(name, file);
    }
    return files;
}
