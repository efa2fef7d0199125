import { Decimal, MM_PER_MIL } from './decimal.js';
import { Units } from './format.js';
import type {
    ParsedContent, PinRecord, InterpretedPin, FootprintInfo, InterpretedRepairFile, InterpreterOptions
} from './types.js';

/** Pin numbers the vendor writes when a part has no real numbering. */
const PLACEHOLDER_PIN_NUMBERS: ReadonlySet<string> = new Set(['', '0']);

function effectivePinNumber(pin: PinRecord): string {
    return PLACEHOLDER_PIN_NUMBERS.has(pin.pinNumber) ? pin.pinName : pin.pinNumber;
}

function toMillimeters(value: Decimal, units: Units): Decimal {
    return units === Units.Mils ? value.times(MM_PER_MIL) : value;
}

function centered(pins: readonly InterpretedPin[]): InterpretedPin[] {
    const count = new Decimal(pins.length);
    const meanX = Decimal.sum(...pins.map((p) => p.xMm)).dividedBy(count);
    const meanY = Decimal.sum(...pins.map((p) => p.yMm)).dividedBy(count);

    return pins.map((p) => ({
        ...p,
        xMm: p.xMm.minus(meanX),
        yMm: p.yMm.minus(meanY),
    }));
}

/**
 * Turns parsed pin records into per-component footprints: pin numbers and
 * names are repaired, coordinates converted to millimeters, and each
 * component's pins are shifted so their centroid sits at the origin.
 */
export function interpret(content: ParsedContent, options: InterpreterOptions = {}): InterpretedRepairFile {
    const groups = new Map<string, InterpretedPin[]>();

    for (const pin of content.pins) {
        const number = effectivePinNumber(pin);
        const name = pin.pinName !== number ? pin.pinName : pin.netName;

        const interpreted: InterpretedPin = {
            name,
            number,
            xMm: toMillimeters(pin.pinX, content.units),
            yMm: toMillimeters(pin.pinY, content.units),
            radiusMm: toMillimeters(pin.radius, content.units),
        };

        const group = groups.get(pin.refdes);
        if (group) {
            group.push(interpreted);
        } else {
            groups.set(pin.refdes, [interpreted]);
        }
    }

    const footprints = new Map<string, FootprintInfo>();
    for (const [refdes, pins] of groups) {
        if (pins.length === 0) continue;
        footprints.set(refdes, { pins: centered(pins) });
    }

    options.logger?.info?.(`Interpreted ${content.pins.length} pins into ${footprints.size} footprints`);
    return { footprints };
}
