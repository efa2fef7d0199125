/**
 * CLI: Repair file dump
 *
 * Usage:  tsx tools/parse.ts <file> [--verbose]
 *
 * Decodes and parses an FZ/CAE file and prints the board header, record
 * counts and bill of materials as JSON.
 */

import { readFile } from 'node:fs/promises';
import { PcbRepair } from '../src/index.js';
import { consoleLogger, stage } from './console-logger.js';

const args = process.argv.slice(2);
const verbose = args.includes('--verbose');
const file = args.find((a) => !a.startsWith('--'));

async function main() {
    if (!file) {
        console.error('Usage: tsx tools/parse.ts <file> [--verbose]');
        process.exit(2);
    }

    const raw = new Uint8Array(await readFile(file));
    const logger = consoleLogger(verbose);

    const decoded = stage('opening', file, () => PcbRepair.decode(raw, { logger }));
    const parsed = stage('parsing', file, () => PcbRepair.parse(decoded));

    const { content, description } = parsed;
    console.log(JSON.stringify({
        keyVariant: decoded.keyVariant,
        board: {
            model: description.boardModel,
            revision: description.revision,
            extendedModel: description.extendedBoardModel,
            extendedRevision: description.extendedRevision,
            partNumber: description.partNumber,
        },
        units: content.units,
        counts: {
            symbols: content.symbols.length,
            pins: content.pins.length,
            testVias: content.testVias.length,
            graphicData: content.graphicData.length,
            classedGraphicData: content.classedGraphicData.length,
        },
        components: description.components,
    }, (_key, value) => (typeof value === 'bigint' ? value.toString() : value), 2));
}

try {
    await main();
} catch (err: unknown) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
}
