/**
 * CLI: Footprint extraction
 *
 * Usage:  tsx tools/fpextract.ts <file> [--verbose]
 *
 * Writes one KiCad footprint per component into `<stem>.pretty/` next to the
 * input file.
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import * as path from 'node:path';
import { PcbRepair, renderKicadFootprint, footprintFileName, footprintFileNames } from '../src/index.js';
import { consoleLogger, stage } from './console-logger.js';

const args = process.argv.slice(2);
const verbose = args.includes('--verbose');
const file = args.find((a) => !a.startsWith('--'));

async function main() {
    if (!file) {
        console.error('Usage: tsx tools/fpextract.ts <file> [--verbose]');
        process.exit(2);
    }

    const raw = new Uint8Array(await readFile(file));
    const logger = consoleLogger(verbose);

    const decoded = stage('opening', file, () => PcbRepair.decode(raw, { logger }));
    const parsed = stage('parsing', file, () => PcbRepair.parse(decoded));
    const interpreted = stage('interpreting', file, () => PcbRepair.interpret(parsed.content, { logger }));

    const stem = path.basename(file, path.extname(file));
    const outputDir = path.join(path.dirname(file), `${stem}.pretty`);
    await mkdir(outputDir, { recursive: true });

    const date = new Date();
    const files = footprintFileNames(interpreted.footprints.keys());
    for (const [name, info] of interpreted.footprints) {
        const fileName = files.get(name) ?? footprintFileName(name);
        if (fileName !== footprintFileName(name)) {
            console.error(`[warn] Footprint ${JSON.stringify(name)} written as ${fileName} to avoid a name clash`);
        }
        const text = renderKicadFootprint(name, info, { source: stem, date });
        await writeFile(path.join(outputDir, fileName), text);
    }

    console.log(`Wrote ${interpreted.footprints.size} footprints to ${outputDir}`);
}

try {
    await main();
} catch (err: unknown) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
}
