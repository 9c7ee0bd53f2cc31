import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import {
    combineDocuments,
    extractFieldsWithTrace,
    toDisplayRecord,
    FIELD_KEYS,
    DISPLAY_LABELS
} from '@pta-reimburse/core';
import { log, info, error } from '../utils/console.js';
import { formatDisplayTable } from '../utils/table.js';
import { errorMessage } from '../utils/fs.js';
import type { ExtractOptions } from '../types.js';

/**
 * `reimburse extract`: print the fields recognized in one or more OCR text
 * files, read as attachments of a single submission. Writes nothing.
 *
 * @returns Process exit code
 */
export async function extractCommand(files: string[], options: ExtractOptions): Promise<number> {
    if (files.length === 0) {
        error('Error: extract needs at least one file.');
        return 1;
    }

    const texts: string[] = [];
    for (const file of files) {
        try {
            texts.push(await readFile(file, 'utf-8'));
        } catch (err) {
            error(`Error: Cannot read ${file}: ${errorMessage(err)}`);
            return 1;
        }
    }

    const { record, trace } = extractFieldsWithTrace(combineDocuments(texts));
    const display = toDisplayRecord(record);

    if (options.json) {
        log(JSON.stringify(options.explain ? { fields: display, rules: trace } : display, null, 2));
        return 0;
    }

    const title = files.length === 1 ? basename(files[0]) : `${files.length} attachments`;
    log(formatDisplayTable(display, title));

    if (options.explain) {
        log('\nMatched rules:');
        for (const key of FIELD_KEYS) {
            log(`  ${DISPLAY_LABELS[key].padEnd(14)} ${trace[key] ?? '-'}`);
        }
    }

    const found = FIELD_KEYS.filter(key => record[key] !== '').length;
    info(`${found} of ${FIELD_KEYS.length} fields recognized`);
    return 0;
}
