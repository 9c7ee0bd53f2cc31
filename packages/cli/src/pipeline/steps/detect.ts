import { readdir, stat } from 'node:fs/promises';
import { basename, dirname, extname, join, resolve } from 'node:path';
import type { PipelineStep, FormJob } from '../types.js';
import { hashFile } from '../../utils/hash.js';
import { errorMessage, toUtcDay } from '../../utils/fs.js';

/**
 * Step 1: Input Detection
 * Takes the files named on the command line, or every OCR text file in the
 * inbox, and hashes each one. Every file is one form submission.
 */
export const detectInputs: PipelineStep = async (state) => {
    const inbox = resolve(state.workspace.inbox);
    let paths: string[];

    if (state.inputs.length > 0) {
        paths = state.inputs.map(p => resolve(p));
    } else {
        try {
            paths = (await readdir(inbox))
                .filter(name => !name.startsWith('.') && !name.startsWith('~'))
                .filter(name => extname(name).toLowerCase() === '.txt')
                .sort()
                .map(name => join(inbox, name));
        } catch (err) {
            state.errors.push({
                step: 'detect',
                message: `Error scanning directory ${inbox}: ${errorMessage(err)}`,
                fatal: true,
                error: err
            });
            return state;
        }
    }

    const forms: FormJob[] = [];
    for (const path of paths) {
        try {
            const s = await stat(path);
            if (!s.isFile()) {
                state.warnings.push(`Not a file, skipped: ${path}`);
                continue;
            }
            forms.push({
                file: {
                    path,
                    filename: basename(path),
                    hash: await hashFile(path),
                    receivedAt: toUtcDay(s.mtime),
                    fromInbox: dirname(path) === inbox
                },
                status: 'pending'
            });
        } catch (err) {
            state.errors.push({
                step: 'detect',
                message: `Cannot read ${path}: ${errorMessage(err)}`,
                fatal: false,
                error: err
            });
        }
    }

    state.forms = forms;

    if (forms.length === 0) {
        state.errors.push({
            step: 'detect',
            message: state.inputs.length > 0
                ? 'None of the given files could be read.'
                : `No .txt files found in ${inbox}.`,
            fatal: true
        });
    }

    return state;
};
