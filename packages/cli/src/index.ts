#!/usr/bin/env node
/**
 * PTA Reimbursements CLI
 *
 * The CLI owns all file I/O and console output; the core only turns OCR
 * text into records and ledger rows.
 */

import { parseCommandLine, USAGE } from './args.js';
import { extractCommand } from './commands/extract.js';
import { processForms } from './commands/process.js';

async function main(): Promise<number> {
    const command = parseCommandLine(process.argv.slice(2));

    switch (command.kind) {
        case 'help':
            console.log(USAGE);
            return 0;
        case 'invalid':
            console.error(`✖ Error: ${command.message}\n`);
            console.error(USAGE);
            return 1;
        case 'extract':
            return extractCommand(command.files, command.options);
        case 'process':
            return processForms(command.files, command.options);
    }
}

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((err: unknown) => {
        console.error('Unexpected error:', err instanceof Error ? err.message : err);
        process.exit(1);
    });
