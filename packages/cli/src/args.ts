import type { ExtractOptions, ProcessOptions } from './types.js';

export const USAGE = `PTA Reimbursements CLI v1.0.0

Usage:
  reimburse extract <file...> [--json] [--explain]
  reimburse process [file...] [--dry-run] [--yes] [--force] [--workspace <dir>]

Commands:
  extract   Print the fields recognized in OCR text files (read-only)
  process   Review forms and append them to the workspace ledger
            (defaults to every .txt file in inbox/)

Options:
  --json            Print the extracted fields as JSON
  --explain         Show which rule matched each field
  --dry-run         Run every step without writing or archiving
  --yes, -y         Accept extracted values and first list options without prompting
  --force           Reprocess files already recorded in processed.json
  --workspace <dir> Use <dir> as the workspace root`;

export type Command =
    | { kind: 'help' }
    | { kind: 'extract'; files: string[]; options: ExtractOptions }
    | { kind: 'process'; files: string[]; options: ProcessOptions }
    | { kind: 'invalid'; message: string };

/**
 * Parses process.argv (without the node and script entries).
 */
export function parseCommandLine(args: readonly string[]): Command {
    if (args.length === 0 || args[0] === '--help' || args[0] === '-h' || args[0] === 'help') {
        return { kind: 'help' };
    }

    const [command, ...rest] = args;
    const files: string[] = [];
    const flags = new Set<string>();
    let workspace: string | undefined;

    for (let i = 0; i < rest.length; i++) {
        const arg = rest[i];
        if (arg === '--workspace') {
            const value = rest[i + 1];
            if (value === undefined || value.startsWith('-')) {
                return { kind: 'invalid', message: '--workspace needs a directory' };
            }
            workspace = value;
            i++;
        } else if (arg.startsWith('--workspace=')) {
            workspace = arg.slice('--workspace='.length);
        } else if (arg === '-y') {
            flags.add('--yes');
        } else if (arg.startsWith('-')) {
            flags.add(arg);
        } else {
            files.push(arg);
        }
    }

    const allowed = command === 'extract'
        ? ['--json', '--explain']
        : ['--dry-run', '--yes', '--force'];
    const unknown = [...flags].find(f => !allowed.includes(f));

    if (command === 'extract') {
        if (unknown !== undefined || workspace !== undefined) {
            return { kind: 'invalid', message: `Unknown option for extract: ${unknown ?? '--workspace'}` };
        }
        return {
            kind: 'extract',
            files,
            options: { json: flags.has('--json'), explain: flags.has('--explain') },
        };
    }

    if (command === 'process') {
        if (unknown !== undefined) {
            return { kind: 'invalid', message: `Unknown option for process: ${unknown}` };
        }
        return {
            kind: 'process',
            files,
            options: {
                dryRun: flags.has('--dry-run'),
                yes: flags.has('--yes'),
                force: flags.has('--force'),
                workspace,
            },
        };
    }

    return { kind: 'invalid', message: `Unknown command: ${command}` };
}
