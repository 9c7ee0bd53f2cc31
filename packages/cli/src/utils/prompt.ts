import { createInterface } from 'node:readline';
import type { ProcessOptions, PromptIO } from '../types.js';

export const INPUT_CLOSED = 'Input closed before an answer was given.';

/**
 * PromptIO backed by stdin/stdout. Once input closes (Ctrl-D, end of a
 * piped stream), pending and later questions reject with INPUT_CLOSED.
 */
export function createConsoleIO(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
): PromptIO {
    const rl = createInterface({ input, output });
    const pending = new Set<(err: Error) => void>();
    let closed = false;

    rl.on('close', () => {
        closed = true;
        for (const reject of pending) {
            reject(new Error(INPUT_CLOSED));
        }
        pending.clear();
    });

    return {
        ask(question: string): Promise<string> {
            return new Promise((resolve, reject) => {
                if (closed) {
                    reject(new Error(INPUT_CLOSED));
                    return;
                }
                pending.add(reject);
                rl.question(question, (answer) => {
                    pending.delete(reject);
                    resolve(answer);
                });
            });
        },
        print(message: string): void {
            console.log(message);
        },
        close(): void {
            rl.close();
        },
    };
}

/**
 * Whether prompts may be shown: a TTY is attached and --yes was not given.
 */
export function isInteractive(options: Pick<ProcessOptions, 'yes'>): boolean {
    return !options.yes && process.stdin.isTTY === true;
}

/**
 * Numbered selection. A number picks an option (or "Other" for a custom
 * value); typing an option's text picks it too. When there are no options
 * the answer is taken as free text.
 */
export async function selectFromList(
    options: readonly string[],
    prompt: string,
    io: PromptIO,
    allowOther: boolean = true
): Promise<string> {
    if (options.length === 0) {
        return (await io.ask(`\n${prompt}: `)).trim();
    }

    io.print(`\n${prompt}:`);
    options.forEach((option, i) => io.print(`  ${i + 1}. ${option}`));
    const otherIndex = options.length + 1;
    if (allowOther) {
        io.print(`  ${otherIndex}. Other (enter custom value)`);
    }

    while (true) {
        const choice = (await io.ask('\n> ')).trim();

        if (/^\d+$/.test(choice)) {
            const idx = parseInt(choice, 10);
            if (idx >= 1 && idx <= options.length) {
                return options[idx - 1];
            }
            if (allowOther && idx === otherIndex) {
                return (await io.ask('Enter custom value: ')).trim();
            }
            io.print(`Please enter a number between 1 and ${allowOther ? otherIndex : options.length}`);
            continue;
        }

        const direct = options.find((option) => option.toLowerCase() === choice.toLowerCase());
        if (direct !== undefined) {
            return direct;
        }

        if (allowOther && choice !== '') {
            const confirm = (await io.ask(`Use '${choice}' as custom value? (y/n): `)).trim().toLowerCase();
            if (confirm === 'y') {
                return choice;
            }
        }
        io.print('Invalid selection. Please enter a number or valid option.');
    }
}
