import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { WorkspaceConfigSchema, type DisplayRecord, type WorkspaceConfig } from '@pta-reimburse/shared';
import type { PipelineState } from '../../src/pipeline/types.js';
import type { PromptIO, ProcessOptions } from '../../src/types.js';
import { resolveWorkspace } from '../../src/workspace/paths.js';

export const SAMPLE_FORM = [
    'Check Requestor: Jane Kim',
    'Date: 03/14/2024',
    'Amount Requested: $45.00',
    "Child's Name: Sam Kim",
    'Teacher / Grade: Mrs. Lanford - 3rd',
    '☑ Teacher reimbursement',
    'For: Spring Party',
    'Payable To: Jane Kim',
    '☑ Send home with child',
].join('\n');

export const SAMPLE_DISPLAY: DisplayRecord = {
    Requestor: 'Jane Kim',
    Date: '03/14/2024',
    Amount: '$45.00',
    Email: '',
    Phone: '',
    Child: 'Sam Kim',
    'Teacher/Grade': 'Mrs. Lanford - 3rd',
    Type: 'Teacher',
    Event: 'Spring Party',
    'Payable To': 'Jane Kim',
    Delivery: 'Send home with child',
};

export interface ScriptedIO extends PromptIO {
    /** Every question asked and message printed, in order */
    output: string[];
}

/**
 * PromptIO that answers from a fixed script and fails on an unexpected prompt.
 */
export function scriptedIO(answers: string[] = []): ScriptedIO {
    const queue = [...answers];
    const output: string[] = [];
    return {
        output,
        async ask(question: string): Promise<string> {
            output.push(question);
            const answer = queue.shift();
            if (answer === undefined) {
                throw new Error(`Unexpected prompt: ${question}`);
            }
            return answer;
        },
        print(message: string): void {
            output.push(message);
        },
        close(): void {},
    };
}

export async function makeTempWorkspace(): Promise<string> {
    const root = await mkdtemp(join(tmpdir(), 'reimburse-'));
    await mkdir(join(root, 'inbox'), { recursive: true });
    await mkdir(join(root, 'config'), { recursive: true });
    await writeFile(join(root, 'config', 'config.yaml'), '');
    return root;
}

export async function removeTempWorkspace(root: string): Promise<void> {
    await rm(root, { recursive: true, force: true });
}

export function makeState(
    root: string,
    overrides: {
        options?: Partial<ProcessOptions>;
        config?: WorkspaceConfig;
        io?: PromptIO;
        interactive?: boolean;
        inputs?: string[];
    } = {}
): PipelineState {
    const config = overrides.config ?? WorkspaceConfigSchema.parse({});
    return {
        workspace: resolveWorkspace(root, config),
        config,
        options: { dryRun: false, force: false, yes: true, ...overrides.options },
        io: overrides.io ?? scriptedIO(),
        interactive: overrides.interactive ?? false,
        inputs: overrides.inputs ?? [],
        startedAt: new Date(Date.UTC(2024, 2, 20, 12)),
        forms: [],
        manifest: { processed: {} },
        warnings: [],
        errors: [],
    };
}
