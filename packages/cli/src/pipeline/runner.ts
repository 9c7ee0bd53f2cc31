import type { PipelineState, PipelineStep } from './types.js';
import { detectInputs } from './steps/detect.js';
import { checkDuplicates } from './steps/dedup.js';
import { extractForms } from './steps/extract.js';
import { reviewForms } from './steps/review.js';
import { classifyForms } from './steps/classify.js';
import { appendToLedger } from './steps/ledger.js';
import { archiveInputs } from './steps/archive.js';
import type { Workspace, ProcessOptions, PromptIO } from '../types.js';
import type { WorkspaceConfig } from '@pta-reimburse/shared';
import { arrow, error } from '../utils/console.js';
import { errorMessage } from '../utils/fs.js';

export const PIPELINE_STEPS: readonly { name: string; fn: PipelineStep }[] = [
    { name: 'Input Detection', fn: detectInputs },
    { name: 'Duplicate Check', fn: checkDuplicates },
    { name: 'Extraction', fn: extractForms },
    { name: 'Review', fn: reviewForms },
    { name: 'Classification', fn: classifyForms },
    { name: 'Ledger Append', fn: appendToLedger },
    { name: 'Archiving', fn: archiveInputs },
];

export interface PipelineContext {
    workspace: Workspace;
    config: WorkspaceConfig;
    options: ProcessOptions;
    io: PromptIO;
    interactive: boolean;
    inputs: string[];
}

/**
 * Orchestrates the execution of the processing pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs. A step that
 * throws is recorded as a fatal error of that step.
 */
export async function runPipeline(
    context: PipelineContext,
    steps: readonly { name: string; fn: PipelineStep }[] = PIPELINE_STEPS
): Promise<PipelineState> {
    let state: PipelineState = {
        ...context,
        startedAt: new Date(),
        forms: [],
        manifest: { processed: {} },
        warnings: [],
        errors: [],
    };

    for (let i = 0; i < steps.length; i++) {
        const step = steps[i];
        arrow(`Step ${i + 1}/${steps.length}: ${step.name}...`);

        try {
            state = await step.fn(state);
        } catch (err) {
            state.errors.push({
                step: step.name,
                message: errorMessage(err),
                fatal: true,
                error: err
            });
        }

        if (state.errors.some(e => e.fatal)) {
            error(`Fatal error in step "${step.name}". Stopping.`);
            break;
        }
    }

    return state;
}
