import type { DisplayRecord, ExtractionOutput, LedgerRow } from '@pta-reimburse/core';
import type { ProcessedManifest, WorkspaceConfig } from '@pta-reimburse/shared';
import type { Workspace, ProcessOptions, PromptIO } from '../types.js';

/**
 * One OCR text file handed to the pipeline.
 */
export interface InputFile {
    path: string;
    filename: string;
    hash: string;
    /** File modification time, used as the ledger's Date Received */
    receivedAt: Date;
    /** True when the file sits in the workspace inbox and is archived afterwards */
    fromInbox: boolean;
}

export type FormStatus = 'pending' | 'duplicate' | 'failed' | 'recorded';

/**
 * A single form submission as it moves through the steps.
 */
export interface FormJob {
    file: InputFile;
    status: FormStatus;
    text?: string;
    extraction?: ExtractionOutput;
    /** Extracted values after reviewer corrections */
    display?: DisplayRecord;
    paymentType?: string;
    budgetCategory?: string;
    budgetItem?: string;
    ledgerRow?: LedgerRow;
}

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

/**
 * State object passed through the processing pipeline.
 */
export interface PipelineState {
    workspace: Workspace;
    config: WorkspaceConfig;
    options: ProcessOptions;
    io: PromptIO;
    /** Whether the reviewer is prompted; false under --yes or without a TTY */
    interactive: boolean;
    /** Explicit paths from the command line; empty means scan the inbox */
    inputs: string[];
    startedAt: Date;

    // Accumulated during pipeline execution
    forms: FormJob[];
    manifest: ProcessedManifest;

    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;

/**
 * Forms still headed for the ledger.
 */
export function pendingForms(state: PipelineState): FormJob[] {
    return state.forms.filter(f => f.status === 'pending');
}
