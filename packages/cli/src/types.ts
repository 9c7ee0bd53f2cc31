/**
 * Reimbursement CLI - Core Types
 */

export interface ProcessOptions {
    dryRun: boolean;
    force: boolean;
    yes: boolean;
    workspace?: string;
}

export interface ExtractOptions {
    json: boolean;
    explain: boolean;
}

export interface WorkspacePaths {
    configPath: string;
    ledgerPath: string;
    manifestPath: string;
}

export interface Workspace {
    root: string;
    inbox: string;
    archive: string;
    config: WorkspacePaths;
}

/**
 * Line-oriented terminal I/O, injectable so prompts can be scripted in tests.
 */
export interface PromptIO {
    ask(question: string): Promise<string>;
    print(message: string): void;
    close(): void;
}
