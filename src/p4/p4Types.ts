// Environment overrides read from a .p4config file (P4PORT, P4CLIENT, ...)
export type P4ConfigOverrides = Record<string, string>;

// Interface for the result of a p4 command
export interface P4CommandResult {
    output?: string; // Trimmed stdout, absent when empty
    error?: string;  // Trimmed stderr, absent when empty. Set even if p4 exited 0.
}

// Raw output of a finished child process, before decoding
export interface RawProcessOutput {
    stdout: Buffer;
    stderr: Buffer;
    exitCode: number | null;
}

export interface ProcessRunOptions {
    cwd?: string;
    env: NodeJS.ProcessEnv;
}

// Runs a command line through the shell and resolves once the process has closed
export type ProcessRunner = (
    command: string,
    options: ProcessRunOptions
) => Promise<RawProcessOutput>;

// Anything with appendLine, e.g. a vscode.OutputChannel
export interface P4Logger {
    appendLine(value: string): void;
}

// Surfaces a transient warning to the user
export interface P4Notifier {
    showWarning(message: string): void;
}

export interface P4Settings {
    command: string;          // p4 executable
    autoOpen: boolean;        // p4 edit before saving a dirty file
    autoAdd: boolean;         // p4 add after saving
    warningsEnabled: boolean; // show warnings, otherwise only log them
    debugP4Commands: boolean;
}

export const DEFAULT_P4_SETTINGS: P4Settings = {
    command: "p4",
    autoOpen: true,
    autoAdd: false,
    warningsEnabled: true,
    debugP4Commands: false,
};

// Define the type for the run function signature used by commands
export type RunCommandFunction = (
    commandTemplate: string,
    activeFilePath?: string
) => Promise<P4CommandResult>;

// Define the context required by command functions
export interface P4CommandContext {
    run: RunCommandFunction;
    logger: P4Logger;
    p4Path: string;
}

export type P4OutputLanguage = "diff" | "text";

/**
 * Editor-side collaborators the actions need. The VS Code extension implements
 * this; tests provide a recording fake.
 */
export interface P4Host extends P4Notifier {
    getActiveFilePath(): string | undefined;
    showOutput(content: string, language: P4OutputLanguage): Promise<void>;
    closeActiveView(): Promise<void>;
    revertActiveView(): Promise<void>;
    /** Resolves to undefined when the user cancels the prompt. */
    promptPassword(userName?: string): Promise<string | undefined>;
}
