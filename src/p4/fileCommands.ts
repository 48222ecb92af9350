import { P4CommandContext, P4CommandResult } from "./p4Types";
import { isPathUnderRoot, quoteArg } from "./p4Utils";

// Re-export the context type so other modules can use it
export type { P4CommandContext };

/**
 * Returns the root directory of the client workspace that applies to
 * `activeFilePath` (through its folder and .p4config).
 * @returns undefined if p4 reported an error or printed nothing.
 */
export async function p4clientRoot(
  context: P4CommandContext,
  activeFilePath?: string,
): Promise<string | undefined> {
  const result = await context.run(
    `${context.p4Path} -F %clientRoot% -z tag info`,
    activeFilePath,
  );
  if (result.error || !result.output) {
    return undefined;
  }
  return result.output;
}

/**
 * Returns true if the file is below the client root. An unknown root (p4
 * error, no client) means false.
 */
export async function isFileInDepot(
  context: P4CommandContext,
  filePath: string | undefined,
): Promise<boolean> {
  if (!filePath) {
    return false;
  }
  const clientRoot = await p4clientRoot(context, filePath);
  if (!clientRoot) {
    context.logger.appendLine(
      `Could not determine the client root for ${filePath}.`,
    );
    return false;
  }
  return isPathUnderRoot(filePath, clientRoot);
}

async function p4fileAction(
  context: P4CommandContext,
  action: string,
  filePath: string,
): Promise<P4CommandResult> {
  if (!filePath) {
    throw new Error(`File path must be provided for p4 ${action}.`);
  }
  context.logger.appendLine(`Executing \`p4 ${action} ${filePath}\`...`);
  const result = await context.run(
    `${context.p4Path} ${action} ${quoteArg(filePath)}`,
    filePath,
  );
  if (!result.error) {
    context.logger.appendLine(
      `\`p4 ${action} ${filePath}\` executed successfully.`,
    );
  }
  return result;
}

export async function p4edit(
  context: P4CommandContext,
  filePath: string,
): Promise<P4CommandResult> {
  return p4fileAction(context, "edit", filePath);
}

export async function p4add(
  context: P4CommandContext,
  filePath: string,
): Promise<P4CommandResult> {
  return p4fileAction(context, "add", filePath);
}

/**
 * Marks the file for delete. p4 removes the local copy.
 */
export async function p4delete(
  context: P4CommandContext,
  filePath: string,
): Promise<P4CommandResult> {
  return p4fileAction(context, "delete", filePath);
}

/**
 * Reverts the file, discarding local changes.
 */
export async function p4revert(
  context: P4CommandContext,
  filePath: string,
): Promise<P4CommandResult> {
  return p4fileAction(context, "revert", filePath);
}

/**
 * Unified diff of one opened file against the have revision.
 */
export async function p4diff(
  context: P4CommandContext,
  filePath: string,
): Promise<P4CommandResult> {
  return p4fileAction(context, "diff -dU", filePath);
}

/**
 * Unified diff of every opened file in the workspace. `activeFilePath` only
 * selects the working directory and .p4config.
 */
export async function p4diffAll(
  context: P4CommandContext,
  activeFilePath?: string,
): Promise<P4CommandResult> {
  context.logger.appendLine("Executing `p4 diff -dU`...");
  return context.run(`${context.p4Path} diff -dU`, activeFilePath);
}

export async function p4opened(
  context: P4CommandContext,
  activeFilePath?: string,
): Promise<P4CommandResult> {
  context.logger.appendLine("Executing `p4 opened`...");
  return context.run(`${context.p4Path} opened`, activeFilePath);
}

export async function p4logout(
  context: P4CommandContext,
  activeFilePath?: string,
): Promise<P4CommandResult> {
  context.logger.appendLine("Executing `p4 logout`...");
  return context.run(`${context.p4Path} logout`, activeFilePath);
}

/**
 * Stores the password with `p4 set P4PASSWD=...`. An empty password clears it.
 */
export async function p4setPassword(
  context: P4CommandContext,
  password: string,
  activeFilePath?: string,
): Promise<P4CommandResult> {
  const value = password ? quoteArg(password) : "";
  context.logger.appendLine(
    password ? "Executing `p4 set P4PASSWD=***`..." : "Executing `p4 set P4PASSWD=`...",
  );
  return context.run(`${context.p4Path} set P4PASSWD=${value}`, activeFilePath);
}
