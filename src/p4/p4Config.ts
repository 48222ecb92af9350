import * as fs from "fs/promises";
import * as path from "path";
import { P4ConfigOverrides } from "./p4Types";

export const P4CONFIG_FILE_NAME = ".p4config";

// Upper bound on directories visited while searching upwards
export const MAX_CONFIG_SEARCH_DEPTH = 256;

export class P4ConfigParseError extends Error {
  constructor(
    message: string,
    public readonly filePath: string | undefined,
    public readonly line: number,
  ) {
    super(message);
    this.name = "P4ConfigParseError";
  }
}

/**
 * Parses the contents of a .p4config file. One `KEY=VALUE` pair per line;
 * the line is split at the first `=` and both sides are trimmed. Blank lines
 * are ignored. There are no comments, quotes or escapes.
 *
 * @throws P4ConfigParseError for a line without `=` or with an empty key.
 */
export function parseP4Config(
  text: string,
  filePath?: string,
): P4ConfigOverrides {
  const result: P4ConfigOverrides = {};
  const lines = text.split(/\r?\n/);

  lines.forEach((line, index) => {
    if (!line.trim()) {
      return;
    }
    const separator = line.indexOf("=");
    const where = `${filePath ?? P4CONFIG_FILE_NAME}:${index + 1}`;
    if (separator === -1) {
      throw new P4ConfigParseError(
        `Invalid line in ${where}: expected KEY=VALUE, got "${line.trim()}"`,
        filePath,
        index + 1,
      );
    }
    const key = line.substring(0, separator).trim();
    if (!key) {
      throw new P4ConfigParseError(
        `Invalid line in ${where}: empty variable name`,
        filePath,
        index + 1,
      );
    }
    result[key] = line.substring(separator + 1).trim();
  });

  return result;
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Looks for a .p4config file in the directory of `startPath`, then in each
 * parent directory, stopping before the filesystem root. The nearest file
 * wins.
 *
 * @param startPath Usually the path of the file being acted on.
 * @param maxDepth Maximum number of directories to inspect.
 * @returns The parsed overrides, or undefined when no file was found.
 */
export async function resolveP4Config(
  startPath: string | undefined,
  maxDepth: number = MAX_CONFIG_SEARCH_DEPTH,
): Promise<P4ConfigOverrides | undefined> {
  if (!startPath) {
    return undefined;
  }

  let dir = path.dirname(startPath);
  for (let depth = 0; depth < maxDepth; depth++) {
    if (!dir || dir === path.parse(dir).root) {
      return undefined;
    }
    const configPath = path.join(dir, P4CONFIG_FILE_NAME);
    if (await isFile(configPath)) {
      const text = await fs.readFile(configPath, "utf8");
      return parseP4Config(text, configPath);
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return undefined;
    }
    dir = parent;
  }
  return undefined;
}
