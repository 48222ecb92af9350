import * as fs from "fs/promises";
import * as path from "path";

/**
 * Wraps a value in double quotes for the shell that runs p4 commands.
 * POSIX shells still expand `$`, backticks and `\` inside double quotes, so
 * those are escaped along with `"`. cmd.exe only needs embedded quotes doubled.
 *
 * Known limit: cmd.exe expands `%NAME%` even inside double quotes and offers no
 * escape there, so on Windows a value containing a defined `%NAME%` reaches p4
 * with the variable expanded. `%` is passed through unchanged.
 *
 * @param value File path, password or other argument.
 * @param platform Defaults to the current platform.
 */
export function quoteArg(
  value: string,
  platform: NodeJS.Platform = process.platform,
): string {
  if (platform === "win32") {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return `"${value.replace(/(["\\$`])/g, "\\$1")}"`;
}

/**
 * Quotes the p4 executable only when needed, so the default stays a bare `p4`.
 */
export function formatExecutable(
  command: string,
  platform: NodeJS.Platform = process.platform,
): string {
  const trimmed = command.trim() || "p4";
  return /^[\w./:\\-]+$/.test(trimmed) ? trimmed : quoteArg(trimmed, platform);
}

/**
 * True when `filePath` is `root` itself or lies below it. Compares whole path
 * segments, so `/proj2/a.txt` is not inside `/proj`.
 */
export function isPathUnderRoot(
  filePath: string,
  root: string,
  pathApi: path.PlatformPath = path,
): boolean {
  if (!filePath || !root) {
    return false;
  }
  // Windows paths are case-insensitive
  const normalize = (value: string): string => {
    const resolved = pathApi.resolve(value);
    return pathApi.sep === "\\" ? resolved.toLowerCase() : resolved;
  };
  const relative = pathApi.relative(normalize(root), normalize(filePath));
  if (relative === "") {
    return true;
  }
  return (
    relative !== ".." &&
    !relative.startsWith(`..${pathApi.sep}`) &&
    !pathApi.isAbsolute(relative)
  );
}

/**
 * Returns true if the owner write bit is set. A file that does not exist yet
 * counts as writable (it will be created by the save).
 */
export async function isFileWritable(
  filePath: string | undefined,
): Promise<boolean> {
  if (!filePath) {
    return false;
  }
  try {
    const stats = await fs.stat(filePath);
    return !stats.isFile() || (stats.mode & 0o200) !== 0;
  } catch {
    return true;
  }
}
