import * as childProcess from "child_process";
import * as path from "path";

import {
  P4CommandResult,
  P4Logger,
  P4Notifier,
  P4Settings,
  ProcessRunner,
  ProcessRunOptions,
  RawProcessOutput,
} from "./p4/p4Types";
import { resolveP4Config } from "./p4/p4Config";

/**
 * Runs a command line through the platform shell, collecting both streams
 * until the process closes. The exit code is reported but never turned into
 * a rejection; only a failure to spawn rejects.
 */
export const spawnShellCommand: ProcessRunner = (
  command: string,
  options: ProcessRunOptions,
): Promise<RawProcessOutput> => {
  return new Promise<RawProcessOutput>((resolve, reject) => {
    const proc = childProcess.spawn(command, {
      cwd: options.cwd,
      env: options.env,
      shell: true,
      stdio: ["ignore", "pipe", "pipe"], // stdin, stdout, stderr
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    proc.stdout.on("data", (data: Buffer) => {
      stdoutChunks.push(Buffer.from(data));
    });
    proc.stderr.on("data", (data: Buffer) => {
      stderrChunks.push(Buffer.from(data));
    });

    proc.on("close", (code) => {
      resolve({
        stdout: Buffer.concat(stdoutChunks),
        stderr: Buffer.concat(stderrChunks),
        exitCode: code,
      });
    });

    proc.on("error", (err) => {
      reject(new Error(`Error spawning shell for '${command}': ${err.message}`));
    });
  });
};

export interface PerforceServiceOptions {
  runner?: ProcessRunner;
  baseEnv?: NodeJS.ProcessEnv;
}

// Keeps passwords out of the output channel. Quoted values may carry
// backslash escapes (POSIX) or doubled quotes (cmd.exe).
export function redactCommand(command: string): string {
  return command.replace(
    /P4PASSWD=("(?:[^"\\]|\\.|"")*"|\S+)/g,
    "P4PASSWD=***",
  );
}

function decode(buffer: Buffer): string | undefined {
  const text = buffer.toString("utf8").trim();
  return text === "" ? undefined : text;
}

export class PerforceService {
  private readonly runner: ProcessRunner;
  private readonly baseEnv: NodeJS.ProcessEnv;

  constructor(
    private readonly logger: P4Logger,
    private readonly notifier: P4Notifier,
    private settings: Pick<P4Settings, "warningsEnabled" | "debugP4Commands">,
    options: PerforceServiceOptions = {},
  ) {
    this.runner = options.runner ?? spawnShellCommand;
    this.baseEnv = options.baseEnv ?? process.env;
  }

  public updateSettings(
    settings: Pick<P4Settings, "warningsEnabled" | "debugP4Commands">,
  ): void {
    this.settings = settings;
  }

  /**
   * Executes a p4 command line for the given file.
   *
   * The working directory is the file's folder and the environment is the base
   * environment overlaid with the nearest .p4config. Anything written to stderr
   * counts as an error, whatever the exit code: p4 also prints advisory
   * messages such as "file(s) up-to-date." there.
   *
   * @param commandTemplate Complete shell command line, arguments already quoted.
   * @param activeFilePath File the command is about; may be undefined.
   * @throws P4ConfigParseError when the .p4config found is malformed.
   */
  public async runCommand(
    commandTemplate: string,
    activeFilePath?: string,
  ): Promise<P4CommandResult> {
    const cwd = activeFilePath ? path.dirname(activeFilePath) : undefined;
    const overrides = await resolveP4Config(activeFilePath);
    const env: NodeJS.ProcessEnv = { ...this.baseEnv, ...overrides };

    this.logCommand(commandTemplate, cwd, overrides);

    const raw = await this.runner(commandTemplate, { cwd, env });
    const result: P4CommandResult = {};
    const output = decode(raw.stdout);
    const error = decode(raw.stderr);
    if (output !== undefined) {
      result.output = output;
    }
    if (error !== undefined) {
      result.error = error;
    }
    this.logOutput(raw.exitCode, output, error);

    if (error !== undefined) {
      this.warnUser(error);
      this.logError(commandTemplate, error);
    }
    return result;
  }

  /**
   * Shows a warning in the editor if warnings are enabled, and always logs it.
   */
  public warnUser(message: string): void {
    const msg = `P4 [warning]: ${message}`;
    if (this.settings.warningsEnabled) {
      this.notifier.showWarning(msg);
    }
    this.logger.appendLine(msg);
  }

  private logCommand(
    command: string,
    cwd: string | undefined,
    overrides: Record<string, string> | undefined,
  ): void {
    if (!this.settings.debugP4Commands) {
      return;
    }
    this.logger.appendLine(`Executing: ${redactCommand(command)}`);
    this.logger.appendLine(`  cwd: ${cwd ?? "(default)"}`);
    if (overrides) {
      // Values may hold P4PASSWD, so only the names are logged
      this.logger.appendLine(
        `  .p4config overrides: ${Object.keys(overrides).join(", ")}`,
      );
    }
    console.log(`Executing P4: ${redactCommand(command)}`);
  }

  private logOutput(
    exitCode: number | null,
    stdout: string | undefined,
    stderr: string | undefined,
  ): void {
    if (!this.settings.debugP4Commands) {
      return;
    }
    this.logger.appendLine(`  exit code: ${exitCode}`);
    if (stdout) {
      this.logger.appendLine(`P4 STDOUT:\n${stdout}`);
    }
    if (stderr) {
      this.logger.appendLine(`P4 STDERR:\n${stderr}`);
    }
  }

  private logError(command: string, stderr: string): void {
    // Always log errors regardless of debug mode
    this.logger.appendLine(`${redactCommand(command)} failed: ${stderr}`);
    console.error(`${redactCommand(command)} failed:`, stderr);
  }
}
