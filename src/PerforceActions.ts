import { PerforceService } from "./PerforceService";
import {
  P4CommandContext,
  P4Host,
  P4Logger,
  P4Settings,
} from "./p4/p4Types";
import { resolveP4Config } from "./p4/p4Config";
import { formatExecutable, isFileWritable } from "./p4/p4Utils";
import {
  isFileInDepot,
  p4add,
  p4delete,
  p4diff,
  p4diffAll,
  p4edit,
  p4logout,
  p4opened,
  p4revert,
  p4setPassword,
} from "./p4/fileCommands";

export const NOT_UNDER_CLIENT_ROOT = "File is not under the client root.";
export const ALREADY_WRITABLE = "File is already writable.";
export const NO_ACTIVE_FILE = "No active file.";

/**
 * User-facing Perforce actions and the save hooks. Knows nothing about the
 * editor beyond the P4Host it is given.
 *
 * Each action returns true when its p4 command ran and reported no error.
 */
export class PerforceActions {
  // Tail of the chain of save-triggered work, per file path
  private readonly saveQueue = new Map<string, Promise<void>>();

  constructor(
    private readonly service: PerforceService,
    private readonly host: P4Host,
    private readonly logger: P4Logger,
    private settings: P4Settings,
  ) {}

  public updateSettings(settings: P4Settings): void {
    this.settings = settings;
    this.service.updateSettings(settings);
  }

  private get context(): P4CommandContext {
    return {
      run: (command, activeFilePath) =>
        this.service.runCommand(command, activeFilePath),
      logger: this.logger,
      p4Path: formatExecutable(this.settings.command),
    };
  }

  private activeFile(): string | undefined {
    const filePath = this.host.getActiveFilePath();
    if (!filePath) {
      this.service.warnUser(NO_ACTIVE_FILE);
    }
    return filePath;
  }

  private async checkInDepot(
    filePath: string,
    report: (message: string) => void,
  ): Promise<boolean> {
    if (await isFileInDepot(this.context, filePath)) {
      return true;
    }
    report(NOT_UNDER_CLIENT_ROOT);
    return false;
  }

  private warn = (message: string): void => {
    this.service.warnUser(message);
  };

  private log = (message: string): void => {
    this.logger.appendLine(message);
  };

  private async openFile(
    filePath: string,
    report: (message: string) => void,
  ): Promise<boolean> {
    if (await isFileWritable(filePath)) {
      report(ALREADY_WRITABLE);
      return false;
    }
    if (!(await this.checkInDepot(filePath, report))) {
      return false;
    }
    const result = await p4edit(this.context, filePath);
    return !result.error;
  }

  public async openForEdit(): Promise<boolean> {
    const filePath = this.activeFile();
    if (!filePath) {
      return false;
    }
    return this.openFile(filePath, this.warn);
  }

  public async add(): Promise<boolean> {
    const filePath = this.activeFile();
    if (!filePath || !(await this.checkInDepot(filePath, this.warn))) {
      return false;
    }
    const result = await p4add(this.context, filePath);
    return !result.error;
  }

  /**
   * Marks the active file for delete and closes its view when p4 succeeded.
   */
  public async delete(): Promise<boolean> {
    const filePath = this.activeFile();
    if (!filePath || !(await this.checkInDepot(filePath, this.warn))) {
      return false;
    }
    const result = await p4delete(this.context, filePath);
    if (result.error) {
      return false;
    }
    await this.host.closeActiveView();
    return true;
  }

  /**
   * Reverts the active file and reloads its buffer from disk when p4 succeeded.
   */
  public async revert(): Promise<boolean> {
    const filePath = this.activeFile();
    if (!filePath || !(await this.checkInDepot(filePath, this.warn))) {
      return false;
    }
    const result = await p4revert(this.context, filePath);
    if (result.error) {
      return false;
    }
    await this.host.revertActiveView();
    return true;
  }

  public async diff(): Promise<boolean> {
    const filePath = this.activeFile();
    if (!filePath || !(await this.checkInDepot(filePath, this.warn))) {
      return false;
    }
    const result = await p4diff(this.context, filePath);
    if (result.output) {
      await this.host.showOutput(result.output, "diff");
    }
    return !result.error;
  }

  public async diffAll(): Promise<boolean> {
    const filePath = this.activeFile();
    if (!filePath || !(await this.checkInDepot(filePath, this.warn))) {
      return false;
    }
    const result = await p4diffAll(this.context, filePath);
    if (result.output) {
      await this.host.showOutput(result.output, "diff");
    }
    return !result.error;
  }

  public async listOpened(): Promise<boolean> {
    const result = await p4opened(this.context, this.host.getActiveFilePath());
    if (result.output) {
      await this.host.showOutput(result.output, "text");
    }
    return !result.error;
  }

  /**
   * Prompts for a password, logs out, then stores the new password with
   * `p4 set`. A failed logout (e.g. no ticket) does not stop the second step.
   */
  public async login(): Promise<boolean> {
    const activeFilePath = this.host.getActiveFilePath();
    const overrides = await resolveP4Config(activeFilePath);
    const password = await this.host.promptPassword(overrides?.P4USER);
    if (password === undefined) {
      this.logger.appendLine("Login cancelled by user.");
      return false;
    }
    await p4logout(this.context, activeFilePath);
    const result = await p4setPassword(this.context, password, activeFilePath);
    return !result.error;
  }

  public async logout(): Promise<boolean> {
    const result = await p4setPassword(
      this.context,
      "",
      this.host.getActiveFilePath(),
    );
    return !result.error;
  }

  /**
   * Save hook, called before a document is written. Opens a dirty file for
   * edit when auto-open is on. Never rejects.
   */
  public onBeforePersist(
    filePath: string | undefined,
    isDirty: boolean,
  ): Promise<void> {
    if (!filePath || !isDirty || !this.settings.autoOpen) {
      return Promise.resolve();
    }
    return this.enqueue(filePath, () => this.openFile(filePath, this.log));
  }

  /**
   * Save hook, called after a document was written. Adds the file when
   * auto-add is on and the file is under the client root. Never rejects.
   */
  public onAfterPersist(filePath: string | undefined): Promise<void> {
    if (!filePath || !this.settings.autoAdd) {
      return Promise.resolve();
    }
    return this.enqueue(filePath, async () => {
      if (await this.checkInDepot(filePath, this.log)) {
        await p4add(this.context, filePath);
      }
    });
  }

  // Runs save-triggered work for one path strictly after earlier work on it
  private enqueue(
    filePath: string,
    task: () => Promise<unknown>,
  ): Promise<void> {
    const previous = this.saveQueue.get(filePath) ?? Promise.resolve();
    const next: Promise<void> = previous
      .then(task)
      .then(
        () => undefined,
        (error: unknown) => {
          const errorMsg = error instanceof Error ? error.message : String(error);
          this.logger.appendLine(
            `Perforce save action failed for ${filePath}: ${errorMsg}`,
          );
          console.error("Perforce save action failed", error);
        },
      )
      .then(() => {
        if (this.saveQueue.get(filePath) === next) {
          this.saveQueue.delete(filePath);
        }
      });
    this.saveQueue.set(filePath, next);
    return next;
  }
}
