import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  ALREADY_WRITABLE,
  NO_ACTIVE_FILE,
  NOT_UNDER_CLIENT_ROOT,
  PerforceActions,
} from "../PerforceActions";
import { PerforceService } from "../PerforceService";
import {
  DEFAULT_P4_SETTINGS,
  P4Settings,
  ProcessRunner,
} from "../p4/p4Types";

interface Reply {
  stdout?: string;
  stderr?: string;
}

const CLIENT_ROOT_QUERY = "p4 -F %clientRoot% -z tag info";

describe("PerforceActions", () => {
  let root: string;
  let clientRoot: string;
  let file: string;
  let outsideFile: string;
  let commands: string[];
  let replies: Record<string, Reply>;
  let activeFile: string | undefined;
  let logger: { appendLine: jest.Mock };
  let consoleError: jest.SpyInstance;

  const host = {
    getActiveFilePath: jest.fn(() => activeFile),
    showWarning: jest.fn(),
    showOutput: jest.fn(async (_content: string, _language: "diff" | "text") => undefined),
    closeActiveView: jest.fn(async () => undefined),
    revertActiveView: jest.fn(async () => undefined),
    promptPassword: jest.fn(async (_userName?: string): Promise<string | undefined> => "test-secret"),
  };

  const runner: ProcessRunner = async (command) => {
    commands.push(command);
    const reply = replies[command] ?? {};
    return {
      stdout: Buffer.from(reply.stdout ?? ""),
      stderr: Buffer.from(reply.stderr ?? ""),
      exitCode: reply.stderr ? 1 : 0,
    };
  };

  const createActions = (settings: Partial<P4Settings> = {}) => {
    const effective = { ...DEFAULT_P4_SETTINGS, ...settings };
    const service = new PerforceService(logger, host, effective, {
      runner,
      baseEnv: { PATH: "/usr/bin" },
    });
    return new PerforceActions(service, host, logger, effective);
  };

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "p4actions-"));
    clientRoot = path.join(root, "ws");
    file = path.join(clientRoot, "src", "a.txt");
    outsideFile = path.join(root, "ws2", "b.txt");
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.mkdirSync(path.dirname(outsideFile), { recursive: true });
    fs.writeFileSync(file, "content");
    fs.chmodSync(file, 0o444);
    fs.writeFileSync(outsideFile, "content");

    commands = [];
    replies = { [CLIENT_ROOT_QUERY]: { stdout: `${clientRoot}\n` } };
    activeFile = file;
    logger = { appendLine: jest.fn() };
    consoleError = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
    consoleError.mockRestore();
  });

  describe("delete", () => {
    it("should not run p4 delete for a file outside the client root", async () => {
      activeFile = outsideFile;
      const actions = createActions();

      expect(await actions.delete()).toBe(false);

      expect(commands).toEqual([CLIENT_ROOT_QUERY]);
      expect(host.showWarning).toHaveBeenCalledWith(
        `P4 [warning]: ${NOT_UNDER_CLIENT_ROOT}`,
      );
      expect(host.closeActiveView).not.toHaveBeenCalled();
    });

    it("should close the view after a successful delete", async () => {
      const actions = createActions();

      expect(await actions.delete()).toBe(true);

      expect(commands).toEqual([CLIENT_ROOT_QUERY, `p4 delete "${file}"`]);
      expect(host.closeActiveView).toHaveBeenCalledTimes(1);
    });

    it("should keep the view open when p4 reports an error", async () => {
      replies[`p4 delete "${file}"`] = { stderr: "file(s) not on client." };
      const actions = createActions();

      expect(await actions.delete()).toBe(false);

      expect(host.closeActiveView).not.toHaveBeenCalled();
      expect(host.showWarning).toHaveBeenCalledWith(
        "P4 [warning]: file(s) not on client.",
      );
    });
  });

  describe("revert", () => {
    it("should reload the buffer on success", async () => {
      const actions = createActions();

      expect(await actions.revert()).toBe(true);

      expect(commands).toEqual([CLIENT_ROOT_QUERY, `p4 revert "${file}"`]);
      expect(host.revertActiveView).toHaveBeenCalledTimes(1);
    });

    it("should not run p4 revert for a file outside the client root", async () => {
      activeFile = outsideFile;
      const actions = createActions();

      expect(await actions.revert()).toBe(false);

      expect(commands).toEqual([CLIENT_ROOT_QUERY]);
      expect(host.showWarning).toHaveBeenCalledWith(
        `P4 [warning]: ${NOT_UNDER_CLIENT_ROOT}`,
      );
      expect(host.revertActiveView).not.toHaveBeenCalled();
    });

    it("should keep the buffer when p4 reports an error", async () => {
      replies[`p4 revert "${file}"`] = { stderr: "file(s) not opened on this client." };
      const actions = createActions();

      expect(await actions.revert()).toBe(false);

      expect(commands).toEqual([CLIENT_ROOT_QUERY, `p4 revert "${file}"`]);
      expect(host.revertActiveView).not.toHaveBeenCalled();
      expect(host.showWarning).toHaveBeenCalledWith(
        "P4 [warning]: file(s) not opened on this client.",
      );
    });
  });

  it("add should run p4 add for a file under the root", async () => {
    const actions = createActions();

    expect(await actions.add()).toBe(true);
    expect(commands).toEqual([CLIENT_ROOT_QUERY, `p4 add "${file}"`]);
  });

  describe("diff", () => {
    it("should show the diff of the active file", async () => {
      replies[`p4 diff -dU "${file}"`] = { stdout: "--- a\n+++ b\n" };
      const actions = createActions();

      await actions.diff();

      expect(host.showOutput).toHaveBeenCalledWith("--- a\n+++ b", "diff");
    });

    it("should not open a view for an empty diff", async () => {
      const actions = createActions();

      await actions.diff();

      expect(commands).toEqual([CLIENT_ROOT_QUERY, `p4 diff -dU "${file}"`]);
      expect(host.showOutput).not.toHaveBeenCalled();
    });

    it("should diff all opened files", async () => {
      replies["p4 diff -dU"] = { stdout: "==== //depot/a.txt#1 ====" };
      const actions = createActions();

      await actions.diffAll();

      expect(commands).toEqual([CLIENT_ROOT_QUERY, "p4 diff -dU"]);
      expect(host.showOutput).toHaveBeenCalledWith("==== //depot/a.txt#1 ====", "diff");
    });
  });

  it("listOpened should show the opened files without a root check", async () => {
    replies["p4 opened"] = { stdout: "//depot/a.txt#1 - edit default change (text)" };
    const actions = createActions();

    expect(await actions.listOpened()).toBe(true);

    expect(commands).toEqual(["p4 opened"]);
    expect(host.showOutput).toHaveBeenCalledWith(
      "//depot/a.txt#1 - edit default change (text)",
      "text",
    );
  });

  describe("openForEdit", () => {
    it("should open a read-only file for edit", async () => {
      const actions = createActions();

      expect(await actions.openForEdit()).toBe(true);
      expect(commands).toEqual([CLIENT_ROOT_QUERY, `p4 edit "${file}"`]);
    });

    it("should skip a writable file", async () => {
      fs.chmodSync(file, 0o644);
      const actions = createActions();

      expect(await actions.openForEdit()).toBe(false);

      expect(commands).toEqual([]);
      expect(host.showWarning).toHaveBeenCalledWith(`P4 [warning]: ${ALREADY_WRITABLE}`);
    });

    it("should warn when there is no active file", async () => {
      activeFile = undefined;
      const actions = createActions();

      expect(await actions.openForEdit()).toBe(false);

      expect(commands).toEqual([]);
      expect(host.showWarning).toHaveBeenCalledWith(`P4 [warning]: ${NO_ACTIVE_FILE}`);
    });

    it("should not edit when the client root cannot be found", async () => {
      replies[CLIENT_ROOT_QUERY] = { stderr: "Connect to server failed" };
      const actions = createActions();

      expect(await actions.openForEdit()).toBe(false);

      expect(commands).toEqual([CLIENT_ROOT_QUERY]);
      expect(host.showWarning).toHaveBeenNthCalledWith(
        1,
        "P4 [warning]: Connect to server failed",
      );
      expect(host.showWarning).toHaveBeenNthCalledWith(
        2,
        `P4 [warning]: ${NOT_UNDER_CLIENT_ROOT}`,
      );
    });
  });

  describe("login and logout", () => {
    it("should log out and then store the password", async () => {
      const actions = createActions();

      expect(await actions.login()).toBe(true);

      expect(host.promptPassword).toHaveBeenCalledWith(undefined);
      expect(commands).toEqual(["p4 logout", 'p4 set P4PASSWD="test-secret"']);
    });

    it("should name the P4USER from .p4config in the prompt", async () => {
      fs.writeFileSync(path.join(clientRoot, ".p4config"), "P4USER=jo\n");
      const actions = createActions();

      await actions.login();

      expect(host.promptPassword).toHaveBeenCalledWith("jo");
    });

    it("should do nothing when the prompt is cancelled", async () => {
      host.promptPassword.mockResolvedValueOnce(undefined);
      const actions = createActions();

      expect(await actions.login()).toBe(false);

      expect(commands).toEqual([]);
      expect(logger.appendLine).toHaveBeenCalledWith("Login cancelled by user.");
    });

    it("logout should clear the stored password", async () => {
      const actions = createActions();

      expect(await actions.logout()).toBe(true);
      expect(commands).toEqual(["p4 set P4PASSWD="]);
    });
  });

  describe("save hooks", () => {
    it("should open a dirty file for edit before saving", async () => {
      const actions = createActions();

      await actions.onBeforePersist(file, true);

      expect(commands).toEqual([CLIENT_ROOT_QUERY, `p4 edit "${file}"`]);
    });

    it("should ignore clean files and disabled auto-open", async () => {
      await createActions().onBeforePersist(file, false);
      await createActions({ autoOpen: false }).onBeforePersist(file, true);

      expect(commands).toEqual([]);
    });

    it("should log instead of warning when the file is outside the root", async () => {
      fs.chmodSync(outsideFile, 0o444);
      const actions = createActions();

      await actions.onBeforePersist(outsideFile, true);

      expect(commands).toEqual([CLIENT_ROOT_QUERY]);
      expect(host.showWarning).not.toHaveBeenCalled();
      expect(logger.appendLine).toHaveBeenCalledWith(NOT_UNDER_CLIENT_ROOT);
    });

    it("should add after saving only when auto-add is on", async () => {
      await createActions().onAfterPersist(file);
      expect(commands).toEqual([]);

      await createActions({ autoAdd: true }).onAfterPersist(file);
      expect(commands).toEqual([CLIENT_ROOT_QUERY, `p4 add "${file}"`]);
    });

    it("should follow updated settings", async () => {
      const actions = createActions();
      actions.updateSettings({ ...DEFAULT_P4_SETTINGS, autoOpen: false });

      await actions.onBeforePersist(file, true);

      expect(commands).toEqual([]);
    });

    it("should never reject", async () => {
      fs.writeFileSync(path.join(clientRoot, ".p4config"), "not a setting\n");
      const actions = createActions({ autoAdd: true });

      await expect(actions.onAfterPersist(file)).resolves.toBeUndefined();

      expect(commands).toEqual([]);
      expect(logger.appendLine).toHaveBeenCalledWith(
        `Perforce save action failed for ${file}: Invalid line in ${path.join(clientRoot, ".p4config")}:1: expected KEY=VALUE, got "not a setting"`,
      );
    });

    it("should run save actions for the same file one after another", async () => {
      const events: string[] = [];
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const gatedRunner: ProcessRunner = async (command, options) => {
        events.push(`start ${command}`);
        if (command.startsWith("p4 edit")) {
          await gate;
        }
        events.push(`end ${command}`);
        return runner(command, options);
      };
      const settings = { ...DEFAULT_P4_SETTINGS, autoAdd: true };
      const service = new PerforceService(logger, host, settings, {
        runner: gatedRunner,
        baseEnv: {},
      });
      const actions = new PerforceActions(service, host, logger, settings);

      const beforeSave = actions.onBeforePersist(file, true);
      const afterSave = actions.onAfterPersist(file);
      setTimeout(release, 20);
      await Promise.all([beforeSave, afterSave]);

      expect(events).toEqual([
        `start ${CLIENT_ROOT_QUERY}`,
        `end ${CLIENT_ROOT_QUERY}`,
        `start p4 edit "${file}"`,
        `end p4 edit "${file}"`,
        `start ${CLIENT_ROOT_QUERY}`,
        `end ${CLIENT_ROOT_QUERY}`,
        `start p4 add "${file}"`,
        `end p4 add "${file}"`,
      ]);
    });
  });
});
