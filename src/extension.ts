// The module 'vscode' contains the VS Code extensibility API
import * as vscode from "vscode";
import { PerforceService } from "./PerforceService";
import { PerforceActions } from "./PerforceActions";
import { readP4Settings } from "./configuration";
import { P4Host, P4OutputLanguage } from "./p4/p4Types";

let outputChannel: vscode.OutputChannel;
let actions: PerforceActions;

function activeFileUri(): vscode.Uri | undefined {
  const document = vscode.window.activeTextEditor?.document;
  if (!document || document.uri.scheme !== "file") {
    return undefined;
  }
  return document.uri;
}

/**
 * P4Host backed by the VS Code window and workbench commands.
 */
export const vscodeHost: P4Host = {
  getActiveFilePath(): string | undefined {
    return activeFileUri()?.fsPath;
  },

  showWarning(message: string): void {
    vscode.window.setStatusBarMessage(message, 5000);
  },

  async showOutput(content: string, language: P4OutputLanguage): Promise<void> {
    const document = await vscode.workspace.openTextDocument({
      content,
      language: language === "diff" ? "diff" : "plaintext",
    });
    await vscode.window.showTextDocument(document, { preview: true });
  },

  async closeActiveView(): Promise<void> {
    await vscode.commands.executeCommand("workbench.action.closeActiveEditor");
  },

  async revertActiveView(): Promise<void> {
    await vscode.commands.executeCommand("workbench.action.files.revert");
  },

  async promptPassword(userName?: string): Promise<string | undefined> {
    return vscode.window.showInputBox({
      prompt: userName
        ? `Enter Perforce Password for ${userName}`
        : "Enter Perforce Password",
      password: true,
      ignoreFocusOut: true,
      placeHolder: "Password for p4 set P4PASSWD",
    });
  },
};

/**
 * Wraps an action so that anything it throws (a malformed .p4config, a shell
 * that cannot be spawned) ends up in the output channel and an error message.
 */
function registerAction(
  context: vscode.ExtensionContext,
  command: string,
  action: () => Promise<boolean>,
): void {
  context.subscriptions.push(
    vscode.commands.registerCommand(command, async () => {
      outputChannel.appendLine(`Command '${command}' triggered.`);
      try {
        await action();
      } catch (error) {
        const errorMsg = error instanceof Error ? error.message : String(error);
        outputChannel.appendLine(`Error during ${command}: ${errorMsg}`);
        void vscode.window.showErrorMessage(`Perforce: ${errorMsg}`);
      }
    }),
  );
}

// This method is called when your extension is activated
export function activate(context: vscode.ExtensionContext): void {
  outputChannel = vscode.window.createOutputChannel("Perforce");
  context.subscriptions.push(outputChannel);
  outputChannel.appendLine("Activating Perforce extension...");

  const settings = readP4Settings();
  const service = new PerforceService(outputChannel, vscodeHost, settings);
  actions = new PerforceActions(service, vscodeHost, outputChannel, settings);

  context.subscriptions.push(
    vscode.workspace.onDidChangeConfiguration((e) => {
      if (e.affectsConfiguration("perforce")) {
        actions.updateSettings(readP4Settings());
        outputChannel.appendLine("Perforce settings reloaded.");
      }
    }),
  );

  context.subscriptions.push(
    vscode.commands.registerCommand("perforce.showOutput", () => {
      outputChannel.show();
    }),
  );

  registerAction(context, "perforce.login", () => actions.login());
  registerAction(context, "perforce.logout", () => actions.logout());
  registerAction(context, "perforce.open", () => actions.openForEdit());
  registerAction(context, "perforce.add", () => actions.add());
  registerAction(context, "perforce.delete", () => actions.delete());
  registerAction(context, "perforce.revert", () => actions.revert());
  registerAction(context, "perforce.diff", () => actions.diff());
  registerAction(context, "perforce.diffAll", () => actions.diffAll());
  registerAction(context, "perforce.opened", () => actions.listOpened());

  // The edit has to finish before VS Code writes the (read-only) file
  context.subscriptions.push(
    vscode.workspace.onWillSaveTextDocument((event) => {
      const document = event.document;
      if (document.uri.scheme !== "file") {
        return;
      }
      event.waitUntil(
        actions.onBeforePersist(document.uri.fsPath, document.isDirty),
      );
    }),
  );

  context.subscriptions.push(
    vscode.workspace.onDidSaveTextDocument(async (document) => {
      if (document.uri.scheme !== "file") {
        return;
      }
      await actions.onAfterPersist(document.uri.fsPath);
    }),
  );

  outputChannel.appendLine("Perforce extension activation sequence finished.");
}

// This method is called when your extension is deactivated
export function deactivate() {
  if (outputChannel) {
    outputChannel.appendLine("Perforce extension deactivated.");
  }
}
