import * as vscode from "vscode";
import { DEFAULT_P4_SETTINGS, P4Settings } from "./p4/p4Types";

/**
 * Reads the workspace's `perforce.*` settings.
 * A `perforce.command` of "none" or empty means the plain `p4` on PATH.
 */
export function readP4Settings(): P4Settings {
  const config = vscode.workspace.getConfiguration("perforce");

  const commandPath = config.get<string>("command", DEFAULT_P4_SETTINGS.command);

  return {
    command:
      commandPath && commandPath.trim() && commandPath !== "none"
        ? commandPath
        : DEFAULT_P4_SETTINGS.command,
    autoOpen: config.get<boolean>("autoOpen", DEFAULT_P4_SETTINGS.autoOpen),
    autoAdd: config.get<boolean>("autoAdd", DEFAULT_P4_SETTINGS.autoAdd),
    warningsEnabled: config.get<boolean>(
      "warningsEnabled",
      DEFAULT_P4_SETTINGS.warningsEnabled,
    ),
    debugP4Commands: config.get<boolean>(
      "debugP4Commands",
      DEFAULT_P4_SETTINGS.debugP4Commands,
    ),
  };
}
