/**
 * Configuration and data paths
 */

import * as path from "node:path";

export const CONFIG_DIR = ".storyweave";
export const CONFIG_FILE = "config.json";

export function getProjectRoot(): string {
  return process.cwd();
}

export function getConfigDir(projectRoot: string = getProjectRoot()): string {
  return path.join(projectRoot, CONFIG_DIR);
}

export function getConfigPath(projectRoot: string = getProjectRoot()): string {
  return path.join(getConfigDir(projectRoot), CONFIG_FILE);
}

export function getDataDir(projectRoot: string = getProjectRoot()): string {
  return path.join(getConfigDir(projectRoot), "data");
}

export function getLogsDir(projectRoot: string = getProjectRoot()): string {
  return path.join(getConfigDir(projectRoot), "logs");
}
