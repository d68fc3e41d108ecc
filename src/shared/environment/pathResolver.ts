import { mkdirSync } from "node:fs";
import os from "node:os";
import path from "node:path";

type Area = "config" | "state" | "logs";

const HOME_ENV = "SHIPGATE_HOME";
const HOME_NAME = ".shipgate";

let home: string | null = null;
const prepared = new Set<Area>();

/**
 * SHIPGATE_HOME 优先，否则落在平台的用户配置目录下
 */
function resolveHome(): string {
  if (home) {
    return home;
  }
  const override = process.env[HOME_ENV]?.trim();
  if (override) {
    home = path.resolve(override);
  } else if (process.platform === "win32") {
    home = path.resolve(process.env.APPDATA ?? path.join(os.homedir(), "AppData", "Roaming"), HOME_NAME);
  } else if (process.platform === "darwin") {
    home = path.resolve(os.homedir(), "Library", "Application Support", HOME_NAME);
  } else {
    home = path.resolve(process.env.XDG_CONFIG_HOME ?? path.join(os.homedir(), ".config"), HOME_NAME);
  }
  return home;
}

function areaDirectory(area: Area): string {
  const directory = path.join(resolveHome(), area);
  if (!prepared.has(area)) {
    mkdirSync(directory, { recursive: true });
    prepared.add(area);
  }
  return directory;
}

export function getShipgateLogsDirectory(): string {
  return areaDirectory("logs");
}

export function joinConfigPath(...segments: readonly string[]): string {
  return path.join(areaDirectory("config"), ...segments);
}

export function joinStatePath(...segments: readonly string[]): string {
  return path.join(areaDirectory("state"), ...segments);
}
