import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";

import { joinConfigPath } from "../shared/environment/pathResolver.js";
import { createLoggerFacade } from "../shared/logging/logger.js";
import type { OverridesRepository } from "./OverridesRepository.js";
import {
  ShipgateConfigSchema,
  type ProjectConfig,
  type ProjectOverride,
  type ShipgateConfig
} from "./schema.js";

const ENV_CONFIG_PATH = "SHIPGATE_CONFIG_PATH";
const CONFIG_FILE = "shipgate.config.json";

const logger = createLoggerFacade("config");

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public override readonly cause?: unknown
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * 配置文件查找顺序：显式路径 → SHIPGATE_CONFIG_PATH → <home>/config → ./config
 */
export function resolveConfigPath(customPath?: string): string {
  const explicit = customPath ?? process.env[ENV_CONFIG_PATH];
  if (explicit && explicit.trim().length > 0) {
    return path.resolve(explicit.trim());
  }
  const userPath = joinConfigPath(CONFIG_FILE);
  if (existsSync(userPath)) {
    return userPath;
  }
  const repoPath = path.resolve("config", CONFIG_FILE);
  if (existsSync(repoPath)) {
    return repoPath;
  }
  return userPath;
}

async function readConfigFile(configPath: string): Promise<unknown> {
  const content = await readFile(configPath, "utf-8").catch((error: unknown) => {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new ConfigError(`未找到配置文件：${configPath}`, configPath, error);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`读取配置失败：${message}`, configPath, error);
  });
  try {
    return JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`配置不是有效的 JSON：${message}`, configPath, error);
  }
}

export function parseConfig(raw: unknown, source = "<inline>"): ShipgateConfig {
  const result = ShipgateConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`配置校验失败：${details}`, source, result.error);
  }
  return result.data;
}

/**
 * 将覆盖项叠加到文件配置上，未在文件中声明的项目会被忽略
 */
export function applyOverrides(
  config: ShipgateConfig,
  overrides: readonly ProjectOverride[]
): ShipgateConfig {
  if (overrides.length === 0) {
    return config;
  }
  const projects: Record<string, ProjectConfig> = { ...config.projects };
  for (const override of overrides) {
    const base = projects[override.project];
    if (!base) {
      logger.warn("Override for unknown project ignored", { project: override.project });
      continue;
    }
    projects[override.project] = {
      ...base,
      sso: { ...base.sso, ...stripUndefined(override.sso) },
      jenkins: { ...base.jenkins, ...stripUndefined(override.jenkins) }
    };
  }
  return { ...config, projects };
}

function stripUndefined<T extends object>(value: T | undefined): Partial<T> {
  if (!value) {
    return {};
  }
  const result: Partial<T> = {};
  for (const key of Object.keys(value)) {
    if (isKeyOf(value, key) && value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}

function isKeyOf<T extends object>(value: T, key: PropertyKey): key is keyof T {
  return key in value;
}

export interface ConfigProviderOptions {
  filePath?: string;
  overrides?: OverridesRepository;
}

/**
 * 配置的显式持有者：组件在构造时拿到 provider，通过 current() 读取，
 * reload() 重新读取文件与覆盖项。
 */
export class ConfigProvider {
  private snapshot: ShipgateConfig | null = null;
  private pendingLoad: Promise<ShipgateConfig> | null = null;
  private baseValue: ShipgateConfig | null = null;
  private readonly configPath: string;
  private readonly overrides: OverridesRepository | undefined;

  constructor(options: ConfigProviderOptions = {}) {
    this.configPath = resolveConfigPath(options.filePath);
    this.overrides = options.overrides;
  }

  /**
   * 直接由配置值构造（无文件），reload() 只重新叠加覆盖项
   */
  static fromValue(config: ShipgateConfig, overrides?: OverridesRepository): ConfigProvider {
    const provider = new ConfigProvider({ overrides });
    provider.baseValue = config;
    provider.snapshot = config;
    return provider;
  }

  get path(): string | null {
    return this.baseValue ? null : this.configPath;
  }

  async load(): Promise<ShipgateConfig> {
    if (this.snapshot) {
      return this.snapshot;
    }
    return this.reload();
  }

  async reload(): Promise<ShipgateConfig> {
    if (this.pendingLoad) {
      return this.pendingLoad;
    }
    const promise = this.readAll().finally(() => {
      this.pendingLoad = null;
    });
    this.pendingLoad = promise;
    return promise;
  }

  current(): ShipgateConfig {
    if (!this.snapshot) {
      throw new Error("配置尚未加载，请先调用 load()");
    }
    return this.snapshot;
  }

  project(name: string): ProjectConfig | undefined {
    return this.current().projects[name];
  }

  private async readAll(): Promise<ShipgateConfig> {
    let base: ShipgateConfig;
    if (this.baseValue) {
      base = this.baseValue;
    } else {
      base = parseConfig(await readConfigFile(this.configPath), this.configPath);
    }
    const overrides = this.overrides ? await this.overrides.list() : [];
    const merged = applyOverrides(base, overrides);
    this.snapshot = merged;
    logger.info("Configuration loaded", {
      path: this.path,
      projects: Object.keys(merged.projects).length,
      overrides: overrides.length
    });
    return merged;
  }
}
