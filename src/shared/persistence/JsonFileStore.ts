import { randomUUID } from "node:crypto";
import { mkdir, readFile, readdir, rename, stat, unlink, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";

import pLimit from "p-limit";
import type { z } from "zod";

import { createLoggerFacade, type LoggerFacade } from "../logging/logger.js";
import { retryWithBackoff, type RetryAttempt, type RetryOptions } from "../retry/retryWithBackoff.js";

export interface JsonFileStoreOptions<T> {
  /**
   * 实体文件所在目录（绝对路径）
   */
  readonly directory: string;
  /**
   * 读写两侧都用它校验
   */
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  readonly idField: keyof T;
  readonly logCategory?: string;
  readonly retryOptions?: Partial<RetryOptions>;
}

export type JsonFileStoreErrorCode =
  | "initialization_failed"
  | "entity_exists"
  | "entity_not_found"
  | "read_failed"
  | "write_failed"
  | "delete_failed"
  | "list_failed"
  | "validation_failed"
  | "id_mismatch"
  | "invalid_id";

export class JsonFileStoreError extends Error {
  constructor(
    message: string,
    public readonly code: JsonFileStoreErrorCode,
    public override readonly cause?: unknown
  ) {
    super(message);
    this.name = "JsonFileStoreError";
  }
}

// 文件系统瞬态错误，其余一律不重试
const TRANSIENT_CODES: ReadonlySet<string> = new Set(["EBUSY", "EPERM", "EAGAIN", "EMFILE", "ENFILE"]);

type EntityLock = ReturnType<typeof pLimit>;

/**
 * 一个实体一个 JSON 文件的存储基类
 *
 * 写入先落临时文件再 rename。同一 ID 上的写操作经进程内互斥锁串行，
 * {@link mutate} 借此提供比较并交换语义。
 */
export abstract class JsonFileStore<T extends object> {
  protected readonly directory: string;
  protected readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  protected readonly idField: keyof T;
  protected readonly logger: LoggerFacade;
  protected readonly retryOptions: RetryOptions;

  private readonly locks = new Map<string, EntityLock>();

  constructor(options: JsonFileStoreOptions<T>) {
    this.directory = options.directory;
    this.schema = options.schema;
    this.idField = options.idField;
    this.logger = createLoggerFacade(options.logCategory ?? this.constructor.name);
    this.retryOptions = {
      retries: 3,
      baseDelay: 100,
      ...options.retryOptions,
      shouldRetry: (attempt) => this.isTransientError(attempt),
      onFailedAttempt: ({ error, attemptNumber, retriesLeft }) => {
        this.logger.warn("Filesystem operation failed, retrying", {
          directory: this.directory,
          attemptNumber,
          retriesLeft,
          error: error.message
        });
      }
    };
  }

  async initialize(): Promise<void> {
    await this.io("initialization_failed", "Failed to initialize storage directory", {}, () =>
      mkdir(this.directory, { recursive: true })
    );
    this.logger.debug("Storage ready", { directory: this.directory });
  }

  async create(entity: T): Promise<T> {
    const validated = this.validateEntity(entity);
    const id = this.extractId(validated);
    return this.locked(id, async (filePath) => {
      if (await this.fileExists(filePath)) {
        throw new JsonFileStoreError(`Entity '${id}' already exists`, "entity_exists");
      }
      await this.atomicWrite(filePath, validated);
      return validated;
    });
  }

  async read(id: string): Promise<T | null> {
    const filePath = this.getFilePath(id);
    return (await this.fileExists(filePath)) ? this.load(filePath, id) : null;
  }

  /**
   * 整体替换已存在的实体
   */
  async update(id: string, entity: T): Promise<T> {
    const validated = this.validateEntity(entity);
    this.assertSameId(id, validated);
    return this.locked(id, async (filePath) => {
      await this.requireExisting(filePath, id);
      await this.atomicWrite(filePath, validated);
      return validated;
    });
  }

  /**
   * 锁内读-改-写。`change` 返回 null 表示前置条件不成立：不写入，返回 null。
   */
  async mutate(id: string, change: (current: T) => T | null): Promise<T | null> {
    return this.locked(id, async (filePath) => {
      await this.requireExisting(filePath, id);
      const next = change(await this.load(filePath, id));
      if (next === null) {
        return null;
      }
      const validated = this.validateEntity(next);
      this.assertSameId(id, validated);
      await this.atomicWrite(filePath, validated);
      return validated;
    });
  }

  async delete(id: string): Promise<void> {
    await this.locked(id, async (filePath) => {
      await this.requireExisting(filePath, id);
      await this.io("delete_failed", `Failed to delete entity '${id}'`, { id }, () => unlink(filePath));
    });
    this.locks.delete(id);
  }

  /**
   * 按文件名顺序返回全部实体；损坏或不合 schema 的文件跳过
   */
  async list(): Promise<T[]> {
    const files = await this.io("list_failed", "Failed to list entities", {}, async () => {
      await mkdir(this.directory, { recursive: true });
      return readdir(this.directory);
    });

    const entities: T[] = [];
    for (const file of files.filter((name) => name.endsWith(".json")).sort()) {
      try {
        const raw = await readFile(join(this.directory, file), "utf-8");
        entities.push(this.validateEntity(JSON.parse(raw)));
      } catch (error) {
        this.logger.warn("Unreadable entity file skipped", {
          file,
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }
    return entities;
  }

  protected getFilePath(id: string): string {
    return join(this.directory, `${this.sanitizeId(id)}.json`);
  }

  /**
   * 文件名只保留 Unicode 字母、数字、下划线与连字符，并截断到 160 字符
   */
  protected sanitizeId(id: string): string {
    return id.replace(/[^\p{L}\p{N}_-]/gu, "_").slice(0, 160);
  }

  protected validateEntity(data: unknown): T {
    const parsed = this.schema.safeParse(data);
    if (!parsed.success) {
      throw new JsonFileStoreError("Entity validation failed", "validation_failed", parsed.error);
    }
    return parsed.data;
  }

  protected extractId(entity: T): string {
    const id = entity[this.idField];
    if (typeof id !== "string" || id.length === 0) {
      throw new JsonFileStoreError(`Entity field '${String(this.idField)}' must be a non-empty string`, "invalid_id");
    }
    return id;
  }

  protected isTransientError({ error }: RetryAttempt): boolean {
    const source: unknown = error instanceof JsonFileStoreError ? error.cause : error;
    if (typeof source !== "object" || source === null || !("code" in source)) {
      return false;
    }
    return typeof source.code === "string" && TRANSIENT_CODES.has(source.code);
  }

  private locked<R>(id: string, task: (filePath: string) => Promise<R>): Promise<R> {
    let lock = this.locks.get(id);
    if (!lock) {
      lock = pLimit(1);
      this.locks.set(id, lock);
    }
    const filePath = this.getFilePath(id);
    return lock(() => task(filePath));
  }

  /**
   * 执行一次文件系统操作：失败包装为 JsonFileStoreError，瞬态错误按退避重试
   */
  private io<R>(
    code: JsonFileStoreErrorCode,
    message: string,
    context: Record<string, unknown>,
    operation: () => Promise<R>
  ): Promise<R> {
    return retryWithBackoff(async () => {
      try {
        return await operation();
      } catch (error) {
        this.logger.error(message, error, { directory: this.directory, ...context });
        throw new JsonFileStoreError(message, code, error);
      }
    }, this.retryOptions);
  }

  private load(filePath: string, id: string): Promise<T> {
    return this.io("read_failed", `Failed to read entity '${id}'`, { id }, async () =>
      this.validateEntity(JSON.parse(await readFile(filePath, "utf-8")))
    );
  }

  private async atomicWrite(filePath: string, entity: T): Promise<void> {
    const serialized = `${JSON.stringify(entity, null, 2)}\n`;
    await this.io("write_failed", "Atomic write failed", { filePath }, async () => {
      const tempPath = `${filePath}.${randomUUID()}.tmp`;
      try {
        await mkdir(dirname(filePath), { recursive: true });
        await writeFile(tempPath, serialized, "utf-8");
        await rename(tempPath, filePath);
      } catch (error) {
        await unlink(tempPath).catch((cleanupError: unknown) => {
          this.logger.debug("Temp file left behind", {
            tempPath,
            error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError)
          });
        });
        throw error;
      }
    });
  }

  private async requireExisting(filePath: string, id: string): Promise<void> {
    if (!(await this.fileExists(filePath))) {
      throw new JsonFileStoreError(`Entity '${id}' not found`, "entity_not_found");
    }
  }

  private assertSameId(expected: string, entity: T): void {
    const actual = this.extractId(entity);
    if (actual !== expected) {
      throw new JsonFileStoreError(`Entity id '${actual}' does not match '${expected}'`, "id_mismatch");
    }
  }

  private async fileExists(filePath: string): Promise<boolean> {
    try {
      return (await stat(filePath)).isFile();
    } catch {
      return false;
    }
  }
}
