/**
 * 依赖注入容器
 *
 * 使用 awilix（CLASSIC 模式，按构造函数参数名注入），所有组件均为应用级单例。
 * cradle 的键名与各组件构造函数的参数名保持一致。
 */

import { asClass, asFunction, asValue, createContainer, InjectionMode, Lifetime } from "awilix";
import type { AwilixContainer } from "awilix";

import { createBackendClient, BackendRegistry, type BackendClientFactory } from "../backends/registry.js";
import { ConfigAuthorizer } from "../chat/authorizer.js";
import { TelegramChatDelivery } from "../chat/telegram.js";
import type { Authorizer, ChatDelivery } from "../chat/types.js";
import { ConfigProvider } from "../config/loader.js";
import { OverridesRepository } from "../config/OverridesRepository.js";
import type { ShipgateConfig } from "../config/schema.js";
import { AdmissionController } from "../engine/admission.js";
import { CompletionChecker } from "../engine/completion.js";
import { Dispatcher } from "../engine/dispatcher.js";
import { ShipgateEngine } from "../engine/engine.js";
import { BuildMonitor } from "../engine/monitor.js";
import { Notifier } from "../engine/notifier.js";
import { ApprovalStateMachine } from "../engine/stateMachine.js";
import { RetentionSweeper } from "../retention/RetentionSweeper.js";
import { FileWorkflowStore } from "../workflow/fileStore.js";
import type { WorkflowStore } from "../workflow/store.js";

export interface ShipgateCradle {
  overrides: OverridesRepository;
  config: ConfigProvider;
  store: WorkflowStore;
  registry: BackendRegistry;
  chat: ChatDelivery;
  authorizer: Authorizer;
  admission: AdmissionController;
  notifier: Notifier;
  completion: CompletionChecker;
  monitor: BuildMonitor;
  dispatcher: Dispatcher;
  approvals: ApprovalStateMachine;
  retention: RetentionSweeper;
  engine: ShipgateEngine;
}

export interface ContainerOptions {
  /**
   * 配置文件路径（与 config 二选一）
   */
  configPath?: string;
  /**
   * 直接给出配置值，不读文件
   */
  config?: ShipgateConfig;
  /**
   * 状态根目录，默认 <home>/state
   */
  stateDirectory?: string;
  /**
   * 覆盖项目录，默认 <home>/state/overrides
   */
  overridesDirectory?: string;
  store?: WorkflowStore;
  chat?: ChatDelivery;
  backendFactory?: BackendClientFactory;
  submitRetryDelayMs?: number;
}

/**
 * 创建容器并加载配置、初始化存储
 *
 * @example
 * ```ts
 * const container = await createShipgateContainer();
 * const engine = container.resolve("engine");
 * await engine.start();
 * ```
 */
export async function createShipgateContainer(
  options: ContainerOptions = {}
): Promise<AwilixContainer<ShipgateCradle>> {
  const container = createContainer<ShipgateCradle>({
    injectionMode: InjectionMode.CLASSIC
  });

  container.register({
    overrides: asFunction(
      () => new OverridesRepository({ directory: options.overridesDirectory }),
      { lifetime: Lifetime.SINGLETON }
    ),
    config: asFunction(
      (overrides: OverridesRepository) =>
        options.config
          ? ConfigProvider.fromValue(options.config, overrides)
          : new ConfigProvider({ filePath: options.configPath, overrides }),
      { lifetime: Lifetime.SINGLETON }
    )
  });

  if (options.store) {
    container.register({ store: asValue(options.store) });
  } else {
    container.register({
      store: asFunction(() => new FileWorkflowStore({ directory: options.stateDirectory }), {
        lifetime: Lifetime.SINGLETON
      })
    });
  }

  if (options.chat) {
    container.register({ chat: asValue(options.chat) });
  } else {
    container.register({
      chat: asFunction(
        (config: ConfigProvider) => {
          const { telegram, requestTimeoutMs } = config.current();
          return new TelegramChatDelivery({
            botToken: telegram.botToken,
            apiBaseUrl: telegram.apiBaseUrl,
            timeoutMs: requestTimeoutMs
          });
        },
        { lifetime: Lifetime.SINGLETON }
      )
    });
  }

  container.register({
    registry: asFunction(
      (config: ConfigProvider) =>
        new BackendRegistry(config, options.backendFactory ?? createBackendClient),
      { lifetime: Lifetime.SINGLETON }
    ),
    authorizer: asClass(ConfigAuthorizer, { lifetime: Lifetime.SINGLETON }),
    admission: asFunction(
      (registry: BackendRegistry) =>
        new AdmissionController((project, backend) => registry.ceiling(project, backend)),
      { lifetime: Lifetime.SINGLETON }
    ),
    notifier: asClass(Notifier, { lifetime: Lifetime.SINGLETON }),
    completion: asClass(CompletionChecker, { lifetime: Lifetime.SINGLETON }),
    monitor: asClass(BuildMonitor, {
      lifetime: Lifetime.SINGLETON,
      dispose: (instance) => instance.stop()
    }),
    dispatcher: asFunction(
      (
        store: WorkflowStore,
        registry: BackendRegistry,
        admission: AdmissionController,
        monitor: BuildMonitor,
        notifier: Notifier,
        completion: CompletionChecker
      ) =>
        new Dispatcher(store, registry, admission, monitor, notifier, completion, {
          submitRetryDelayMs: options.submitRetryDelayMs
        }),
      { lifetime: Lifetime.SINGLETON }
    ),
    approvals: asClass(ApprovalStateMachine, { lifetime: Lifetime.SINGLETON }),
    retention: asClass(RetentionSweeper, {
      lifetime: Lifetime.SINGLETON,
      dispose: (instance) => instance.stop()
    }),
    engine: asClass(ShipgateEngine, {
      lifetime: Lifetime.SINGLETON,
      dispose: (instance) => instance.stop()
    })
  });

  await container.resolve("overrides").initialize();
  await container.resolve("config").load();
  const store = container.resolve("store");
  if (store instanceof FileWorkflowStore) {
    await store.initialize();
  }

  return container;
}

export async function disposeContainer(container: AwilixContainer<ShipgateCradle>): Promise<void> {
  await container.dispose();
}
