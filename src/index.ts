export * from "./workflow/model.js";
export * from "./workflow/status.js";
export type { WorkflowQuery, WorkflowStore, StatusUpdateExtras } from "./workflow/store.js";
export { FileWorkflowStore, type FileWorkflowStoreOptions } from "./workflow/fileStore.js";

export * from "./config/schema.js";
export { ConfigError, ConfigProvider, applyOverrides, parseConfig, resolveConfigPath } from "./config/loader.js";
export { OverridesRepository } from "./config/OverridesRepository.js";

export * from "./backends/types.js";
export { BackendRegistry, createBackendClient, type BackendClientFactory } from "./backends/registry.js";
export { JenkinsBackendClient } from "./backends/jenkins.js";
export { SsoBackendClient } from "./backends/sso.js";

export type { Authorizer, ChatDelivery, ProjectRole } from "./chat/types.js";
export { ConfigAuthorizer } from "./chat/authorizer.js";
export { TelegramChatDelivery } from "./chat/telegram.js";

export * from "./engine/errors.js";
export { AdmissionController, type ReleaseSlot } from "./engine/admission.js";
export { BuildMonitor, type SubmissionStatusEvent } from "./engine/monitor.js";
export { CompletionChecker, type SettledWorkflow } from "./engine/completion.js";
export { Dispatcher, type DispatchReport } from "./engine/dispatcher.js";
export { Notifier, type NotificationEvent } from "./engine/notifier.js";
export {
  ApprovalStateMachine,
  DECISION_ACTIONS,
  type DecisionAction,
  type DecisionOutcome
} from "./engine/stateMachine.js";
export { ShipgateEngine, type WorkflowView } from "./engine/engine.js";
export { RetentionSweeper, type PurgeResult } from "./retention/RetentionSweeper.js";
export { createShipgateContainer, disposeContainer, type ShipgateCradle } from "./di/container.js";
