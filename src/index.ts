export * from "./types/engine";
export { ENGINE_DEFAULTS, LOG_LEVELS, resolveEngineConfig, type EngineConfig } from "./config";
export { EngineError, BundleValidationError, QueueCorruptionError, SnapshotValidationError, ConfigError } from "./core/errors";
export { createLogger, setLogLevel, getLogLevel, type Logger, type LogLevel } from "./core/logging/logger";
export { reportDiagnostic, diagnosticsSince } from "./core/logging/diagnostics";
export { evaluateCondition, matchesEvent, isFlagComplete, goalStatus, type EvaluationContext } from "./core/conditions/ConditionEvaluator";
export { flattenCondition, flattenActions } from "./core/conditions/flattenCondition";
export { TriggerRegistry, type RegisteredTrigger } from "./core/triggers/TriggerRegistry";
export { ActionExecutor, type ActionExecutorDeps, type ActionOutcome } from "./core/actions/ActionExecutor";
export type { ActionRunner, ScheduleRequest, ScheduleSink, TriggerSwitch } from "./core/actions/contracts";
export { Scheduler, type DrainReport, type EventResolution, type SchedulerOptions } from "./core/scheduler/Scheduler";
export { TurnCoordinator, type TurnReport } from "./core/engine/TurnCoordinator";
export { EventBus } from "./core/engine/EventBus";
export { OutputView, type OutputSink } from "./core/view/OutputView";
export { createWorldState } from "./core/state/initialState";
export { captureSnapshot, restoreSnapshot, type EngineSnapshot } from "./core/state/snapshot";
export { SaveStateManager, createMemoryStorage, type SaveStorage } from "./core/state/SaveStateManager";
export { NpcMovementSystem, type NpcMove } from "./world/NpcMovementSystem";
export { StatusEffectSystem } from "./world/StatusEffectSystem";
export { GoalTracker, type GoalSummary } from "./gameplay/GoalTracker";
export { parseWorldBundle, loadWorldBundle } from "./content/ContentLoader";
export { worldBundleSchema, type WorldBundle, type WorldBundleInput } from "./content/bundleSchema";
export { GameEngine, type EngineEvents, type GameEngineOptions } from "./app/GameEngine";
export { parseDebugCommand, runDebugCommand, type DebugCommand } from "./app/debugCommands";
