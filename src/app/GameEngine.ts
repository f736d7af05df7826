import { resolveEngineConfig, type EngineConfig } from "../config";
import { loadWorldBundle } from "../content/ContentLoader";
import type { WorldBundle } from "../content/bundleSchema";
import { ActionExecutor } from "../core/actions/ActionExecutor";
import { EventBus } from "../core/engine/EventBus";
import { TurnCoordinator, type TurnReport } from "../core/engine/TurnCoordinator";
import { setLogLevel } from "../core/logging/logger";
import { Scheduler } from "../core/scheduler/Scheduler";
import { createWorldState } from "../core/state/initialState";
import { captureSnapshot, restoreSnapshot, type EngineSnapshot } from "../core/state/snapshot";
import { TriggerRegistry } from "../core/triggers/TriggerRegistry";
import { OutputView } from "../core/view/OutputView";
import { GoalTracker } from "../gameplay/GoalTracker";
import type { EventKind, GameEvent, ItemId, OutputItem, TriggerId, WorldState } from "../types/engine";
import { NpcMovementSystem } from "../world/NpcMovementSystem";
import { StatusEffectSystem } from "../world/StatusEffectSystem";

export interface GameEngineOptions {
  config?: Partial<EngineConfig>;
  env?: NodeJS.ProcessEnv;
  seed?: string;
}

export type EngineEvents = {
  output: OutputItem[];
  turn: TurnReport;
  restored: { turn: number };
};

const NON_PLAYER_EVENTS: EventKind[] = ["always", "playerDeath", "npcDeath"];

export class GameEngine {
  readonly config: EngineConfig;
  readonly bus = new EventBus<EngineEvents>();
  readonly triggers: TriggerRegistry;
  readonly scheduler: Scheduler;
  readonly executor: ActionExecutor;
  readonly goals = new GoalTracker();
  private readonly coordinator: TurnCoordinator;
  private readonly view: OutputView;
  private world: WorldState;

  constructor(bundle: WorldBundle, options: GameEngineOptions = {}) {
    this.config = resolveEngineConfig(options.config, options.env);
    setLogLevel(this.config.logLevel);

    this.view = new OutputView((items) => this.bus.emit("output", items));
    this.scheduler = new Scheduler(
      { runActions: (actions, world, view, origin) => this.executor.runActions(actions, world, view, origin) },
      { tombstoneRetention: this.config.tombstoneRetention }
    );
    this.triggers = new TriggerRegistry(
      { runActions: (actions, world, view, origin) => this.executor.runActions(actions, world, view, origin) }
    );
    this.executor = new ActionExecutor({ scheduler: this.scheduler, triggers: this.triggers });
    this.triggers.registerAll(bundle.triggers);
    this.coordinator = new TurnCoordinator({
      triggers: this.triggers,
      scheduler: this.scheduler,
      movement: new NpcMovementSystem(),
      effects: new StatusEffectSystem()
    });
    this.world = createWorldState(bundle, options.seed);
  }

  static async fromFile(path: string, options: GameEngineOptions = {}): Promise<GameEngine> {
    return new GameEngine(await loadWorldBundle(path), options);
  }

  getWorld(): WorldState {
    return this.world;
  }

  pendingOutput(): readonly OutputItem[] {
    return this.view.pending();
  }

  dispatch(event: GameEvent): TriggerId[] {
    const fired = this.triggers.checkTriggers(event, this.world, this.view);
    if (fired.length === 0 && !NON_PLAYER_EVENTS.includes(event.kind)) {
      this.view.push("failure", this.config.fallbackMessage);
    }
    return fired;
  }

  spawnIntoInventory(item: ItemId): boolean {
    const outcome = this.executor.execute([{ kind: "spawnItemInInventory", item }], this.world, this.view);
    return outcome.applied === 1;
  }

  advanceClock(): number {
    this.world.turnCount += 1;
    return this.world.turnCount;
  }

  advanceTurn(): TurnReport {
    const report = this.coordinator.advanceTurn(this.world, this.view);
    this.bus.emit("turn", report);
    return report;
  }

  snapshot(): EngineSnapshot {
    return captureSnapshot(this.world, this.triggers, this.scheduler);
  }

  restore(candidate: unknown): void {
    this.world = restoreSnapshot(candidate, this.triggers, this.scheduler);
    this.bus.emit("restored", { turn: this.world.turnCount });
  }

  on<K extends keyof EngineEvents>(eventName: K, handler: (payload: EngineEvents[K]) => void): () => void {
    return this.bus.on(eventName, handler);
  }
}
