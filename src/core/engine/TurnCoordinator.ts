import type { GameEvent, OutputItem, TriggerId, WorldState } from "../../types/engine";
import type { NpcMove, NpcMovementSystem } from "../../world/NpcMovementSystem";
import type { StatusEffectSystem } from "../../world/StatusEffectSystem";
import { createLogger } from "../logging/logger";
import type { DrainReport, Scheduler } from "../scheduler/Scheduler";
import type { TriggerRegistry } from "../triggers/TriggerRegistry";
import type { OutputView } from "../view/OutputView";

export interface TurnCoordinatorDeps {
  triggers: TriggerRegistry;
  scheduler: Scheduler;
  movement: NpcMovementSystem;
  effects: StatusEffectSystem;
}

export interface TurnReport {
  turn: number;
  advanced: boolean;
  movedNpcs: NpcMove[];
  drain: DrainReport;
  deaths: GameEvent[];
  ambientFired: TriggerId[];
  output: OutputItem[];
}

const logger = createLogger("TurnCoordinator");

export class TurnCoordinator {
  constructor(private readonly deps: TurnCoordinatorDeps) {}

  advanceTurn(world: WorldState, view: OutputView): TurnReport {
    const { triggers, scheduler, movement, effects } = this.deps;
    const turn = world.turnCount;
    const advanced = turn > world.clock.lastProcessedTurn;

    const movedNpcs = advanced ? movement.advance(world, view) : [];
    const drain: DrainReport = advanced ? scheduler.drainDue(turn, world, view) : { turn, resolutions: [] };

    const ambientFired: TriggerId[] = [];
    const deaths = advanced ? effects.tick(world, view) : [];
    for (const death of deaths) {
      ambientFired.push(...triggers.checkTriggers(death, world, view));
    }
    ambientFired.push(...triggers.checkTriggers({ kind: "always" }, world, view));

    if (advanced) world.clock.lastProcessedTurn = turn;
    const output = view.flush();
    logger.debug(`turn ${turn} processed`, {
      advanced,
      moved: movedNpcs.length,
      resolved: drain.resolutions.length,
      fired: ambientFired.length
    });
    return { turn, advanced, movedNpcs, drain, deaths, ambientFired, output };
  }
}
