import { ENGINE_DEFAULTS } from "../../config";
import type { Diagnostic, DiagnosticCode, WorldState } from "../../types/engine";
import { createLogger } from "./logger";

const logger = createLogger("Diagnostics");

export function reportDiagnostic(
  world: WorldState,
  code: DiagnosticCode,
  source: string,
  message: string
): Diagnostic {
  const diagnostic: Diagnostic = { code, source, message, turn: world.turnCount };
  world.diagnostics.push(diagnostic);
  world.diagnostics = world.diagnostics.slice(-ENGINE_DEFAULTS.diagnosticsLimit);
  logger.warn(`${source}: ${message}`, { code, turn: world.turnCount });
  return diagnostic;
}

export function diagnosticsSince(world: WorldState, turn: number): Diagnostic[] {
  return world.diagnostics.filter((entry) => entry.turn >= turn);
}
