import type { ImpactReport } from "../domain/types";
import type { ActionSummary, ActionTypes } from "../action/describe";
import type { LegalityDecision, LegalityGate } from "../ports/legalityPort";
import { allowAllGate } from "../ports/legalityPort";
import type { UpdateDict } from "../action/update";
import type { ActionSpace } from "./actionSpace";

export interface Inspection {
  ambiguous: boolean;
  error?: { name: string; code: string; message: string };
  impact: ImpactReport;
  types: ActionTypes;
  summary: ActionSummary;
  legality: LegalityDecision;
  description: string;
}

/**
 * Builds the action described by `dict` and reports everything a rules
 * engine needs to judge it. Malformed descriptions throw IllegalAction.
 */
export function inspectAction(
  space: ActionSpace,
  dict: UpdateDict,
  knownLineStatus?: readonly boolean[],
  gate: LegalityGate = allowAllGate
): Inspection {
  const action = space.create(dict);
  const check = action.isAmbiguous();
  const impact = action.impact(knownLineStatus);

  const base = {
    impact,
    types: action.getTypes(),
    summary: action.asDict(),
    description: action.describe(),
  };

  if (check.ambiguous) {
    const { name, code, message } = check.error;
    return {
      ...base,
      ambiguous: true,
      error: { name, code, message },
      legality: { allowed: false, code: "AMBIGUOUS_ACTION", message },
    };
  }
  return { ...base, ambiguous: false, legality: gate.evaluate(action, impact) };
}
