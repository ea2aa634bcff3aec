import type { ImpactReport } from "../domain/types";
import type { ActionState } from "../action/actionState";

export type LegalityDecision = { allowed: true } | { allowed: false; code: string; message?: string };

/** Game rules live outside this package; they see the action and its impact. */
export interface LegalityGate {
  evaluate(action: ActionState, impact: ImpactReport): LegalityDecision;
}

export const allowAllGate: LegalityGate = {
  evaluate() {
    return { allowed: true };
  },
};
