import type { ImpactReport } from "../domain/types";
import { TopoError } from "../domain/errors";
import type { ActionState } from "./actionState";

/**
 * Lines and substations the action touches, by intent rather than net effect:
 * disconnecting a line that is already out still counts.
 *
 * With `knownLineStatus`, bus edits at the ends of a disconnected line whose
 * status is edited are folded into the status edit, and setting an end's bus
 * counts as an implicit reconnection (or disconnection) of its line.
 */
export function computeImpact(state: ActionState, knownLineStatus?: readonly boolean[]): ImpactReport {
  const { schema } = state;
  if (knownLineStatus && knownLineStatus.length !== schema.nLine) {
    throw new TopoError(`line status has ${knownLineStatus.length} entries, the grid has ${schema.nLine} lines`);
  }

  const orPos = schema.posTopoVect.line_or;
  const exPos = schema.posTopoVect.line_ex;
  const linesImpacted = state.setLineStatus.map((v, line) => v !== 0 || state.switchLineStatus[line]);
  const effective = state.setTopoVect.map((v, i) => v !== 0 || state.changeBusVect[i]);
  const subsImpacted = new Array<boolean>(schema.nSub).fill(false);

  // explicit status edits operate the breakers at both ends
  linesImpacted.forEach((impacted, line) => {
    if (!impacted) return;
    subsImpacted[schema.toSubid.line_or[line]] = true;
    subsImpacted[schema.toSubid.line_ex[line]] = true;
  });

  if (knownLineStatus) {
    linesImpacted.forEach((impacted, line) => {
      if (impacted && !knownLineStatus[line]) {
        effective[orPos[line]] = false;
        effective[exPos[line]] = false;
      }
    });

    for (let line = 0; line < schema.nLine; line += 1) {
      const connected = knownLineStatus[line];
      const or = state.setTopoVect[orPos[line]];
      const ex = state.setTopoVect[exPos[line]];
      const reconnects = !connected && (or > 0 || ex > 0);
      const disconnects = connected && (or < 0 || ex < 0);
      if (reconnects || disconnects) {
        linesImpacted[line] = true;
        effective[orPos[line]] = false;
        effective[exPos[line]] = false;
      }
    }
  }

  effective.forEach((touched, i) => {
    if (touched) subsImpacted[schema.topoToSubstation[i]] = true;
  });

  return { linesImpacted, subsImpacted };
}
