import type { AmbiguityResult } from "../domain/types";
import {
  AmbiguousAction,
  InvalidBusStatus,
  InvalidLineStatus,
  InvalidNumberOfGenerators,
  InvalidNumberOfLines,
  InvalidNumberOfLoads,
  InvalidNumberOfObjectEnds,
  InvalidRedispatching,
  InvalidShuntData,
  InvalidStorage,
  UnitCommitmentOrRedispatchingNotAvailable,
} from "../domain/errors";
import type { ActionState } from "./actionState";
import { supportsAttr } from "./profile";

function hasLength(values: readonly unknown[], expected: number): boolean {
  return values.length === expected;
}

/**
 * Throws the first semantic violation found in `state`. Checks always run in
 * the same order so the reported violation is deterministic.
 */
export function assertNotAmbiguous(state: ActionState): void {
  const { schema } = state;

  // ---- 1. line status set and changed together ----
  const conflictingLine = state.switchLineStatus.findIndex(
    (changed, line) => changed && (state.setLineStatus[line] ?? 0) !== 0
  );
  if (conflictingLine !== -1) {
    throw new InvalidLineStatus(`line ${conflictingLine} has both its status set and changed`);
  }

  // ---- 2. injection vector sizes ----
  const { load_p, load_q, prod_p, prod_v } = state.injection;
  if (load_p && !hasLength(load_p, schema.nLoad)) {
    throw new InvalidNumberOfLoads(`load_p has ${load_p.length} entries, the grid has ${schema.nLoad} loads`);
  }
  if (load_q && !hasLength(load_q, schema.nLoad)) {
    throw new InvalidNumberOfLoads(`load_q has ${load_q.length} entries, the grid has ${schema.nLoad} loads`);
  }
  if (prod_p && !hasLength(prod_p, schema.nGen)) {
    throw new InvalidNumberOfGenerators(`prod_p has ${prod_p.length} entries, the grid has ${schema.nGen} generators`);
  }
  if (prod_v && !hasLength(prod_v, schema.nGen)) {
    throw new InvalidNumberOfGenerators(`prod_v has ${prod_v.length} entries, the grid has ${schema.nGen} generators`);
  }

  // ---- 3. topology and line vector sizes ----
  if (!hasLength(state.changeBusVect, schema.dimTopo)) {
    throw new InvalidNumberOfObjectEnds(
      `change_bus has ${state.changeBusVect.length} entries, the topology vector has ${schema.dimTopo}`
    );
  }
  if (!hasLength(state.setTopoVect, schema.dimTopo)) {
    throw new InvalidNumberOfObjectEnds(
      `set_bus has ${state.setTopoVect.length} entries, the topology vector has ${schema.dimTopo}`
    );
  }
  if (!hasLength(state.setLineStatus, schema.nLine)) {
    throw new InvalidNumberOfLines(`set_line_status has ${state.setLineStatus.length} entries, the grid has ${schema.nLine} lines`);
  }
  if (!hasLength(state.switchLineStatus, schema.nLine)) {
    throw new InvalidNumberOfLines(
      `change_line_status has ${state.switchLineStatus.length} entries, the grid has ${schema.nLine} lines`
    );
  }
  if (!hasLength(state.redispatch, schema.nGen)) {
    throw new InvalidNumberOfGenerators(`redispatch has ${state.redispatch.length} entries, the grid has ${schema.nGen} generators`);
  }

  // ---- 4. redispatching ----
  if (state.redispatch.some((v) => Number.isFinite(v) && v !== 0)) {
    const dispatch = schema.dispatch;
    if (!dispatch) {
      throw new UnitCommitmentOrRedispatchingNotAvailable("redispatching is not available on this grid");
    }
    state.redispatch.forEach((amount, gen) => {
      if (!Number.isFinite(amount) || amount === 0) return;
      if (!dispatch.gen_redispatchable[gen]) {
        throw new InvalidRedispatching(`generator ${gen} is not dispatchable`);
      }
      if (amount > dispatch.gen_max_ramp_up[gen]) {
        throw new InvalidRedispatching(`redispatching of generator ${gen} (${amount}) is above its maximum ramp up`);
      }
      if (-amount > dispatch.gen_max_ramp_down[gen]) {
        throw new InvalidRedispatching(`redispatching of generator ${gen} (${amount}) is below its maximum ramp down`);
      }
    });
    if (prod_p) {
      prod_p.forEach((p, gen) => {
        if (!Number.isFinite(p)) return;
        const target = p + state.redispatch[gen];
        if (target > dispatch.gen_pmax[gen]) {
          throw new InvalidRedispatching(`prod_p + redispatch of generator ${gen} (${target}) is above its pmax`);
        }
        if (target < dispatch.gen_pmin[gen]) {
          throw new InvalidRedispatching(`prod_p + redispatch of generator ${gen} (${target}) is below its pmin`);
        }
      });
    }
  }

  // ---- 5. storage ----
  if (state.storagePower.some((v) => Number.isFinite(v) && v !== 0)) {
    const storage = schema.storageData;
    if (schema.nStorage === 0 || !storage) {
      throw new InvalidStorage("the grid has no storage unit");
    }
    if (!hasLength(state.storagePower, schema.nStorage)) {
      throw new InvalidStorage(
        `storage power has ${state.storagePower.length} entries, the grid has ${schema.nStorage} storage units`
      );
    }
    state.storagePower.forEach((power, unit) => {
      if (!Number.isFinite(power)) return;
      if (power < -storage.storage_max_p_prod[unit]) {
        throw new InvalidStorage(`storage unit ${unit} cannot produce ${-power} (max ${storage.storage_max_p_prod[unit]})`);
      }
      if (power > storage.storage_max_p_absorb[unit]) {
        throw new InvalidStorage(`storage unit ${unit} cannot absorb ${power} (max ${storage.storage_max_p_absorb[unit]})`);
      }
    });
  }
  if (!supportsAttr(state.profile, "storage_power")) {
    schema.posTopoVect.storage.forEach((pos, unit) => {
      if (state.setTopoVect[pos] > 0) {
        throw new InvalidStorage(`storage unit ${unit} cannot be connected by an action that does not set storage power`);
      }
      if (state.changeBusVect[pos]) {
        throw new InvalidStorage(`storage unit ${unit} cannot change bus in an action that does not set storage power`);
      }
    });
  }

  // ---- 6. bus range ----
  const tooLow = state.setTopoVect.findIndex((v) => v < -1);
  if (tooLow !== -1) {
    throw new InvalidBusStatus(`set_bus[${tooLow}] = ${state.setTopoVect[tooLow]} is below -1`);
  }
  const tooHigh = state.setTopoVect.findIndex((v) => v > 2);
  if (tooHigh !== -1) {
    throw new InvalidBusStatus(`set_bus[${tooHigh}] = ${state.setTopoVect[tooHigh]} is above 2`);
  }
  const badStatus = state.setLineStatus.findIndex((v) => v < -1 || v > 1);
  if (badStatus !== -1) {
    throw new InvalidLineStatus(`set_line_status[${badStatus}] = ${state.setLineStatus[badStatus]} is outside [-1, 1]`);
  }

  // ---- 7. bus set and changed together ----
  const setAndChanged = state.changeBusVect.findIndex((changed, i) => changed && state.setTopoVect[i] !== 0);
  if (setAndChanged !== -1) {
    throw new InvalidBusStatus(`topology index ${setAndChanged} has its bus both set and changed`);
  }

  // ---- 8. one end disconnected, the other connected ----
  const orPos = schema.posTopoVect.line_or;
  const exPos = schema.posTopoVect.line_ex;
  for (let line = 0; line < schema.nLine; line += 1) {
    const or = state.setTopoVect[orPos[line]];
    const ex = state.setTopoVect[exPos[line]];
    if (or === -1 && ex > 0) {
      throw new InvalidLineStatus(`line ${line} is disconnected at its origin but connected at its extremity`);
    }
    if (ex === -1 && or > 0) {
      throw new InvalidLineStatus(`line ${line} is disconnected at its extremity but connected at its origin`);
    }
  }

  // ---- 9. status edit vs bus edit on the same line ----
  for (let line = 0; line < schema.nLine; line += 1) {
    const status = state.setLineStatus[line];
    const or = orPos[line];
    const ex = exPos[line];
    if (status === -1) {
      if (state.setTopoVect[or] > 0) {
        throw new InvalidLineStatus(`line ${line} is disconnected but its origin bus is set`);
      }
      if (state.changeBusVect[or]) {
        throw new InvalidLineStatus(`line ${line} is disconnected but its origin bus is changed`);
      }
      if (state.setTopoVect[ex] > 0) {
        throw new InvalidLineStatus(`line ${line} is disconnected but its extremity bus is set`);
      }
      if (state.changeBusVect[ex]) {
        throw new InvalidLineStatus(`line ${line} is disconnected but its extremity bus is changed`);
      }
    } else if (status === 1) {
      if (state.changeBusVect[or]) {
        throw new InvalidLineStatus(`line ${line} is reconnected but its origin bus is changed, set it instead`);
      }
      if (state.changeBusVect[ex]) {
        throw new InvalidLineStatus(`line ${line} is reconnected but its extremity bus is changed, set it instead`);
      }
    }
  }

  // ---- 10. shunts ----
  const shunt = state.shunt;
  if (!schema.capabilities.shunts) {
    if (shunt !== null) {
      throw new InvalidShuntData("the grid does not declare shunts but the action modifies them");
    }
    return;
  }
  if (shunt === null) return;
  if (!hasLength(shunt.p, schema.nShunt)) {
    throw new InvalidShuntData(`shunt_p has ${shunt.p.length} entries, the grid has ${schema.nShunt} shunts`);
  }
  if (!hasLength(shunt.q, schema.nShunt)) {
    throw new InvalidShuntData(`shunt_q has ${shunt.q.length} entries, the grid has ${schema.nShunt} shunts`);
  }
  if (!hasLength(shunt.bus, schema.nShunt)) {
    throw new InvalidShuntData(`shunt_bus has ${shunt.bus.length} entries, the grid has ${schema.nShunt} shunts`);
  }
  const badShuntBus = shunt.bus.findIndex((v) => v < -1 || v > 2);
  if (badShuntBus !== -1) {
    throw new InvalidShuntData(`shunt_bus[${badShuntBus}] = ${shunt.bus[badShuntBus]} is outside [-1, 2]`);
  }
}

export function checkAmbiguity(state: ActionState): AmbiguityResult<AmbiguousAction> {
  try {
    assertNotAmbiguous(state);
    return { ambiguous: false };
  } catch (err) {
    if (err instanceof AmbiguousAction) return { ambiguous: true, error: err };
    throw err;
  }
}
