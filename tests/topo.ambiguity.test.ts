import { describe, it, expect } from "vitest";

import { ActionState } from "../src/topo/action/actionState";
import { input } from "../src/topo/action/accessorInput";
import { actionProfile } from "../src/topo/action/profile";
import { GridSchema } from "../src/topo/schema/gridSchema";
import {
  AmbiguousAction,
  InvalidBusStatus,
  InvalidLineStatus,
  InvalidNumberOfGenerators,
  InvalidNumberOfLoads,
  InvalidNumberOfObjectEnds,
  InvalidRedispatching,
  InvalidShuntData,
  InvalidStorage,
  UnitCommitmentOrRedispatchingNotAvailable,
} from "../src/topo/domain/errors";
import { fixtureDocument, grid14, grid4 } from "./_gridFixtures";

const schema14 = grid14();
const schema4 = grid4();

// Raw bus vector with one entry replaced, bypassing the accessor bounds.
function busAt(action: ActionState, index: number, bus: number): number[] {
  return action.setTopoVect.map((v, i) => (i === index ? bus : v));
}

describe("ambiguity checker", () => {
  it("accepts the do-nothing action", () => {
    const action = new ActionState(schema14);

    expect(() => action.check()).not.toThrow();
    expect(action.isAmbiguous()).toEqual({ ambiguous: false });
  });

  it("reports a line whose status is both set and changed", () => {
    const action = new ActionState(schema14);
    action.assign("line_set_status", input.pair(3, 1));
    action.toggle("line_change_status", input.id(3));

    const result = action.isAmbiguous();
    expect(result.ambiguous).toBe(true);
    expect(result.ambiguous && result.error).toBeInstanceOf(InvalidLineStatus);
    expect(() => action.check()).toThrow("line 3 has both its status set and changed");
  });

  it("checks injection sizes", () => {
    expect(() => new ActionState(schema14).update({ injection: { load_p: [1, 2] } }).check()).toThrow(
      InvalidNumberOfLoads
    );
    expect(() => new ActionState(schema14).update({ injection: { prod_v: [1] } }).check()).toThrow(
      InvalidNumberOfGenerators
    );
  });

  it("checks topology vector sizes", () => {
    const action = new ActionState(schema14);
    action.write({ setTopoVect: [0] });

    expect(() => action.check()).toThrow(InvalidNumberOfObjectEnds);
  });

  // ---- buses ----

  it("reports a bus above 2 or below -1", () => {
    const high = new ActionState(schema14);
    high.write({ setTopoVect: busAt(high, 5, 3) });
    expect(() => high.check()).toThrow("set_bus[5] = 3 is above 2");

    const low = new ActionState(schema14);
    low.write({ setTopoVect: busAt(low, 5, -2) });
    expect(() => low.check()).toThrow(InvalidBusStatus);
  });

  it("reports a bus both set and changed", () => {
    const action = new ActionState(schema14);
    action.assign("set_bus", input.pair(5, 1));
    action.toggle("change_bus", input.id(5));

    expect(() => action.check()).toThrow("topology index 5 has its bus both set and changed");
  });

  it("reports a line disconnected at one end and connected at the other", () => {
    const action = new ActionState(schema14);
    action.assign("line_or_set_bus", input.pair(1, -1));
    action.assign("line_ex_set_bus", input.pair(1, 1));

    expect(() => action.check()).toThrow("line 1 is disconnected at its origin but connected at its extremity");
  });

  it("reports a disconnected line whose end bus is set", () => {
    const action = new ActionState(schema14);
    action.assign("line_set_status", input.pair(1, -1));
    action.assign("line_or_set_bus", input.pair(1, 2));

    expect(() => action.check()).toThrow("line 1 is disconnected but its origin bus is set");
  });

  it("reports a reconnected line whose end bus is changed", () => {
    const action = new ActionState(schema14);
    action.assign("line_set_status", input.pair(1, 1));
    action.toggle("line_ex_change_bus", input.id(1));

    expect(() => action.check()).toThrow(/line 1 is reconnected but its extremity bus is changed/);
  });

  it("accepts a reconnection that sets both end buses", () => {
    const action = new ActionState(schema14);
    action.assign("line_set_status", input.pair(1, 1));
    action.assign("line_or_set_bus", input.pair(1, 2));
    action.assign("line_ex_set_bus", input.pair(1, 1));

    expect(action.isAmbiguous()).toEqual({ ambiguous: false });
  });

  it("reports the first violation in a fixed order", () => {
    const action = new ActionState(schema14);
    action.write({ setTopoVect: busAt(action, 0, 3) });
    action.assign("line_set_status", input.pair(0, -1));
    action.toggle("line_change_status", input.id(0));

    expect(() => action.check()).toThrow(InvalidLineStatus);
  });

  // ---- redispatching ----

  it("needs dispatch data on the grid", () => {
    const doc = fixtureDocument("grid14.json");
    delete doc.dispatch;
    const action = new ActionState(GridSchema.fromDocument(doc));
    action.setAmount("redispatch", input.pair(0, 1));

    expect(() => action.check()).toThrow(UnitCommitmentOrRedispatchingNotAvailable);
    expect(() => action.check()).toThrow(InvalidRedispatching);
  });

  it("rejects redispatching a generator that is not dispatchable", () => {
    const action = new ActionState(schema14);
    action.setAmount("redispatch", input.pair(1, 1));

    expect(() => action.check()).toThrow("generator 1 is not dispatchable");
  });

  it("bounds redispatching by the ramps", () => {
    const up = new ActionState(schema14);
    up.setAmount("redispatch", input.pair(0, 12));
    expect(() => up.check()).toThrow(/above its maximum ramp up/);

    const down = new ActionState(schema14);
    down.setAmount("redispatch", input.pair(0, -12));
    expect(() => down.check()).toThrow(/below its maximum ramp down/);

    const within = new ActionState(schema14);
    within.setAmount("redispatch", input.pair(0, 10));
    expect(within.isAmbiguous()).toEqual({ ambiguous: false });
  });

  it("bounds the production set point plus redispatching by pmax", () => {
    const action = new ActionState(schema14).update({
      injection: { prod_p: [145, null, null, null, null, null] },
      redispatch: [[0, 8]],
    });

    expect(() => action.check()).toThrow("prod_p + redispatch of generator 0 (153) is above its pmax");
  });

  // ---- storage ----

  it("bounds storage power by max_p_absorb and max_p_prod", () => {
    const absorb = new ActionState(schema4);
    absorb.setAmount("storage_p", input.pair(0, 6));
    expect(() => absorb.check()).toThrow("storage unit 0 cannot absorb 6 (max 5)");

    const produce = new ActionState(schema4);
    produce.setAmount("storage_p", input.pair(1, -9));
    expect(() => produce.check()).toThrow("storage unit 1 cannot produce 9 (max 8)");

    const within = new ActionState(schema4);
    within.setAmount("storage_p", input.pairs([[0, 5], [1, -8]]));
    expect(within.isAmbiguous()).toEqual({ ambiguous: false });
  });

  it("rejects storage power on a grid without storage", () => {
    const action = new ActionState(schema14);
    action.write({ storagePower: [3] });

    expect(() => action.check()).toThrow(InvalidStorage);
  });

  it("rejects connecting storage in an action that cannot set its power", () => {
    const action = new ActionState(schema4, actionProfile(schema4, "topologyOnly"));
    action.assign("storage_set_bus", input.pair(0, 1));

    expect(() => action.check()).toThrow(InvalidStorage);
  });

  // ---- shunts ----

  it("checks shunt buses and sizes", () => {
    const bus = new ActionState(schema4);
    bus.update({ shunt: { shunt_bus: [[0, 2]] } });
    expect(bus.isAmbiguous()).toEqual({ ambiguous: false });

    const shunt = bus.shunt;
    if (!shunt) throw new Error("grid4 has shunts");
    bus.write({ shunt: { ...shunt, bus: [3] } });
    expect(() => bus.check()).toThrow(InvalidShuntData);

    const foreign = new ActionState(schema14);
    foreign.write({ shunt: { p: [1], q: [1], bus: [0] } });
    expect(() => foreign.check()).toThrow("the grid does not declare shunts but the action modifies them");
  });

  it("returns ambiguity as a value and every violation as an AmbiguousAction", () => {
    const action = new ActionState(schema14);
    action.write({ setTopoVect: busAt(action, 0, -2) });

    const result = action.isAmbiguous();
    if (!result.ambiguous) throw new Error("expected an ambiguous action");
    expect(result.error).toBeInstanceOf(AmbiguousAction);
    expect(result.error.code).toBe("AMBIGUOUS_ACTION");
    expect(result.error.name).toBe("InvalidBusStatus");
  });
});
