import { describe, it, expect } from "vitest";

import { ActionState } from "../src/topo/action/actionState";
import { input } from "../src/topo/action/accessorInput";
import { actionProfile } from "../src/topo/action/profile";
import { IllegalAction, OutOfRange, UnknownElementName } from "../src/topo/domain/errors";
import { GRID14_POS, grid14, grid4, trueIndices } from "./_gridFixtures";

const schema14 = grid14();
const schema4 = grid4();

describe("set_bus accessors", () => {
  it("accepts a pair, a list of pairs, a mapping, a dense vector and a name alike", () => {
    const forms = [
      input.pair(4, 2),
      input.pairs([[4, 2]]),
      input.mapping({ "4": 2 }),
      input.mapping(new Map([[4, 2]])),
      input.dense([0, 0, 0, 0, 2, 0, 0, 0, 0, 0, 0]),
      input.pair("load_4_5", 2),
    ];

    const vectors = forms.map((form) => {
      const action = new ActionState(schema14);
      action.assign("load_set_bus", form);
      return action.setTopoVect;
    });

    for (const v of vectors) expect(v).toEqual(vectors[0]);
    expect(vectors[0][GRID14_POS.load[4]]).toBe(2);
    expect(vectors[0].filter((v) => v !== 0)).toEqual([2]);
  });

  it("reads back per element kind", () => {
    const action = new ActionState(schema14);
    action.assign("line_or_set_bus", input.pairs([[1, 2], [3, -1]]));

    expect(action.read("line_or_set_bus").slice(0, 4)).toEqual([0, 2, 0, -1]);
    expect(action.setTopoVect[2]).toBe(2);
    expect(action.setTopoVect[10]).toBe(-1);
    expect(action.modified.setBus).toBe(true);
  });

  it("addresses the global vector by topology index only", () => {
    const action = new ActionState(schema14);
    action.assign("set_bus", input.pair(56, 2));

    expect(action.read("line_ex_set_bus")[19]).toBe(2);
    expect(() => action.assign("set_bus", input.pair("sub_0", 1))).toThrow(IllegalAction);
  });

  it("rejects a bus out of [-1, 2] and leaves the action untouched", () => {
    const action = new ActionState(schema14);

    expect(() => action.assign("gen_set_bus", input.pair(0, 3))).toThrow(OutOfRange);
    expect(() => action.assign("gen_set_bus", input.pair(0, -2))).toThrow(/below the minimum -1/);
    expect(() => action.assign("gen_set_bus", input.pair(0, 1.5))).toThrow(IllegalAction);
    expect(action.setTopoVect.every((v) => v === 0)).toBe(true);
    expect(action.modified.setBus).toBe(false);
  });

  it("applies nothing when one entry of a batch is invalid", () => {
    const action = new ActionState(schema14);

    expect(() =>
      action.assign("load_set_bus", input.pairs([[0, 1], [1, 2], [99, 1]]))
    ).toThrow(/load id 99 is out of range \[0, 11\)/);
    expect(action.setTopoVect.every((v) => v === 0)).toBe(true);
  });

  it("rejects unknown names, float ids and dense vectors of the wrong size", () => {
    const action = new ActionState(schema14);

    expect(() => action.assign("load_set_bus", input.pair("load_x", 1))).toThrow(UnknownElementName);
    expect(() => action.assign("load_set_bus", input.pair("load_x", 1))).toThrow(IllegalAction);
    expect(() => action.assign("load_set_bus", input.pair(1.5, 1))).toThrow(/ids must be integers/);
    expect(() => action.assign("load_set_bus", input.dense([1, 2]))).toThrow(
      "expected a vector of 11 load values, got 2"
    );
  });

  it("refuses storage edits on a grid without storage", () => {
    const action = new ActionState(schema14);

    expect(() => action.assign("storage_set_bus", input.pair(0, 1))).toThrow("the grid has no storage unit");
    expect(() => action.toggle("storage_change_bus", input.id(0))).toThrow(IllegalAction);
    expect(() => action.setAmount("storage_p", input.pair(0, 1))).toThrow(IllegalAction);
  });

  it("sets line status by name", () => {
    const action = new ActionState(schema14);
    action.assign("line_set_status", input.pair("0_2_1", -1));

    expect(action.read("line_set_status")[1]).toBe(-1);
    expect(() => action.assign("line_set_status", input.pair(1, 2))).toThrow(OutOfRange);
  });
});

describe("change_bus accessors", () => {
  it("flips once per occurrence", () => {
    const action = new ActionState(schema14);

    action.toggle("line_change_status", input.id(3));
    expect(action.switchLineStatus[3]).toBe(true);

    action.toggle("line_change_status", input.id(3));
    expect(action.switchLineStatus[3]).toBe(false);

    action.toggle("line_change_status", input.ids([5, 5]));
    expect(action.switchLineStatus[5]).toBe(false);
    expect(action.modified.changeStatus).toBe(true);
  });

  it("takes a boolean mask", () => {
    const action = new ActionState(schema14);
    action.toggle("gen_change_bus", input.dense([false, false, true, false, false, true]));

    expect(trueIndices(action.changeBusVect)).toEqual([GRID14_POS.generator[2], GRID14_POS.generator[5]]);
    expect(action.readToggle("gen_change_bus")).toEqual([false, false, true, false, false, true]);
    expect(() => action.toggle("gen_change_bus", input.dense([true]))).toThrow(IllegalAction);
  });
});

describe("float accessors", () => {
  it("writes redispatch by id or name", () => {
    const action = new ActionState(schema14);
    action.setAmount("redispatch", input.pair("gen_2_2", 4.5));

    expect(action.read("redispatch")).toEqual([0, 0, 4.5, 0, 0, 0]);
  });

  it("leaves entries given as NaN unchanged", () => {
    const action = new ActionState(schema14);
    action.setAmount("redispatch", input.pair(1, 3));
    action.setAmount("redispatch", input.dense([1, Number.NaN, 0, 0, 0, 0]));

    expect(action.redispatch).toEqual([1, 3, 0, 0, 0, 0]);
  });

  it("writes storage power", () => {
    const action = new ActionState(schema4);
    action.setAmount("storage_p", input.pair("storage_1_3", -2.5));

    expect(action.read("storage_p")).toEqual([0, -2.5]);
    expect(action.modified.storage).toBe(true);
  });
});

describe("substation-wide accessors", () => {
  it("sets every element of a substation", () => {
    const action = new ActionState(schema14);
    action.subSetBus(input.pair(1, [2, 2, 1, 1, 2]));

    expect(action.setTopoVect.slice(3, 8)).toEqual([2, 2, 1, 1, 2]);
  });

  it("accepts substation names in a mapping", () => {
    const action = new ActionState(schema14);
    action.subSetBus(input.mapping({ sub_0: [1, 2, 2] }));

    expect(action.setTopoVect.slice(0, 3)).toEqual([1, 2, 2]);
  });

  it("rejects a vector that does not match the substation size", () => {
    const action = new ActionState(schema14);

    expect(() => action.subSetBus(input.pair(1, [2, 2]))).toThrow(
      "substation 1 has 5 elements, got a vector of 2 values"
    );
  });

  it("flips the flagged elements of a substation", () => {
    const action = new ActionState(schema14);
    action.subChangeBus(input.pair(0, [true, false, true]));

    expect(trueIndices(action.changeBusVect)).toEqual([0, 2]);
  });
});

describe("action profiles", () => {
  it("forbids keys outside the profile", () => {
    const action = new ActionState(schema14, actionProfile(schema14, "topologySet"));

    expect(() => action.toggle("line_change_status", input.id(0))).toThrow(
      'the "topologySet" action profile does not allow "change_line_status"'
    );
    expect(() => action.setAmount("redispatch", input.pair(0, 1))).toThrow(IllegalAction);

    action.assign("line_set_status", input.pair(0, -1));
    expect(action.setLineStatus[0]).toBe(-1);
  });
});

describe("shunt accessors", () => {
  it("write powers and buses by id or name", () => {
    const action = new ActionState(schema4);
    action.shuntP(input.pair("shunt_0_1", 2.5));
    action.shuntBus(input.pair(0, 2));

    expect(action.getShunt()).toEqual({ p: [2.5], q: [Number.NaN], bus: [2] });
    expect(action.modified.shunt).toBe(true);
  });

  it("leave the shunt untouched on an out-of-range bus", () => {
    const action = new ActionState(schema4);
    expect(() => action.shuntBus(input.pair(0, 3))).toThrow(OutOfRange);
    expect(action.getShunt()?.bus).toEqual([0]);
  });

  it("refuse a grid without shunts", () => {
    const action = new ActionState(schema14);
    expect(() => action.shuntQ(input.pair(0, 1))).toThrow("the grid does not declare shunts");
  });
});

describe("reads", () => {
  it("hands out copies", () => {
    const action = new ActionState(schema4);
    action.update({ shunt: { shunt_p: [[0, 1.5]] } });

    const shunt = action.getShunt();
    if (!shunt) throw new Error("grid4 has shunts");
    shunt.p[0] = 9;

    expect(action.getShunt()?.p).toEqual([1.5]);
    expect(action.getInjection("load_p")).toBeUndefined();
  });

  it("recomputes impact and encoding after a raw vector write", () => {
    const action = new ActionState(schema14);
    const before = action.toVect();
    expect(action.impact().linesImpacted[1]).toBe(false);

    action.write({ setLineStatus: action.setLineStatus.map((v, i) => (i === 1 ? -1 : v)) });

    expect(action.impact().linesImpacted[1]).toBe(true);
    expect(action.toVect()[41]).toBe(-1);
    expect(before[41]).toBe(0);
  });

  it("drops the cached impact on every edit", () => {
    const action = new ActionState(schema14);
    expect(trueIndices(action.impact().subsImpacted)).toEqual([]);

    action.assign("load_set_bus", input.pair(0, 2));
    expect(trueIndices(action.impact().subsImpacted)).toEqual([1]);
  });
});
