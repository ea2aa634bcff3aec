import { describe, it, expect } from "vitest";

import { ActionSpace } from "../src/topo/service/actionSpace";
import {
  AmbiguousAction,
  IllegalAction,
  IncorrectNumberOfElements,
  InvalidBusStatus,
  InvalidLineStatus,
  InvalidNumberOfObjectEnds,
} from "../src/topo/domain/errors";
import { grid14, grid4 } from "./_gridFixtures";

const space14 = new ActionSpace(grid14());
const space4 = new ActionSpace(grid4());

// Offsets inside a complete grid14 vector.
const SET_LINE_STATUS = 40;
const SET_BUS = 80;

function sample14() {
  return space14.create({
    set_bus: { loads_id: [[0, 2]] },
    change_bus: { generators_id: [2] },
    set_line_status: [[4, -1]],
    change_line_status: [10],
    redispatch: [[0, 5]],
    injection: { load_p: [10, null, null, null, null, null, null, null, null, null, null] },
    hazards: [7],
  });
}

describe("flat vector", () => {
  it("has one slot per attribute entry", () => {
    expect(space14.size()).toBe(234);
    expect(space4.size()).toBe(59);

    const topology = new ActionSpace(grid14(), "topologyOnly");
    expect(topology.attrList).toEqual(["set_line_status", "change_line_status", "set_bus", "change_bus"]);
    expect(topology.shape()).toEqual([20, 20, 57, 57]);
    expect(topology.size()).toBe(154);
  });

  it("encodes the do-nothing action as NaN injections followed by zeros", () => {
    const vect = space14.doNothing().toVect();

    expect(vect).toHaveLength(234);
    expect(vect.slice(0, 34).every(Number.isNaN)).toBe(true);
    expect(vect.slice(34).every((v) => v === 0)).toBe(true);
  });

  it("round-trips an action", () => {
    const action = sample14();
    const vect = action.toVect();

    expect(vect[12]).toBe(10);
    expect(vect[SET_LINE_STATUS + 4]).toBe(-1);
    expect(vect[SET_BUS + 3]).toBe(2);
    expect(space14.fromVect(vect).equals(action)).toBe(true);
  });

  it("round-trips storage and shunts", () => {
    const action = space4.create({
      set_storage: [[0, 1], [1, -2]],
      set_bus: { storages_id: [[0, 2]] },
      shunt: { shunt_p: [[0, 1.5]], shunt_bus: [[0, 2]] },
    });

    const decoded = space4.fromVect(action.toVect());

    expect(decoded.equals(action)).toBe(true);
    expect(decoded.getShunt()).toEqual({ p: [1.5], q: [Number.NaN], bus: [2] });
  });

  it("derives the modification flags from the values", () => {
    const vect = space14.doNothing().toVect();
    vect[SET_LINE_STATUS + 4] = -1;
    vect[12] = 10;

    const action = space14.fromVect(vect);

    expect(action.modified.setStatus).toBe(true);
    expect(action.modified.changeBus).toBe(false);
    expect(action.modified.injection).toBe(true);
    expect(action.getInjection("load_p")?.[0]).toBe(10);
    expect(action.getInjection("load_q")).toBeUndefined();
  });

  it("rejects a vector of the wrong size", () => {
    expect(() => space14.fromVect(new Array<number>(233).fill(0))).toThrow(IncorrectNumberOfElements);
    expect(() => space14.fromVect(new Array<number>(233).fill(0))).toThrow("expected a vector of 234 values, got 233");
  });

  it("rejects a non-integer bus", () => {
    const vect = space14.doNothing().toVect();
    vect[SET_BUS] = 1.5;

    expect(() => space14.fromVect(vect)).toThrow(IllegalAction);
    expect(() => space14.fromVect(vect)).toThrow("set_bus[0] must be an integer, got 1.5");
  });

  it("checks the decoded action unless told otherwise", () => {
    const vect = space14.doNothing().toVect();
    vect[SET_BUS + 3] = 3;

    expect(() => space14.fromVect(vect)).toThrow(InvalidBusStatus);
    const unchecked = space14.fromVect(vect, false);
    expect(unchecked.isAmbiguous().ambiguous).toBe(true);
  });

  it("hands out a copy of the cached vector", () => {
    const action = sample14();
    action.toVect()[SET_BUS + 3] = 0;

    expect(action.toVect()[SET_BUS + 3]).toBe(2);
  });
});

describe("JSON form", () => {
  it("omits absent injections and writes NaN as null", () => {
    const json = sample14().toJson();

    expect(json.prod_p).toBeUndefined();
    expect(json.load_p).toEqual([10, null, null, null, null, null, null, null, null, null, null]);
    expect(json.set_line_status?.[4]).toBe(-1);
    expect(json.hazards?.[7]).toBe(true);
  });

  it("round-trips through JSON text", () => {
    const action = sample14();
    const text = JSON.stringify(action.toJson());

    expect(space14.fromJson(JSON.parse(text)).equals(action)).toBe(true);
  });

  it("rejects unknown attributes", () => {
    expect(() => space14.fromJson({ foo: [1] })).toThrow(AmbiguousAction);
    expect(() => space14.fromJson({ shunt_p: [1] })).toThrow('unknown attribute "shunt_p" for a "complete" action');
    expect(() => space14.fromJson({ set_bus: "1" })).toThrow(AmbiguousAction);
  });

  it("leaves vector sizes to the checker", () => {
    const action = space14.fromJson({ set_bus: [1, 0] });

    const result = action.isAmbiguous();
    expect(result.ambiguous && result.error).toBeInstanceOf(InvalidNumberOfObjectEnds);
  });
});

describe("backend payload", () => {
  it("copies what the solver applies", () => {
    const action = sample14();
    const payload = action.toBackendPayload();

    expect(payload.setLineStatus[4]).toBe(-1);
    expect(payload.setLineStatus[7]).toBe(-1);
    expect(payload.redispatch).toEqual([5, 0, 0, 0, 0, 0]);
    expect(payload.injection.load_p?.[0]).toBe(10);
    expect(payload.shunts).toBeNull();

    payload.redispatch[0] = 0;
    expect(action.redispatch[0]).toBe(5);
  });

  it("refuses an ambiguous action", () => {
    const action = space14.create({ set_line_status: [[3, 1]], change_line_status: [3] });

    expect(() => action.toBackendPayload()).toThrow(InvalidLineStatus);
  });
});
