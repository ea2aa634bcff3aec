import { describe, it, expect } from "vitest";

import { ActionSpace } from "../src/topo/service/actionSpace";
import { IllegalAction } from "../src/topo/domain/errors";
import { grid14, readFixture, trueIndices } from "./_gridFixtures";

describe("ActionSpace", () => {
  const space = new ActionSpace(grid14());

  it("builds from a raw grid document", () => {
    const fromDoc = ActionSpace.fromGridDocument(readFixture("grid14.json"), "lineStatusSet");

    expect(fromDoc.schema.sameGrid(space.schema)).toBe(true);
    expect(fromDoc.attrList).toEqual(["set_line_status"]);
    expect(fromDoc.size()).toBe(20);
  });

  it("hands out independent do-nothing actions", () => {
    const a = space.doNothing();
    const b = space.doNothing();
    a.update({ set_line_status: [[0, -1]] });

    expect(b.setLineStatus[0]).toBe(0);
    expect(space.create().equals(b)).toBe(true);
  });

  it("disconnects a line by id or name", () => {
    const byName = space.disconnectPowerline("0_2_1");

    expect(byName.setLineStatus[1]).toBe(-1);
    expect(byName.equals(space.disconnectPowerline(1))).toBe(true);
  });

  it("reconnects a line with its end buses", () => {
    const action = space.reconnectPowerline(3, 2, 1);

    expect(action.setLineStatus[3]).toBe(1);
    expect(action.setTopoVect[10]).toBe(2);
    expect(action.setTopoVect[16]).toBe(1);
    expect(action.isAmbiguous()).toEqual({ ambiguous: false });
  });

  it("combines through the space", () => {
    const combined = space.combine(space.disconnectPowerline(1), space.create({ change_line_status: [1] }));

    expect(combined.setLineStatus[1]).toBe(1);
    expect(trueIndices(combined.switchLineStatus)).toEqual([]);
  });

  it("keeps the profile on every action it builds", () => {
    const topology = new ActionSpace(grid14(), "topologyOnly");

    expect(topology.doNothing().profile.name).toBe("topologyOnly");
    expect(() => topology.create({ redispatch: [[0, 1]] })).toThrow(IllegalAction);
  });

  it("can raise on unknown keys", () => {
    const strict = new ActionSpace(grid14(), "complete", { strictUpdate: true });

    expect(() => strict.create({ oops: 1 })).toThrow('unknown action key "oops"');
    expect(() => space.create({ oops: 1 })).not.toThrow();
  });
});
