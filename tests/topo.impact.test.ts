import { describe, it, expect } from "vitest";

import { ActionState } from "../src/topo/action/actionState";
import { input } from "../src/topo/action/accessorInput";
import { TopoError } from "../src/topo/domain/errors";
import { grid14, trueIndices } from "./_gridFixtures";

const schema = grid14();

function statusWith(...disconnected: number[]): boolean[] {
  return Array.from({ length: schema.nLine }, (_, line) => !disconnected.includes(line));
}

describe("impact of an action", () => {
  it("reports nothing for the do-nothing action", () => {
    const impact = new ActionState(schema).impact();

    expect(impact.linesImpacted).toHaveLength(20);
    expect(impact.subsImpacted).toHaveLength(14);
    expect(trueIndices(impact.linesImpacted)).toEqual([]);
    expect(trueIndices(impact.subsImpacted)).toEqual([]);
  });

  it("marks a disconnected line and the substations at both of its ends", () => {
    const action = new ActionState(schema).update({ set_line_status: [[1, -1]] });
    const impact = action.impact();

    expect(trueIndices(impact.linesImpacted)).toEqual([1]);
    expect(trueIndices(impact.subsImpacted)).toEqual([0, 2]);
  });

  it("marks the substation of a bus edit", () => {
    const action = new ActionState(schema);
    action.assign("load_set_bus", input.pair(0, 2));

    const impact = action.impact();

    expect(trueIndices(impact.linesImpacted)).toEqual([]);
    expect(trueIndices(impact.subsImpacted)).toEqual([1]);
  });

  it("marks both ends of a switched line", () => {
    const action = new ActionState(schema).update({ change_line_status: [19] });

    expect(trueIndices(action.impact().subsImpacted)).toEqual([1, 13]);
  });

  it("counts a disconnection of a line already out", () => {
    const action = new ActionState(schema).update({ set_line_status: [[1, -1]] });
    const impact = action.impact(statusWith(1));

    expect(trueIndices(impact.linesImpacted)).toEqual([1]);
    expect(trueIndices(impact.subsImpacted)).toEqual([0, 2]);
  });

  it("treats setting the bus of a disconnected line end as a reconnection", () => {
    const action = new ActionState(schema);
    action.assign("line_or_set_bus", input.pair(5, 1));

    const known = action.impact(statusWith(5));
    expect(trueIndices(known.linesImpacted)).toEqual([5]);
    expect(trueIndices(known.subsImpacted)).toEqual([]);

    const unknown = action.impact();
    expect(trueIndices(unknown.linesImpacted)).toEqual([]);
    expect(trueIndices(unknown.subsImpacted)).toEqual([3]);
  });

  it("treats disconnecting one end of a connected line as a disconnection", () => {
    const action = new ActionState(schema);
    action.assign("line_ex_set_bus", input.pair(7, -1));

    const known = action.impact(statusWith());
    expect(trueIndices(known.linesImpacted)).toEqual([7]);
    expect(trueIndices(known.subsImpacted)).toEqual([]);
    expect(trueIndices(action.impact().subsImpacted)).toEqual([6]);
  });

  it("folds end bus edits into the reconnection of a disconnected line", () => {
    const action = new ActionState(schema).update({
      set_line_status: [[5, 1]],
      set_bus: { lines_or_id: [[5, 1]], lines_ex_id: [[5, 2]], loads_id: [[0, 2]] },
    });

    const impact = action.impact(statusWith(5));

    expect(trueIndices(impact.linesImpacted)).toEqual([5]);
    expect(trueIndices(impact.subsImpacted)).toEqual([1, 3, 5]);
  });

  it("rejects a line status of the wrong size", () => {
    expect(() => new ActionState(schema).impact([true])).toThrow(TopoError);
  });

  it("returns copies of the cached report", () => {
    const action = new ActionState(schema).update({ set_line_status: [[1, -1]] });
    action.impact().linesImpacted[1] = false;

    expect(action.impact().linesImpacted[1]).toBe(true);
  });
});
