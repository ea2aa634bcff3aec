import type { ElementRef, VectorAttr } from "../domain/types";
import { GridSchema } from "../schema/gridSchema";
import { ActionState } from "../action/actionState";
import type { ActionProfile, ProfileName } from "../action/profile";
import { actionProfile } from "../action/profile";
import type { UpdateDict } from "../action/update";
import { attrLength, decodeAction, fromJson, vectorSize } from "../action/codec";
import { combineActions } from "../action/compose";

export interface ActionSpaceOptions {
  /** Raise on unknown keys in action descriptions (defaults to env ACTION_STRICT_UPDATE). */
  strictUpdate?: boolean;
}

/** Factory for the actions of one profile on one grid. */
export class ActionSpace {
  readonly profile: ActionProfile;

  constructor(
    readonly schema: GridSchema,
    profileName: ProfileName = "complete",
    private readonly options: ActionSpaceOptions = {}
  ) {
    this.profile = actionProfile(schema, profileName);
  }

  static fromGridDocument(raw: unknown, profileName: ProfileName = "complete", options?: ActionSpaceOptions): ActionSpace {
    return new ActionSpace(GridSchema.fromDocument(raw), profileName, options);
  }

  get attrList(): readonly VectorAttr[] {
    return this.profile.attrs;
  }

  doNothing(): ActionState {
    return new ActionState(this.schema, this.profile);
  }

  create(dict?: UpdateDict): ActionState {
    const action = this.doNothing();
    if (dict) action.update(dict, { strict: this.options.strictUpdate });
    return action;
  }

  fromVect(vect: readonly number[], checkLegit = true): ActionState {
    return decodeAction(this.doNothing(), vect, checkLegit);
  }

  fromJson(raw: unknown): ActionState {
    return fromJson(this.doNothing(), raw);
  }

  size(): number {
    return vectorSize(this.schema, this.profile);
  }

  shape(): number[] {
    return this.profile.attrs.map((attr) => attrLength(this.schema, attr));
  }

  disconnectPowerline(line: ElementRef): ActionState {
    return this.create({ set_line_status: [[line, -1]] });
  }

  reconnectPowerline(line: ElementRef, busOr = 1, busEx = 1): ActionState {
    return this.create({
      set_line_status: [[line, 1]],
      set_bus: { lines_or_id: [[line, busOr]], lines_ex_id: [[line, busEx]] },
    });
  }

  /** `a` then `b`; see combineActions for the (non-commutative) rules. */
  combine(a: ActionState, b: ActionState): ActionState {
    return combineActions(a, b);
  }
}
