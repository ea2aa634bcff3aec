import type { ActionKey, VectorAttr } from "../domain/types";
import { ACTION_KEYS, SHUNT_ATTRS, VECTOR_ATTR_ORDER } from "../domain/types";
import type { GridSchema } from "../schema/gridSchema";

export type ProfileName =
  | "complete"
  | "playable"
  | "topologyOnly"
  | "topologySet"
  | "lineStatusSet"
  | "dispatchOnly"
  | "storageOnly"
  | "doNothing";

/** What an action of a given kind may carry. Immutable once built. */
export interface ActionProfile {
  readonly name: ProfileName;
  readonly keys: ReadonlySet<ActionKey>;
  /** Flat-vector attributes, in encoding order. */
  readonly attrs: readonly VectorAttr[];
}

const PRESET_KEYS: Record<ProfileName, readonly ActionKey[]> = {
  complete: ACTION_KEYS,
  playable: [
    "set_bus",
    "change_bus",
    "set_line_status",
    "change_line_status",
    "redispatch",
    "set_storage",
    "shunt",
  ],
  topologyOnly: ["set_bus", "change_bus", "set_line_status", "change_line_status"],
  topologySet: ["set_bus", "set_line_status"],
  lineStatusSet: ["set_line_status"],
  dispatchOnly: ["redispatch"],
  storageOnly: ["set_storage"],
  doNothing: [],
};

const ATTRS_OF_KEY: Record<ActionKey, readonly VectorAttr[]> = {
  injection: ["prod_p", "prod_v", "load_p", "load_q"],
  set_bus: ["set_bus"],
  change_bus: ["change_bus"],
  set_line_status: ["set_line_status"],
  change_line_status: ["change_line_status"],
  redispatch: ["redispatch"],
  set_storage: ["storage_power"],
  hazards: ["hazards"],
  maintenance: ["maintenance"],
  shunt: SHUNT_ATTRS,
};

export function actionProfile(schema: GridSchema, name: ProfileName = "complete"): ActionProfile {
  const keys = PRESET_KEYS[name].filter((k) => k !== "shunt" || schema.capabilities.shunts);
  const carried = new Set(keys.flatMap((k) => ATTRS_OF_KEY[k]));
  return Object.freeze({
    name,
    keys: new Set(keys),
    attrs: VECTOR_ATTR_ORDER.filter((a) => carried.has(a)),
  });
}

export function supportsAttr(profile: ActionProfile, attr: VectorAttr): boolean {
  return profile.attrs.includes(attr);
}
