export * from "./topo/domain/errors";
export * from "./topo/domain/types";
export { GridSchema } from "./topo/schema/gridSchema";
export type { GridCapabilities, NameKind, ConnectedObjects, TopoIndexOwner, ReadonlyColumns } from "./topo/schema/gridSchema";
export type { GridDocument, ResolvedGridDocument } from "./topo/schema/gridDocument";
export { ActionState } from "./topo/action/actionState";
export type { ActionVectors } from "./topo/action/actionState";
export { input } from "./topo/action/accessorInput";
export type { IntInput, FloatInput, ToggleInput, SubstationInput } from "./topo/action/accessorInput";
export type { IntAccessor, ToggleAccessor, FloatAccessor } from "./topo/action/accessors";
export { actionProfile } from "./topo/action/profile";
export type { ActionProfile, ProfileName } from "./topo/action/profile";
export { checkAmbiguity, assertNotAmbiguous } from "./topo/action/ambiguity";
export { combineActions, combineAll } from "./topo/action/compose";
export { computeImpact } from "./topo/action/impact";
export type { UpdateDict, UpdateOptions } from "./topo/action/update";
export type { EffectSelector, ElementEffect } from "./topo/action/effect";
export { ActionSpace } from "./topo/service/actionSpace";
export { inspectAction } from "./topo/service/inspectAction";
export type { Inspection } from "./topo/service/inspectAction";
export { allowAllGate } from "./topo/ports/legalityPort";
export type { LegalityGate, LegalityDecision } from "./topo/ports/legalityPort";
