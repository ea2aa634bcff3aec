import type {
  ActionKey,
  AmbiguityResult,
  ImpactReport,
  InjectionKey,
  InjectionView,
  ModifiedFlags,
  ShuntModification,
  ShuntView,
} from "../domain/types";
import { INJECTION_KEYS, emptyFlags } from "../domain/types";
import type { AmbiguousAction } from "../domain/errors";
import { IllegalAction } from "../domain/errors";
import type { GridSchema } from "../schema/gridSchema";
import type { ActionProfile } from "./profile";
import { actionProfile } from "./profile";
import type { FloatInput, IntInput, SubstationInput, ToggleInput } from "./accessorInput";
import type {
  BooleanVectorField,
  FloatAccessor,
  IntAccessor,
  NumberVectorField,
  Target,
  ToggleAccessor,
} from "./accessors";
import {
  BUS_BOUNDS,
  FLOAT_ACCESSORS,
  INT_ACCESSORS,
  TOGGLE_ACCESSORS,
  addressing,
  decodeFloatInput,
  decodeIntInput,
  decodeSubstationChange,
  decodeSubstationSet,
  decodeToggleInput,
} from "./accessors";
import { assertNotAmbiguous, checkAmbiguity } from "./ambiguity";
import { computeImpact } from "./impact";
import { encodeAction, toBackendPayload, toJson } from "./codec";
import type { ActionJson, BackendPayload } from "./codec";
import type { UpdateDict, UpdateOptions } from "./update";
import { applyUpdate } from "./update";
import type { EffectSelector, ElementEffect } from "./effect";
import { effectOn } from "./effect";
import type { ActionSummary, ActionTypes, GenModif, ImpactOnObjects, LoadModif, StorageModif } from "./describe";
import {
  describeAction,
  genModif,
  getTypes,
  impactOnObjects,
  loadModif,
  storageModif,
  summarize,
} from "./describe";

const FLAG_OF: Record<NumberVectorField | BooleanVectorField, keyof ModifiedFlags> = {
  setTopoVect: "setBus",
  changeBusVect: "changeBus",
  setLineStatus: "setStatus",
  switchLineStatus: "changeStatus",
  redispatch: "redispatch",
  storagePower: "storage",
};

const SHUNT_TARGET: Target = { via: "id", nameKind: "shunt" };

function isIntAccessor(name: string): name is IntAccessor {
  return Object.prototype.hasOwnProperty.call(INT_ACCESSORS, name);
}

function nanVector(n: number): number[] {
  return new Array<number>(n).fill(Number.NaN);
}

/** Every vector an action carries. Replaced on each edit, never written in place. */
export interface ActionVectors {
  readonly setTopoVect: readonly number[];
  readonly changeBusVect: readonly boolean[];
  readonly setLineStatus: readonly number[];
  readonly switchLineStatus: readonly boolean[];
  readonly injection: InjectionView;
  readonly redispatch: readonly number[];
  readonly storagePower: readonly number[];
  readonly hazards: readonly boolean[];
  readonly maintenance: readonly boolean[];
  readonly shunt: ShuntView | null;
}

function blankVectors(schema: GridSchema): ActionVectors {
  return {
    setTopoVect: new Array<number>(schema.dimTopo).fill(0),
    changeBusVect: new Array<boolean>(schema.dimTopo).fill(false),
    setLineStatus: new Array<number>(schema.nLine).fill(0),
    switchLineStatus: new Array<boolean>(schema.nLine).fill(false),
    injection: {},
    redispatch: new Array<number>(schema.nGen).fill(0),
    storagePower: new Array<number>(schema.nStorage).fill(0),
    hazards: new Array<boolean>(schema.nLine).fill(false),
    maintenance: new Array<boolean>(schema.nLine).fill(false),
    shunt: schema.capabilities.shunts
      ? { p: nanVector(schema.nShunt), q: nanVector(schema.nShunt), bus: new Array<number>(schema.nShunt).fill(0) }
      : null,
  };
}

/**
 * Pending modifications of one decision step, indexed by the schema's
 * topology vector. Starts as "do nothing".
 *
 * The vectors are read-only views for the checker, the composition
 * operator and the codec. Callers edit them through the accessor methods,
 * which validate first and only then write; every write goes through
 * `write`, which drops the cached impact and encoding.
 */
export class ActionState {
  private vectors: ActionVectors;
  private flags: ModifiedFlags = emptyFlags();
  private impactCache: ImpactReport | null = null;
  private vectorCache: number[] | null = null;

  constructor(
    readonly schema: GridSchema,
    readonly profile: ActionProfile = actionProfile(schema)
  ) {
    this.vectors = blankVectors(schema);
  }

  get setTopoVect(): readonly number[] {
    return this.vectors.setTopoVect;
  }

  get changeBusVect(): readonly boolean[] {
    return this.vectors.changeBusVect;
  }

  get setLineStatus(): readonly number[] {
    return this.vectors.setLineStatus;
  }

  get switchLineStatus(): readonly boolean[] {
    return this.vectors.switchLineStatus;
  }

  get injection(): InjectionView {
    return this.vectors.injection;
  }

  get redispatch(): readonly number[] {
    return this.vectors.redispatch;
  }

  get storagePower(): readonly number[] {
    return this.vectors.storagePower;
  }

  get hazards(): readonly boolean[] {
    return this.vectors.hazards;
  }

  get maintenance(): readonly boolean[] {
    return this.vectors.maintenance;
  }

  get shunt(): ShuntView | null {
    return this.vectors.shunt;
  }

  get modified(): Readonly<ModifiedFlags> {
    return this.flags;
  }

  // ---- accessors ----

  assign(name: IntAccessor, value: IntInput): void {
    const accessor = INT_ACCESSORS[name];
    this.authorize(accessor.key, accessor.needsStorage === true);
    const writes = decodeIntInput(
      this.schema,
      addressing(this.schema, accessor.target),
      value,
      accessor.bounds ?? BUS_BOUNDS
    );
    const next = [...this[accessor.field]];
    for (const [i, v] of writes) next[i] = v;
    const patch: Partial<Record<NumberVectorField, readonly number[]>> = {};
    patch[accessor.field] = next;
    this.write(patch, FLAG_OF[accessor.field]);
  }

  toggle(name: ToggleAccessor, value: ToggleInput): void {
    const accessor = TOGGLE_ACCESSORS[name];
    this.authorize(accessor.key, accessor.needsStorage === true);
    const flips = decodeToggleInput(this.schema, addressing(this.schema, accessor.target), value);
    const next = [...this[accessor.field]];
    for (const i of flips) next[i] = !next[i];
    const patch: Partial<Record<BooleanVectorField, readonly boolean[]>> = {};
    patch[accessor.field] = next;
    this.write(patch, FLAG_OF[accessor.field]);
  }

  setAmount(name: FloatAccessor, value: FloatInput): void {
    const accessor = FLOAT_ACCESSORS[name];
    this.authorize(accessor.key, accessor.needsStorage === true);
    const writes = decodeFloatInput(this.schema, addressing(this.schema, accessor.target), value);
    const next = [...this[accessor.field]];
    for (const [i, v] of writes) next[i] = v;
    const patch: Partial<Record<NumberVectorField, readonly number[]>> = {};
    patch[accessor.field] = next;
    this.write(patch, FLAG_OF[accessor.field]);
  }

  subSetBus(value: SubstationInput<number>): void {
    this.authorize("set_bus", false);
    const writes = decodeSubstationSet(this.schema, value);
    const next = [...this.setTopoVect];
    for (const [i, v] of writes) next[i] = v;
    this.write({ setTopoVect: next }, "setBus");
  }

  subChangeBus(value: SubstationInput<boolean>): void {
    this.authorize("change_bus", false);
    const flips = decodeSubstationChange(this.schema, value);
    const next = [...this.changeBusVect];
    for (const i of flips) next[i] = !next[i];
    this.write({ changeBusVect: next }, "changeBus");
  }

  shuntP(value: FloatInput): void {
    this.setShuntAmount("p", value);
  }

  shuntQ(value: FloatInput): void {
    this.setShuntAmount("q", value);
  }

  shuntBus(value: IntInput): void {
    const current = this.authorizeShunt();
    const writes = decodeIntInput(this.schema, addressing(this.schema, SHUNT_TARGET), value, BUS_BOUNDS);
    const bus = [...current.bus];
    for (const [i, v] of writes) bus[i] = v;
    this.write({ shunt: { ...current, bus } }, "shunt");
  }

  read(name: IntAccessor | FloatAccessor): number[] {
    const accessor = isIntAccessor(name) ? INT_ACCESSORS[name] : FLOAT_ACCESSORS[name];
    const addr = addressing(this.schema, accessor.target);
    const vector = this[accessor.field];
    return Array.from({ length: addr.count }, (_, id) => vector[addr.toIndex(id)]);
  }

  readToggle(name: ToggleAccessor): boolean[] {
    const accessor = TOGGLE_ACCESSORS[name];
    const addr = addressing(this.schema, accessor.target);
    const vector = this[accessor.field];
    return Array.from({ length: addr.count }, (_, id) => vector[addr.toIndex(id)]);
  }

  getInjection(key: InjectionKey): number[] | undefined {
    const values = this.injection[key];
    return values ? [...values] : undefined;
  }

  getShunt(): ShuntModification | null {
    return this.shunt ? { p: [...this.shunt.p], q: [...this.shunt.q], bus: [...this.shunt.bus] } : null;
  }

  getLoadModif(): LoadModif {
    return loadModif(this);
  }

  getGenModif(): GenModif {
    return genModif(this);
  }

  getStorageModif(): StorageModif {
    return storageModif(this);
  }

  update(dict: UpdateDict, options?: UpdateOptions): this {
    applyUpdate(this, dict, options);
    return this;
  }

  // ---- validation and analysis ----

  check(): void {
    assertNotAmbiguous(this);
  }

  isAmbiguous(): AmbiguityResult<AmbiguousAction> {
    return checkAmbiguity(this);
  }

  impact(knownLineStatus?: readonly boolean[]): ImpactReport {
    if (knownLineStatus) return computeImpact(this, knownLineStatus);
    if (this.impactCache === null) this.impactCache = computeImpact(this);
    return {
      linesImpacted: [...this.impactCache.linesImpacted],
      subsImpacted: [...this.impactCache.subsImpacted],
    };
  }

  effectOn(selector: EffectSelector): ElementEffect {
    return effectOn(this, selector);
  }

  asDict(): ActionSummary {
    return summarize(this);
  }

  impactOnObjects(): ImpactOnObjects {
    return impactOnObjects(this);
  }

  getTypes(): ActionTypes {
    return getTypes(this);
  }

  describe(): string {
    return describeAction(this);
  }

  toString(): string {
    return this.describe();
  }

  // ---- boundary ----

  toVect(): number[] {
    if (this.vectorCache === null) this.vectorCache = encodeAction(this);
    return [...this.vectorCache];
  }

  toJson(): ActionJson {
    return toJson(this);
  }

  toBackendPayload(): BackendPayload {
    return toBackendPayload(this);
  }

  // ---- lifecycle ----

  copy(): ActionState {
    const clone = new ActionState(this.schema, this.profile);
    clone.replaceWith(this);
    return clone;
  }

  /** Takes over every pending modification of `source` (deep copy). */
  replaceWith(source: ActionState): void {
    const injection: Partial<Record<InjectionKey, readonly number[]>> = {};
    for (const key of INJECTION_KEYS) {
      const values = source.injection[key];
      if (values) injection[key] = [...values];
    }
    this.vectors = {
      setTopoVect: [...source.setTopoVect],
      changeBusVect: [...source.changeBusVect],
      setLineStatus: [...source.setLineStatus],
      switchLineStatus: [...source.switchLineStatus],
      injection,
      redispatch: [...source.redispatch],
      storagePower: [...source.storagePower],
      hazards: [...source.hazards],
      maintenance: [...source.maintenance],
      shunt: source.getShunt(),
    };
    this.replaceFlags(source.modified);
  }

  reset(): void {
    this.replaceWith(new ActionState(this.schema, this.profile));
  }

  equals(other: ActionState): boolean {
    if (!this.schema.sameGrid(other.schema)) return false;
    for (const key of INJECTION_KEYS) {
      const mine = this.injection[key];
      const theirs = other.injection[key];
      if ((mine === undefined) !== (theirs === undefined)) return false;
      if (mine && theirs && !sameValues(mine, theirs)) return false;
    }
    if (this.shunt === null || other.shunt === null) {
      if (this.shunt !== other.shunt) return false;
    } else if (
      !sameValues(this.shunt.p, other.shunt.p) ||
      !sameValues(this.shunt.q, other.shunt.q) ||
      !sameValues(this.shunt.bus, other.shunt.bus)
    ) {
      return false;
    }
    return (
      sameValues(this.setTopoVect, other.setTopoVect) &&
      sameValues(this.changeBusVect, other.changeBusVect) &&
      sameValues(this.setLineStatus, other.setLineStatus) &&
      sameValues(this.switchLineStatus, other.switchLineStatus) &&
      sameValues(this.redispatch, other.redispatch) &&
      sameValues(this.storagePower, other.storagePower) &&
      sameValues(this.hazards, other.hazards) &&
      sameValues(this.maintenance, other.maintenance)
    );
  }

  /** Replaces the vectors named in `patch` and raises `flag`. No validation. */
  write(patch: Partial<ActionVectors>, flag?: keyof ModifiedFlags): void {
    this.vectors = { ...this.vectors, ...patch };
    this.markDirty(flag);
  }

  replaceFlags(flags: Readonly<ModifiedFlags>): void {
    this.flags = { ...flags };
    this.markDirty();
  }

  /** Drops cached impact and encoding; optionally raises a modification flag. */
  markDirty(flag?: keyof ModifiedFlags): void {
    if (flag) this.flags[flag] = true;
    this.impactCache = null;
    this.vectorCache = null;
  }

  private setShuntAmount(attr: "p" | "q", value: FloatInput): void {
    const current = this.authorizeShunt();
    const writes = decodeFloatInput(this.schema, addressing(this.schema, SHUNT_TARGET), value);
    const next = [...current[attr]];
    for (const [i, v] of writes) next[i] = v;
    this.write({ shunt: attr === "p" ? { ...current, p: next } : { ...current, q: next } }, "shunt");
  }

  private authorizeShunt(): ShuntView {
    if (this.shunt === null) throw new IllegalAction("the grid does not declare shunts");
    this.authorize("shunt", false);
    return this.shunt;
  }

  private authorize(key: ActionKey, needsStorage: boolean): void {
    if (!this.profile.keys.has(key)) {
      throw new IllegalAction(`the "${this.profile.name}" action profile does not allow "${key}"`);
    }
    if (needsStorage && this.schema.nStorage === 0) {
      throw new IllegalAction("the grid has no storage unit");
    }
  }
}

function sameValues<T extends number | boolean>(a: readonly T[], b: readonly T[]): boolean {
  return a.length === b.length && a.every((v, i) => Object.is(v, b[i]) || v === b[i]);
}
