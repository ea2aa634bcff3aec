import type { ElementKind } from "../domain/types";
import { ELEMENT_KINDS } from "../domain/types";
import {
  IncorrectNumberOfGenerators,
  IncorrectNumberOfLines,
  IncorrectNumberOfLoads,
  IncorrectNumberOfStorages,
  IncorrectNumberOfSubstation,
  InvalidGridData,
  OutOfRange,
  TopoError,
  UnknownElementName,
} from "../domain/errors";
import { componentLogger } from "../../logger";
import type { ResolvedGridDocument } from "./gridDocument";
import { DispatchDocument, StorageDocument, parseGridDocument } from "./gridDocument";
import type { PerKind } from "./gridSchemaValidation";
import {
  checkDispatchData,
  checkNames,
  checkShuntData,
  checkStorageData,
  checkSubstationIds,
  checkTopologyBijection,
  deriveSubInfo,
  resolveSubPositions,
} from "./gridSchemaValidation";

const log = componentLogger("grid-schema");

/** Per-element data columns, frozen along with the schema. */
export type ReadonlyColumns<T> = { readonly [K in keyof T]: Readonly<T[K]> };

function freezeColumns<T extends object>(block: T): T {
  for (const column of Object.values(block)) Object.freeze(column);
  Object.freeze(block);
  return block;
}

export type NameKind = "load" | "generator" | "line" | "substation" | "storage" | "shunt";

const NAME_KINDS: readonly NameKind[] = ["load", "generator", "line", "substation", "storage", "shunt"];

export function nameKindOf(kind: ElementKind): NameKind {
  return kind === "line_or" || kind === "line_ex" ? "line" : kind;
}

/** Features of the grid, fixed once the schema is built. */
export interface GridCapabilities {
  readonly redispatching: boolean;
  readonly storage: boolean;
  readonly shunts: boolean;
}

export interface ResolvedElement {
  substationId: number;
  topoIndex: number;
}

export interface TopoIndexOwner {
  kind: ElementKind;
  id: number;
  substation: number;
}

export interface ConnectedObjects {
  loadsId: number[];
  generatorsId: number[];
  linesOrId: number[];
  linesExId: number[];
  storagesId: number[];
  nbElements: number;
}

export class GridSchema {
  readonly nLoad: number;
  readonly nGen: number;
  readonly nLine: number;
  readonly nSub: number;
  readonly nStorage: number;
  readonly nShunt: number;
  readonly dimTopo: number;

  readonly subInfo: readonly number[];
  /** First topology index of each substation. */
  readonly subStart: readonly number[];
  readonly toSubid: Readonly<PerKind<readonly number[]>>;
  readonly toSubPos: Readonly<PerKind<readonly number[]>>;
  readonly posTopoVect: Readonly<PerKind<readonly number[]>>;
  readonly topoToSubstation: readonly number[];
  /**
   * One row per topology index: substation, load, generator, line origin,
   * line extremity, storage (-1 where the element is of another kind).
   */
  readonly gridObjectsTypes: readonly (readonly number[])[];

  readonly names: Readonly<Record<NameKind, readonly string[]>>;
  readonly shuntToSubid: readonly number[];
  readonly dispatch: ReadonlyColumns<DispatchDocument> | null;
  readonly storageData: ReadonlyColumns<StorageDocument> | null;
  readonly capabilities: GridCapabilities;

  private readonly nameIndex: Record<NameKind, Map<string, number>>;
  private fingerprint: string | null = null;

  static fromDocument(raw: unknown): GridSchema {
    return new GridSchema(raw);
  }

  private constructor(raw: unknown) {
    const doc = parseGridDocument(raw);

    const toSubid: PerKind<number[]> = {
      load: doc.load_to_subid,
      generator: doc.gen_to_subid,
      line_or: doc.line_or_to_subid,
      line_ex: doc.line_ex_to_subid,
      storage: doc.storage_to_subid ?? [],
    };
    this.nSub = doc.n_sub;
    this.nLoad = toSubid.load.length;
    this.nGen = toSubid.generator.length;
    this.nLine = toSubid.line_or.length;
    this.nStorage = toSubid.storage.length;
    this.nShunt = doc.shunt?.shunt_to_subid.length ?? 0;

    checkSubstationIds(toSubid, this.nSub);
    const subInfo = deriveSubInfo(toSubid, this.nSub, doc.sub_info);
    this.dimTopo = subInfo.reduce((acc, n) => acc + n, 0);

    const subStart: number[] = [];
    let acc = 0;
    for (const n of subInfo) {
      subStart.push(acc);
      acc += n;
    }

    const toSubPos = resolveSubPositions(
      toSubid,
      {
        load: doc.load_to_sub_pos,
        generator: doc.gen_to_sub_pos,
        line_or: doc.line_or_to_sub_pos,
        line_ex: doc.line_ex_to_sub_pos,
        storage: doc.storage_to_sub_pos,
      },
      subInfo
    );

    const posTopoVect: PerKind<number[]> = {
      load: [],
      generator: [],
      line_or: [],
      line_ex: [],
      storage: [],
    };
    for (const kind of ELEMENT_KINDS) {
      posTopoVect[kind] = toSubid[kind].map((sub, id) => subStart[sub] + toSubPos[kind][id]);
    }
    checkTopologyBijection(posTopoVect, this.dimTopo);

    const topoToSubstation = new Array<number>(this.dimTopo).fill(-1);
    const objectsTypes: number[][] = [];
    for (let i = 0; i < this.dimTopo; i += 1) objectsTypes.push([-1, -1, -1, -1, -1, -1]);
    ELEMENT_KINDS.forEach((kind, column) => {
      posTopoVect[kind].forEach((pos, id) => {
        topoToSubstation[pos] = toSubid[kind][id];
        objectsTypes[pos][0] = toSubid[kind][id];
        objectsTypes[pos][column + 1] = id;
      });
    });

    const shuntToSubid = doc.shunt?.shunt_to_subid ?? [];
    const names: Record<NameKind, string[]> = {
      load: doc.name_load ?? toSubid.load.map((sub, i) => `load_${i}_${sub}`),
      generator: doc.name_gen ?? toSubid.generator.map((sub, i) => `gen_${i}_${sub}`),
      line: doc.name_line ?? toSubid.line_or.map((or, i) => `${or}_${toSubid.line_ex[i]}_${i}`),
      substation: doc.name_sub ?? subInfo.map((_, i) => `sub_${i}`),
      storage: doc.name_storage ?? toSubid.storage.map((sub, i) => `storage_${i}_${sub}`),
      shunt: doc.shunt?.name_shunt ?? shuntToSubid.map((sub, i) => `shunt_${i}_${sub}`),
    };
    checkNames("load", names.load, this.nLoad, new IncorrectNumberOfLoads(`name_load must have ${this.nLoad} entries`));
    checkNames("generator", names.generator, this.nGen, new IncorrectNumberOfGenerators(`name_gen must have ${this.nGen} entries`));
    checkNames("line", names.line, this.nLine, new IncorrectNumberOfLines(`name_line must have ${this.nLine} entries`));
    checkNames("substation", names.substation, this.nSub, new IncorrectNumberOfSubstation(`name_sub must have ${this.nSub} entries`));
    checkNames("storage", names.storage, this.nStorage, new IncorrectNumberOfStorages(`name_storage must have ${this.nStorage} entries`));
    checkNames("shunt", names.shunt, this.nShunt, new InvalidGridData(`name_shunt must have ${this.nShunt} entries`));

    if (doc.dispatch) checkDispatchData(doc.dispatch, this.nGen);
    if (this.nStorage > 0 && !doc.storage) {
      throw new InvalidGridData(`the grid has ${this.nStorage} storage units but no storage data`);
    }
    if (doc.storage) checkStorageData(doc.storage, this.nStorage);
    if (doc.shunt) checkShuntData(doc.shunt, this.nSub);

    this.subInfo = subInfo;
    this.subStart = subStart;
    this.toSubid = toSubid;
    this.toSubPos = toSubPos;
    this.posTopoVect = posTopoVect;
    this.topoToSubstation = topoToSubstation;
    this.gridObjectsTypes = objectsTypes;
    this.names = names;
    this.shuntToSubid = shuntToSubid;
    this.dispatch = doc.dispatch ? freezeColumns(doc.dispatch) : null;
    this.storageData = doc.storage ? freezeColumns(doc.storage) : null;
    this.capabilities = Object.freeze({
      redispatching: doc.dispatch !== undefined,
      storage: this.nStorage > 0,
      shunts: doc.shunt !== undefined,
    });

    this.nameIndex = {
      load: new Map(),
      generator: new Map(),
      line: new Map(),
      substation: new Map(),
      storage: new Map(),
      shunt: new Map(),
    };
    for (const kind of NAME_KINDS) {
      names[kind].forEach((name, id) => this.nameIndex[kind].set(name, id));
    }

    log.debug(
      {
        nSub: this.nSub,
        nLoad: this.nLoad,
        nGen: this.nGen,
        nLine: this.nLine,
        nStorage: this.nStorage,
        nShunt: this.nShunt,
        dimTopo: this.dimTopo,
      },
      "grid schema built"
    );
  }

  count(kind: ElementKind): number {
    return this.toSubid[kind].length;
  }

  countByName(kind: NameKind): number {
    return this.names[kind].length;
  }

  resolve(kind: ElementKind, id: number): ResolvedElement {
    const n = this.count(kind);
    if (!Number.isInteger(id) || id < 0 || id >= n) {
      throw new OutOfRange(`${kind} id ${id} is out of range [0, ${n})`);
    }
    return { substationId: this.toSubid[kind][id], topoIndex: this.posTopoVect[kind][id] };
  }

  elementsOfSubstation(sub: number): number[][] {
    this.assertSubstation(sub);
    const start = this.subStart[sub];
    return this.gridObjectsTypes.slice(start, start + this.subInfo[sub]).map((row) => [...row]);
  }

  describeTopoIndex(topoIndex: number): TopoIndexOwner {
    if (!Number.isInteger(topoIndex) || topoIndex < 0 || topoIndex >= this.dimTopo) {
      throw new OutOfRange(`topology index ${topoIndex} is out of range [0, ${this.dimTopo})`);
    }
    const row = this.gridObjectsTypes[topoIndex];
    const column = row.findIndex((v, c) => c > 0 && v !== -1);
    return { kind: ELEMENT_KINDS[column - 1], id: row[column], substation: row[0] };
  }

  indexOfName(kind: NameKind, name: string): number {
    const id = this.nameIndex[kind].get(name);
    if (id === undefined) {
      throw new UnknownElementName(`No known ${kind} with name "${name}"`);
    }
    return id;
  }

  objectsConnectedTo(sub: number): ConnectedObjects {
    this.assertSubstation(sub);
    const at = (kind: ElementKind) =>
      this.toSubid[kind].flatMap((s, id) => (s === sub ? [id] : []));
    return {
      loadsId: at("load"),
      generatorsId: at("generator"),
      linesOrId: at("line_or"),
      linesExId: at("line_ex"),
      storagesId: at("storage"),
      nbElements: this.subInfo[sub],
    };
  }

  linesBetween(fromSub: number, toSub: number): number[] {
    const ids = this.toSubid.line_or.flatMap((or, id) =>
      or === fromSub && this.toSubid.line_ex[id] === toSub ? [id] : []
    );
    if (ids.length === 0) {
      throw new TopoError(`no line goes from substation ${fromSub} to substation ${toSub}`);
    }
    return ids;
  }

  loadsAt(sub: number): number[] {
    return this.nonEmpty(this.objectsConnectedTo(sub).loadsId, `no load is connected to substation ${sub}`);
  }

  generatorsAt(sub: number): number[] {
    return this.nonEmpty(this.objectsConnectedTo(sub).generatorsId, `no generator is connected to substation ${sub}`);
  }

  storagesAt(sub: number): number[] {
    return this.nonEmpty(this.objectsConnectedTo(sub).storagesId, `no storage unit is connected to substation ${sub}`);
  }

  sameGrid(other: GridSchema): boolean {
    return this === other || this.getFingerprint() === other.getFingerprint();
  }

  toDocument(): ResolvedGridDocument {
    const doc: ResolvedGridDocument = {
      n_sub: this.nSub,
      sub_info: [...this.subInfo],
      load_to_subid: [...this.toSubid.load],
      gen_to_subid: [...this.toSubid.generator],
      line_or_to_subid: [...this.toSubid.line_or],
      line_ex_to_subid: [...this.toSubid.line_ex],
      storage_to_subid: [...this.toSubid.storage],
      load_to_sub_pos: [...this.toSubPos.load],
      gen_to_sub_pos: [...this.toSubPos.generator],
      line_or_to_sub_pos: [...this.toSubPos.line_or],
      line_ex_to_sub_pos: [...this.toSubPos.line_ex],
      storage_to_sub_pos: [...this.toSubPos.storage],
      name_load: [...this.names.load],
      name_gen: [...this.names.generator],
      name_line: [...this.names.line],
      name_sub: [...this.names.substation],
      name_storage: [...this.names.storage],
    };
    if (this.dispatch) doc.dispatch = DispatchDocument.parse(this.dispatch);
    if (this.storageData) doc.storage = StorageDocument.parse(this.storageData);
    if (this.capabilities.shunts) {
      doc.shunt = { shunt_to_subid: [...this.shuntToSubid], name_shunt: [...this.names.shunt] };
    }
    return doc;
  }

  private getFingerprint(): string {
    if (this.fingerprint === null) {
      this.fingerprint = JSON.stringify(this.toDocument());
    }
    return this.fingerprint;
  }

  private assertSubstation(sub: number): void {
    if (!Number.isInteger(sub) || sub < 0 || sub >= this.nSub) {
      throw new OutOfRange(`substation id ${sub} is out of range [0, ${this.nSub})`);
    }
  }

  private nonEmpty(ids: number[], message: string): number[] {
    if (ids.length === 0) throw new TopoError(message);
    return ids;
  }
}
