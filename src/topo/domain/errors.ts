export class TopoError extends Error {
  constructor(message: string, public code: string = "TOPO_ERROR") {
    super(message);
    this.name = new.target.name;
  }
}

// ---- malformed input to an accessor or to update() ----

export class IllegalAction extends TopoError {
  constructor(message: string) {
    super(message, "ILLEGAL_ACTION");
  }
}

export class UnknownElementName extends IllegalAction {}

export class OutOfRange extends IllegalAction {}

// ---- well-formed action that is self-contradictory or violates grid data ----

export class AmbiguousAction extends TopoError {
  constructor(message: string) {
    super(message, "AMBIGUOUS_ACTION");
  }
}

export class InvalidLineStatus extends AmbiguousAction {}
export class InvalidBusStatus extends AmbiguousAction {}
export class InvalidRedispatching extends AmbiguousAction {}
export class UnitCommitmentOrRedispatchingNotAvailable extends InvalidRedispatching {}
export class InvalidStorage extends AmbiguousAction {}
export class InvalidNumberOfLoads extends AmbiguousAction {}
export class InvalidNumberOfGenerators extends AmbiguousAction {}
export class InvalidNumberOfLines extends AmbiguousAction {}
export class InvalidNumberOfObjectEnds extends AmbiguousAction {}
export class InvalidShuntData extends AmbiguousAction {}

// ---- inconsistent grid description or vector of the wrong shape ----

export class GridSchemaError extends TopoError {
  constructor(message: string) {
    super(message, "GRID_SCHEMA_ERROR");
  }
}

export class IncorrectNumberOfElements extends GridSchemaError {}
export class IncorrectNumberOfLoads extends GridSchemaError {}
export class IncorrectNumberOfGenerators extends GridSchemaError {}
export class IncorrectNumberOfLines extends GridSchemaError {}
export class IncorrectNumberOfStorages extends GridSchemaError {}
export class IncorrectNumberOfSubstation extends GridSchemaError {}
export class IncorrectPositionOfElements extends GridSchemaError {}
export class InvalidGridData extends GridSchemaError {}
