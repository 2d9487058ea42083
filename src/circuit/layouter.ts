import { mod, ZERO } from "../field/fr";
import { SynthesisError } from "../errors";
import { Cell, Column, describeCell, Selector, TableColumn } from "./columns";
import { ConstraintSystem } from "./constraint-system";

export class AssignedCell {
  readonly cell: Cell;
  readonly value: bigint;

  constructor(cell: Cell, value: bigint) {
    this.cell = cell;
    this.value = value;
  }
}

export type InstanceBinding = {
  cell: Cell;
  column: Column;
  row: number;
};

export type RegionShape = {
  name: string;
  start: number;
  height: number;
};

/** Every value, selector, table row and copy constraint of one synthesis. */
export class Assignment {
  readonly advice = new Map<Column, Map<number, bigint>>();
  readonly selectors = new Map<Selector, Set<number>>();
  readonly tables = new Map<TableColumn, bigint[]>();
  readonly copies: [Cell, Cell][] = [];
  readonly instanceBindings: InstanceBinding[] = [];
  readonly regions: RegionShape[] = [];

  rows = 0;

  setAdvice = (column: Column, row: number, value: bigint) => {
    let values = this.advice.get(column);
    if (!values) {
      values = new Map<number, bigint>();
      this.advice.set(column, values);
    }
    values.set(row, mod(value));
  };

  getAdvice = (column: Column, row: number): bigint =>
    this.advice.get(column)?.get(row) ?? ZERO;

  enableSelector = (selector: Selector, row: number) => {
    let rows = this.selectors.get(selector);
    if (!rows) {
      rows = new Set<number>();
      this.selectors.set(selector, rows);
    }
    rows.add(row);
  };

  isSelectorEnabled = (selector: Selector, row: number) =>
    this.selectors.get(selector)?.has(row) ?? false;
}

/** A block of rows; offsets are relative to the region's first row. */
export class Region {
  readonly name: string;
  readonly start: number;

  private readonly cs: ConstraintSystem;
  private readonly assignment: Assignment;
  private heightValue = 0;

  constructor(
    name: string,
    start: number,
    cs: ConstraintSystem,
    assignment: Assignment,
  ) {
    this.name = name;
    this.start = start;
    this.cs = cs;
    this.assignment = assignment;
  }

  get height() {
    return this.heightValue;
  }

  private touch = (offset: number) => {
    if (!Number.isInteger(offset) || offset < 0)
      throw new SynthesisError(`Invalid offset ${offset} in region ${this.name}`);
    this.heightValue = Math.max(this.heightValue, offset + 1);
    return this.start + offset;
  };

  assignAdvice = (
    _annotation: string,
    column: Column,
    offset: number,
    value: bigint,
  ): AssignedCell => {
    if (column.kind !== "advice")
      throw new SynthesisError(`${column.toString()} is not an advice column`);

    const row = this.touch(offset);
    this.assignment.setAdvice(column, row, value);

    return new AssignedCell({ column, row }, mod(value));
  };

  /** Assign `cell`'s value at `offset` and tie the two cells together. */
  copyAdvice = (
    annotation: string,
    cell: AssignedCell,
    column: Column,
    offset: number,
  ): AssignedCell => {
    const copied = this.assignAdvice(annotation, column, offset, cell.value);
    this.constrainEqual(cell.cell, copied.cell);
    return copied;
  };

  enableSelector = (selector: Selector, offset: number) => {
    this.assignment.enableSelector(selector, this.touch(offset));
  };

  constrainEqual = (left: Cell, right: Cell) => {
    for (const cell of [left, right]) {
      if (!this.cs.isEqualityEnabled(cell.column))
        throw new SynthesisError(
          `Equality is not enabled on ${describeCell(cell)}`,
        );
    }
    this.assignment.copies.push([left, right]);
  };
}

/** Moving cursor over a region, for gadgets that fill rows one by one. */
export class RegionCtx {
  readonly region: Region;
  offset: number;

  constructor(region: Region, offset = 0) {
    this.region = region;
    this.offset = offset;
  }

  next = () => {
    this.offset += 1;
  };
}

export class TableAssigner {
  readonly touched = new Set<TableColumn>();
  private readonly assignment: Assignment;

  constructor(assignment: Assignment) {
    this.assignment = assignment;
  }

  assignCell = (
    _annotation: string,
    column: TableColumn,
    offset: number,
    value: bigint,
  ) => {
    let values = this.assignment.tables.get(column);
    if (!values) {
      values = [];
      this.assignment.tables.set(column, values);
    }
    values[offset] = mod(value);
    this.touched.add(column);
  };
}

/** Stacks regions one after another, in the order they are assigned. */
export class Layouter {
  readonly assignment: Assignment;
  private readonly cs: ConstraintSystem;

  constructor(cs: ConstraintSystem, assignment = new Assignment()) {
    this.cs = cs;
    this.assignment = assignment;
  }

  assignRegion = <T>(name: string, build: (region: Region) => T): T => {
    const region = new Region(name, this.assignment.rows, this.cs, this.assignment);
    const result = build(region);

    this.assignment.regions.push({
      name,
      start: region.start,
      height: region.height,
    });
    this.assignment.rows += region.height;

    return result;
  };

  assignTable = (name: string, build: (table: TableAssigner) => void) => {
    const table = new TableAssigner(this.assignment);
    build(table);

    let length: number | undefined;
    for (const column of table.touched) {
      const values = this.assignment.tables.get(column) ?? [];
      for (let i = 0; i < values.length; i++) {
        if (!(i in values))
          throw new SynthesisError(`Table "${name}" has a gap at row ${i}`);
      }
      if (length !== undefined && length !== values.length)
        throw new SynthesisError(`Table "${name}" has columns of unequal length`);
      length = values.length;
    }
  };

  constrainEqual = (left: AssignedCell, right: AssignedCell) => {
    for (const cell of [left.cell, right.cell]) {
      if (!this.cs.isEqualityEnabled(cell.column))
        throw new SynthesisError(
          `Equality is not enabled on ${describeCell(cell)}`,
        );
    }
    this.assignment.copies.push([left.cell, right.cell]);
  };

  constrainInstance = (cell: AssignedCell, column: Column, row: number) => {
    if (column.kind !== "instance")
      throw new SynthesisError(`${column.toString()} is not an instance column`);
    if (!this.cs.isEqualityEnabled(cell.cell.column) || !this.cs.isEqualityEnabled(column))
      throw new SynthesisError(
        `Equality is not enabled on ${describeCell(cell.cell)}`,
      );

    this.assignment.instanceBindings.push({ cell: cell.cell, column, row });
  };
}
