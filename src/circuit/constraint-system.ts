import { SynthesisError } from "../errors";
import { Column, Selector, TableColumn } from "./columns";
import { Expression } from "./expression";
import type { Layouter } from "./layouter";

export type Gate = {
  name: string;
  polys: Expression[];
};

export type Lookup = {
  name: string;
  inputs: Expression[];
  table: TableColumn[];
};

/** Handed to gate and lookup builders to query cells relative to a row. */
export class VirtualCells {
  queryAdvice = (column: Column, rotation: number) => {
    if (column.kind !== "advice")
      throw new SynthesisError(`${column.toString()} is not an advice column`);
    return Expression.advice(column, rotation);
  };

  queryInstance = (column: Column, rotation: number) => {
    if (column.kind !== "instance")
      throw new SynthesisError(`${column.toString()} is not an instance column`);
    return Expression.instance(column, rotation);
  };

  querySelector = (selector: Selector) => Expression.selector(selector);
}

export class ConstraintSystem {
  readonly adviceColumns: Column[] = [];
  readonly instanceColumns: Column[] = [];
  readonly selectors: Selector[] = [];
  readonly tableColumns: TableColumn[] = [];
  readonly gates: Gate[] = [];
  readonly lookups: Lookup[] = [];

  private equality = new Set<Column>();

  adviceColumn = (name: string) => {
    const column = new Column(this.adviceColumns.length, "advice", name);
    this.adviceColumns.push(column);
    return column;
  };

  instanceColumn = (name: string) => {
    const column = new Column(this.instanceColumns.length, "instance", name);
    this.instanceColumns.push(column);
    return column;
  };

  selector = (name: string) => {
    const selector = new Selector(this.selectors.length, name);
    this.selectors.push(selector);
    return selector;
  };

  lookupTableColumn = (name: string) => {
    const column = new TableColumn(this.tableColumns.length, name);
    this.tableColumns.push(column);
    return column;
  };

  enableEquality = (column: Column) => {
    this.equality.add(column);
  };

  isEqualityEnabled = (column: Column) => this.equality.has(column);

  createGate = (name: string, build: (meta: VirtualCells) => Expression[]) => {
    const polys = build(new VirtualCells());
    if (polys.length === 0)
      throw new SynthesisError(`Gate "${name}" has no constraints`);

    this.gates.push({ name, polys });
  };

  lookup = (
    name: string,
    build: (meta: VirtualCells) => [Expression, TableColumn][],
  ) => {
    const pairs = build(new VirtualCells());
    this.lookups.push({
      name,
      inputs: pairs.map(([input]) => input),
      table: pairs.map(([, column]) => column),
    });
  };

  maxDegree = () =>
    this.gates.reduce(
      (max, gate) =>
        gate.polys.reduce((m, poly) => Math.max(m, poly.degree()), max),
      0,
    );
}

export interface Circuit<Config> {
  configure(cs: ConstraintSystem): Config;
  synthesize(config: Config, layouter: Layouter): void;
}
