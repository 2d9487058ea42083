export type ColumnKind = "advice" | "instance";

export class Column {
  readonly index: number;
  readonly kind: ColumnKind;
  readonly name: string;

  constructor(index: number, kind: ColumnKind, name: string) {
    this.index = index;
    this.kind = kind;
    this.name = name;
  }

  toString = () => `${this.kind}[${this.index}:${this.name}]`;
}

export class Selector {
  readonly index: number;
  readonly name: string;

  constructor(index: number, name: string) {
    this.index = index;
    this.name = name;
  }
}

export class TableColumn {
  readonly index: number;
  readonly name: string;

  constructor(index: number, name: string) {
    this.index = index;
    this.name = name;
  }
}

export const Rotation = {
  prev: -1,
  cur: 0,
  next: 1,
} as const;

export type Cell = {
  column: Column;
  row: number;
};

export const describeCell = (cell: Cell) =>
  `${cell.column.toString()}@${cell.row}`;
