import { SynthesisError } from "../errors";
import { ZERO } from "../field/fr";
import { createLogger } from "../logger";
import { Cell, Column, describeCell } from "./columns";
import { Circuit, ConstraintSystem } from "./constraint-system";
import { ExpressionResolver } from "./expression";
import { Assignment, Layouter } from "./layouter";

const log = createLogger("prover");

export type VerifyFailure =
  | { kind: "constraint"; gate: string; index: number; row: number }
  | { kind: "lookup"; lookup: string; row: number; values: bigint[] }
  | { kind: "permutation"; left: Cell; right: Cell }
  | { kind: "instance"; cell: Cell; column: Column; row: number };

export const describeFailure = (failure: VerifyFailure): string => {
  switch (failure.kind) {
    case "constraint":
      return `gate "${failure.gate}" constraint ${failure.index} is not satisfied at row ${failure.row}`;
    case "lookup":
      return `lookup "${failure.lookup}" input (${failure.values.join(", ")}) at row ${failure.row} is not in the table`;
    case "permutation":
      return `copy constraint ${describeCell(failure.left)} = ${describeCell(failure.right)} does not hold`;
    case "instance":
      return `${describeCell(failure.cell)} does not match ${failure.column.toString()} row ${failure.row}`;
  }
};

/** Checks a synthesized witness against every gate, lookup and copy. */
export class MockProver {
  readonly cs: ConstraintSystem;
  readonly assignment: Assignment;
  readonly instances: bigint[][];

  private constructor(
    cs: ConstraintSystem,
    assignment: Assignment,
    instances: bigint[][],
  ) {
    this.cs = cs;
    this.assignment = assignment;
    this.instances = instances;
  }

  static run = <Config>(
    circuit: Circuit<Config>,
    instances: bigint[][],
  ): MockProver => {
    const cs = new ConstraintSystem();
    const config = circuit.configure(cs);

    if (instances.length !== cs.instanceColumns.length)
      throw new SynthesisError(
        `Expected ${cs.instanceColumns.length} instance columns, got ${instances.length}`,
      );

    const layouter = new Layouter(cs);
    circuit.synthesize(config, layouter);

    log(
      "synthesized %d rows in %d regions, %d gates, %d lookups",
      layouter.assignment.rows,
      layouter.assignment.regions.length,
      cs.gates.length,
      cs.lookups.length,
    );

    return new MockProver(cs, layouter.assignment, instances);
  };

  private resolverAt = (row: number): ExpressionResolver => {
    const rows = this.assignment.rows;
    const inRange = (at: number) => at >= 0 && at < rows;

    return {
      selector: (selector) =>
        this.assignment.isSelectorEnabled(selector, row) ? BigInt(1) : ZERO,
      advice: (column, rotation) =>
        inRange(row + rotation)
          ? this.assignment.getAdvice(column, row + rotation)
          : ZERO,
      instance: (column, rotation) =>
        this.instanceValue(column, row + rotation),
    };
  };

  private instanceValue = (column: Column, row: number) =>
    this.instances[column.index]?.[row] ?? ZERO;

  private cellValue = (cell: Cell) =>
    cell.column.kind === "instance"
      ? this.instanceValue(cell.column, cell.row)
      : this.assignment.getAdvice(cell.column, cell.row);

  private verifyGates = (failures: VerifyFailure[]) => {
    for (let row = 0; row < this.assignment.rows; row++) {
      const resolver = this.resolverAt(row);

      for (const gate of this.cs.gates) {
        gate.polys.forEach((poly, index) => {
          if (poly.evaluate(resolver) !== ZERO)
            failures.push({ kind: "constraint", gate: gate.name, index, row });
        });
      }
    }
  };

  private verifyLookups = (failures: VerifyFailure[]) => {
    for (const lookup of this.cs.lookups) {
      const columns = lookup.table.map(
        (column) => this.assignment.tables.get(column) ?? [],
      );
      const height = Math.max(0, ...columns.map((values) => values.length));

      const rows = new Set<string>();
      for (let i = 0; i < height; i++) {
        rows.add(columns.map((values) => (values[i] ?? ZERO).toString()).join(","));
      }

      for (let row = 0; row < this.assignment.rows; row++) {
        const resolver = this.resolverAt(row);
        const values = lookup.inputs.map((input) => input.evaluate(resolver));

        if (!rows.has(values.map((value) => value.toString()).join(",")))
          failures.push({ kind: "lookup", lookup: lookup.name, row, values });
      }
    }
  };

  private verifyCopies = (failures: VerifyFailure[]) => {
    for (const [left, right] of this.assignment.copies) {
      if (this.cellValue(left) !== this.cellValue(right))
        failures.push({ kind: "permutation", left, right });
    }

    for (const binding of this.assignment.instanceBindings) {
      if (
        this.cellValue(binding.cell) !==
        this.instanceValue(binding.column, binding.row)
      )
        failures.push({ kind: "instance", ...binding });
    }
  };

  verify = (): VerifyFailure[] => {
    const failures: VerifyFailure[] = [];

    this.verifyGates(failures);
    this.verifyLookups(failures);
    this.verifyCopies(failures);

    log("verification finished with %d failures", failures.length);

    return failures;
  };

  assertSatisfied = () => {
    const failures = this.verify();
    if (failures.length > 0)
      throw new SynthesisError(
        `Constraint system is not satisfied:\n${failures
          .map(describeFailure)
          .join("\n")}`,
      );
  };
}
