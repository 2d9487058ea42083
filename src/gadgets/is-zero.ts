import { Column, Rotation } from "../circuit/columns";
import { ConstraintSystem, VirtualCells } from "../circuit/constraint-system";
import { Expression, expr } from "../circuit/expression";
import { AssignedCell, Region } from "../circuit/layouter";
import { inv0 } from "../field/fr";

export type IsZeroConfig = {
  valueInv: Column;
  /** 1 when the value is zero, 0 otherwise; only sound where the gate is on. */
  expr: () => Expression;
};

/**
 * Proves `value == 0` through a witnessed inverse:
 * `q * value * (1 - value * inv) = 0`, so `1 - value * inv` is the indicator.
 */
export class IsZeroChip {
  readonly config: IsZeroConfig;

  constructor(config: IsZeroConfig) {
    this.config = config;
  }

  static configure = (
    cs: ConstraintSystem,
    name: string,
    qEnable: (meta: VirtualCells) => Expression,
    value: (meta: VirtualCells) => Expression,
    valueInv: Column,
  ): IsZeroConfig => {
    let isZero = expr(0);

    cs.createGate(`is_zero(${name})`, (meta) => {
      const q = qEnable(meta);
      const v = value(meta);
      const inv = meta.queryAdvice(valueInv, Rotation.cur);

      isZero = expr(1).sub(v.mul(inv));

      return [q.mul(v).mul(isZero)];
    });

    const result = isZero;

    return { valueInv, expr: () => result };
  };

  static construct = (config: IsZeroConfig) => new IsZeroChip(config);

  assign = (region: Region, offset: number, value: bigint): AssignedCell =>
    region.assignAdvice(
      "value inv",
      this.config.valueInv,
      offset,
      inv0(value),
    );
}
