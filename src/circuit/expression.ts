import { add, fromNumber, mod, mul, neg, ZERO } from "../field/fr";
import { Column, Selector } from "./columns";

export type ExpressionNode =
  | { kind: "constant"; value: bigint }
  | { kind: "selector"; selector: Selector }
  | { kind: "advice"; column: Column; rotation: number }
  | { kind: "instance"; column: Column; rotation: number }
  | { kind: "sum"; left: Expression; right: Expression }
  | { kind: "product"; left: Expression; right: Expression }
  | { kind: "negated"; inner: Expression };

export type ExpressionResolver = {
  selector: (selector: Selector) => bigint;
  advice: (column: Column, rotation: number) => bigint;
  instance: (column: Column, rotation: number) => bigint;
};

type Operand = Expression | bigint | number;

/** Polynomial over cell queries, evaluated one row at a time. */
export class Expression {
  readonly node: ExpressionNode;

  private constructor(node: ExpressionNode) {
    this.node = node;
  }

  static constant = (value: bigint | number) =>
    new Expression({
      kind: "constant",
      value: typeof value === "number" ? fromNumber(value) : mod(value),
    });

  static selector = (selector: Selector) =>
    new Expression({ kind: "selector", selector });

  static advice = (column: Column, rotation: number) =>
    new Expression({ kind: "advice", column, rotation });

  static instance = (column: Column, rotation: number) =>
    new Expression({ kind: "instance", column, rotation });

  static sum = (terms: Expression[]) =>
    terms.reduce((acc, term) => acc.add(term), Expression.constant(0));

  add = (other: Operand): Expression =>
    new Expression({ kind: "sum", left: this, right: toExpression(other) });

  sub = (other: Operand): Expression =>
    new Expression({
      kind: "sum",
      left: this,
      right: toExpression(other).neg(),
    });

  mul = (other: Operand): Expression =>
    new Expression({ kind: "product", left: this, right: toExpression(other) });

  neg = (): Expression => new Expression({ kind: "negated", inner: this });

  /** Products short-circuit on a zero left factor, so put selectors first. */
  evaluate = (resolver: ExpressionResolver): bigint => {
    const node = this.node;
    switch (node.kind) {
      case "constant":
        return node.value;
      case "selector":
        return resolver.selector(node.selector);
      case "advice":
        return resolver.advice(node.column, node.rotation);
      case "instance":
        return resolver.instance(node.column, node.rotation);
      case "sum":
        return add(node.left.evaluate(resolver), node.right.evaluate(resolver));
      case "product": {
        const left = node.left.evaluate(resolver);
        if (left === ZERO) return ZERO;
        return mul(left, node.right.evaluate(resolver));
      }
      case "negated":
        return neg(node.inner.evaluate(resolver));
    }
  };

  degree = (): number => {
    const node = this.node;
    switch (node.kind) {
      case "constant":
        return 0;
      case "selector":
      case "advice":
      case "instance":
        return 1;
      case "sum":
        return Math.max(node.left.degree(), node.right.degree());
      case "product":
        return node.left.degree() + node.right.degree();
      case "negated":
        return node.inner.degree();
    }
  };
}

const toExpression = (value: Operand): Expression =>
  value instanceof Expression ? value : Expression.constant(value);

export const expr = (value: bigint | number): Expression =>
  Expression.constant(value);
