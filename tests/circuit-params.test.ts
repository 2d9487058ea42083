import {
  configureCircuitParams,
  getCircuitParams,
  resetCircuitParams,
} from "../src/config/circuit-params";
import { ShapeError } from "../src/errors";

describe("circuit params", () => {
  afterEach(() => {
    resetCircuitParams();
  });

  test("defaults", () => {
    expect(getCircuitParams()).toEqual({
      maxScriptPubkeySize: 520,
      maxStackDepth: 33,
      maxChecksigCount: 4,
    });
  });

  test("configure patches and reset restores", () => {
    configureCircuitParams({ maxChecksigCount: 2 });
    expect(getCircuitParams()).toEqual({
      maxScriptPubkeySize: 520,
      maxStackDepth: 33,
      maxChecksigCount: 2,
    });

    resetCircuitParams();
    expect(getCircuitParams().maxChecksigCount).toBe(4);
  });

  test("rejects shapes the circuit cannot take", () => {
    expect(() => configureCircuitParams({ maxStackDepth: 1 })).toThrow(
      ShapeError,
    );
    expect(() => configureCircuitParams({ maxStackDepth: 1 })).toThrow(
      "maxStackDepth must be an integer >= 2: 1",
    );
    expect(() => configureCircuitParams({ maxScriptPubkeySize: 1.5 })).toThrow(
      "maxScriptPubkeySize must be an integer >= 1: 1.5",
    );
    expect(() => configureCircuitParams({ maxChecksigCount: 0 })).toThrow(
      "maxChecksigCount must be an integer >= 1: 0",
    );

    expect(getCircuitParams().maxStackDepth).toBe(33);
  });
});
