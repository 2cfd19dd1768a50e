import { afterEach, describe, expect, it } from "vitest";
import {
  createRng,
  evaluate,
  getDefaultRng,
  MalformedExpressionError,
  parseTree,
  resetDefaultRng,
  safeEvaluate,
  setDefaultRng,
} from "../src/index";
import { errorKind, face, scriptedRng } from "./helpers";

const MAX_PATTERN = /^!\*(\d+)\*!\(d(\d+)\)$/;
const DIE_PATTERN = /^(\d+)\(d(\d+)\)$/;

describe("evaluate", () => {
  afterEach(() => {
    resetDefaultRng();
  });

  describe("Literals", () => {
    it("should return the literal as total and rendering", () => {
      expect(evaluate("7")).toMatchObject({ total: 7, rendered: "7" });
    });

    it("should add and subtract", () => {
      expect(evaluate("3+4")).toMatchObject({ total: 7, rendered: "3 + 4" });
      expect(evaluate("10-3")).toMatchObject({ total: 7, rendered: "10 - 3" });
    });

    it("should read a doubled minus as a negative operand", () => {
      expect(evaluate("5--3")).toMatchObject({ total: 8, rendered: "5 - -3" });
    });
  });

  describe("Dice", () => {
    it.each([1, 2, 6, 20, 100])("should keep d%i rolls in range", (faces) => {
      for (let i = 0; i < 100; i++) {
        const { total, rendered } = evaluate(`1d${faces}`);

        expect(total).toBeGreaterThanOrEqual(1);
        expect(total).toBeLessThanOrEqual(faces);
        expect(rendered).toBe(
          total === faces ? `!*${total}*!(d${faces})` : `${total}(d${faces})`
        );
      }
    });

    it.each([
      [2, 6],
      [3, 4],
      [10, 10],
    ])("should render %id%i as that many single dice", (count, faces) => {
      for (let i = 0; i < 50; i++) {
        const { total, rendered } = evaluate(`${count}d${faces}`);
        const parts = rendered.split(" + ");

        expect(parts).toHaveLength(count);
        let sum = 0;
        for (const part of parts) {
          const match = MAX_PATTERN.exec(part) ?? DIE_PATTERN.exec(part);
          expect(match).not.toBeNull();
          if (!match) continue;
          expect(Number(match[2])).toBe(faces);
          sum += Number(match[1]);
        }
        expect(total).toBe(sum);
        expect(total).toBeGreaterThanOrEqual(count);
        expect(total).toBeLessThanOrEqual(count * faces);
      }
    });

    it("should keep mixed expressions within their bounds", () => {
      for (let i = 0; i < 200; i++) {
        const { total } = evaluate("2d6+3-1d4");
        expect(total).toBeGreaterThanOrEqual(1);
        expect(total).toBeLessThanOrEqual(14);
      }
    });

    it("should produce a known trace for a scripted random source", () => {
      const rng = scriptedRng([0.5, 0.99, 0.25]);

      expect(evaluate("2d6+3-1d4", { rng })).toMatchObject({
        total: 11,
        rendered: "4(d6) + !*6*!(d6) + 3 - 2(d4)",
      });
    });

    it("should subtract a die that follows a doubled minus", () => {
      expect(
        evaluate("5--d6", { rng: scriptedRng([face(4, 6)]) })
      ).toMatchObject({ total: 9, rendered: "5 - -4(d6)" });
      expect(
        evaluate("5 - - 1d6", { rng: scriptedRng([face(2, 6)]) })
      ).toMatchObject({ total: 7, rendered: "5 - -2(d6)" });
    });

    it("should negate each die of a negated multi-die term", () => {
      const rng = scriptedRng([face(4, 6), face(6, 6)]);

      expect(evaluate("5--2d6", { rng })).toMatchObject({
        total: 15,
        rendered: "5 - -4(d6) + -!*6*!(d6)",
      });
    });

    it("should return the rolled tree", () => {
      const result = evaluate("d4+1", { rng: scriptedRng([face(3, 4)]) });

      expect(result.tree.type).toBe("operation");
      expect(result.tree.value).toBe(result.total);
    });
  });

  describe("Random source", () => {
    it("should repeat results for the same seed", () => {
      const first = evaluate("10d20+4d6-2", { seed: "test-seed" });
      const second = evaluate("10d20+4d6-2", { seed: "test-seed" });

      expect(second.rendered).toBe(first.rendered);
      expect(second.total).toBe(first.total);
    });

    it("should match a generator created from the same seed", () => {
      const seeded = evaluate("6d8", { seed: "test-seed" });
      const manual = evaluate("6d8", { rng: createRng("test-seed") });

      expect(manual.rendered).toBe(seeded.rendered);
    });

    it("should prefer an explicit rng over a seed", () => {
      const result = evaluate("d10", {
        rng: scriptedRng([face(7, 10)]),
        seed: "test-seed",
      });
      expect(result.total).toBe(7);
    });

    it("should use the default rng when none is given", () => {
      const rng = scriptedRng([face(2, 12)]);
      setDefaultRng(rng);

      expect(getDefaultRng()).toBe(rng);
      expect(evaluate("d12").rendered).toBe("2(d12)");
      expect(rng.calls()).toBe(1);
    });

    it("should not roll when only literals are involved", () => {
      const rng = scriptedRng([]);
      expect(evaluate("1+2-3", { rng }).total).toBe(0);
      expect(rng.calls()).toBe(0);
    });

    it("should refuse values outside [0, 1) from the rng", () => {
      expect(() => evaluate("d6", { rng: () => 1 })).toThrow(RangeError);
    });
  });

  describe("Malformed input", () => {
    it.each([
      ["+5", "MalformedOperatorPlacement"],
      ["3+", "MalformedOperatorPlacement"],
      ["3++4", "MalformedOperatorPlacement"],
      ["5---3", "MalformedOperatorPlacement"],
      ["d", "MalformedDieTerm"],
      ["2d+1", "MalformedDieTerm"],
      ["3 4", "InvalidLiteral"],
      ["1+two", "InvalidLiteral"],
      ["", "AmbiguousOrMissingOperand"],
    ])("should reject %j with %s", (expression, kind) => {
      expect(errorKind(() => evaluate(expression))).toBe(kind);
    });

    it("should say when the dice limit rather than the syntax is the problem", () => {
      expect(() => evaluate("1001d6")).toThrow(
        "Cannot evaluate dice expression [1001d6]: Rolling 1001 dice in '1001d6' exceeds the configured limit of 1000 dice per term (see setMaxDicePerTerm)"
      );
    });

    it("should reject totals that lose integer precision", () => {
      const result = safeEvaluate("9007199254740991+9007199254740991");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("InvalidLiteral");
    });

    it("should name the whole expression in the error", () => {
      let caught: unknown;
      try {
        evaluate("3+x");
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(MalformedExpressionError);
      if (!(caught instanceof MalformedExpressionError)) return;
      expect(caught.message).toBe(
        "Cannot evaluate dice expression [3+x]: Expected an integer, found 'x'"
      );
      expect(caught.expression).toBe("3+x");
      expect(caught.kind).toBe("InvalidLiteral");
      expect(caught.name).toBe("MalformedExpressionError");
    });
  });
});

describe("safeEvaluate", () => {
  it("should wrap a successful roll", () => {
    const result = safeEvaluate("2+2");

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.total).toBe(4);
  });

  it("should return malformed input as an error value", () => {
    const result = safeEvaluate("d");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("MalformedDieTerm");
    expect(result.error.message).toBe(
      "Cannot evaluate dice expression [d]: Missing face count after 'd' in 'd'"
    );
  });

  it("should let other errors through", () => {
    expect(() => safeEvaluate("d6", { rng: () => Number.NaN })).toThrow(
      RangeError
    );
  });
});

describe("parseTree", () => {
  it("should accept fields that are already split", () => {
    const tree = parseTree(["2d6", "+", "3"], {
      rng: scriptedRng([face(1, 6), face(5, 6)]),
    });
    expect(tree.value).toBe(9);
  });

  it("should accept a string", () => {
    expect(parseTree("8-2").value).toBe(6);
  });

  it("should not add the expression to errors", () => {
    expect(() => parseTree("3+")).toThrow(
      /^'\+' is missing an operand on its right$/
    );
  });
});
