import { MalformedExpressionError } from "./errors";
import { rollDie } from "./rng";
import type {
  DieTerm,
  ExpressionNode,
  LeafNode,
  LiteralTerm,
  Operator,
  OperationNode,
  Rng,
  Term,
} from "./types";
import { OPERATOR_SYMBOL } from "./types";

/**
 * Index of the term that becomes the root of `terms[start, end)`.
 *
 * The last `-` wins, then the first `+`. Without an operator the range
 * must hold exactly one operand.
 */
export function findRoot(
  terms: readonly Term[],
  start: number = 0,
  end: number = terms.length
): number {
  let firstAdd = -1;
  let lastSub = -1;

  for (let i = start; i < end; i++) {
    const term = terms[i];
    if (term.type !== "operator") continue;
    if (term.op === "sub") lastSub = i;
    else if (firstAdd < 0) firstAdd = i;
  }

  if (lastSub >= 0) return lastSub;
  if (firstAdd >= 0) return firstAdd;

  const count = end - start;
  if (count === 0) {
    throw new MalformedExpressionError(
      "AmbiguousOrMissingOperand",
      "Expected an operand, found nothing"
    );
  }
  if (count > 1) {
    throw new MalformedExpressionError(
      "AmbiguousOrMissingOperand",
      `Found ${count} operands with no operator between them`
    );
  }
  return start;
}

/**
 * Build (and roll) the tree for `terms[start, end)`. Every die is rolled
 * exactly once, left to right, as its leaf is created.
 */
export function buildTree(
  terms: readonly Term[],
  rng: Rng,
  start: number = 0,
  end: number = terms.length
): ExpressionNode {
  const root = findRoot(terms, start, end);
  const term = terms[root];

  switch (term.type) {
    case "operator": {
      if (root === start || root === end - 1) {
        const side = root === start ? "left" : "right";
        throw new MalformedExpressionError(
          "MalformedOperatorPlacement",
          `'${OPERATOR_SYMBOL[term.op]}' is missing an operand on its ${side}`
        );
      }
      const left = buildTree(terms, rng, start, root);
      const right = buildTree(terms, rng, root + 1, end);
      return operationNode(term.op, left, right);
    }

    case "die": {
      if (term.multiplier > 1) {
        const expanded = expandDice(term);
        return buildTree(expanded, rng, 0, expanded.length);
      }
      return dieLeaf(term, rng);
    }

    case "literal":
      return literalLeaf(term);
  }
}

/** `3d6` -> `1d6 + 1d6 + 1d6`, `-2d6` -> `-1d6 + -1d6` */
export function expandDice(term: DieTerm): Term[] {
  const single: DieTerm = {
    type: "die",
    text: `${term.negative ? "-" : ""}1d${term.faces}`,
    negative: term.negative,
    multiplier: 1,
    faces: term.faces,
  };

  const result: Term[] = [single];
  for (let i = 1; i < term.multiplier; i++) {
    result.push({ type: "operator", op: "add" }, single);
  }
  return result;
}

export function operationNode(
  op: Operator,
  left: ExpressionNode,
  right: ExpressionNode
): OperationNode {
  const value = op === "add" ? left.value + right.value : left.value - right.value;
  if (!Number.isSafeInteger(value)) {
    throw new MalformedExpressionError(
      "InvalidLiteral",
      `Result of ${left.value} ${OPERATOR_SYMBOL[op]} ${right.value} is outside the safe integer range`
    );
  }
  return { type: "operation", op, left, right, value };
}

function dieLeaf(term: DieTerm, rng: Rng): LeafNode {
  const roll = rollDie(term.faces, rng);
  return {
    type: "leaf",
    term: term.text,
    isDie: true,
    faces: term.faces,
    value: term.negative ? -roll : roll,
  };
}

function literalLeaf(term: LiteralTerm): LeafNode {
  return {
    type: "leaf",
    term: term.text,
    isDie: false,
    faces: undefined,
    value: term.value,
  };
}
