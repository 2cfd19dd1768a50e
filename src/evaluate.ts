import { isMalformedExpressionError, MalformedExpressionError } from "./errors";
import { classifyFields, splitFields } from "./fields";
import { toDisplayString } from "./render";
import { resolveRng } from "./rng";
import { buildTree } from "./tree";
import type { EvaluateOptions, Evaluation, ExpressionNode, Field } from "./types";

export type SafeEvaluation =
  | { ok: true; value: Evaluation }
  | { ok: false; error: MalformedExpressionError };

/**
 * Build and roll the tree for an expression string, or for fields that
 * have already been split (`["2d6", "+", "3"]`).
 */
export function parseTree(
  input: string | readonly Field[],
  options: EvaluateOptions = {}
): ExpressionNode {
  const fields = typeof input === "string" ? splitFields(input) : input;
  const terms = classifyFields(fields);
  return buildTree(terms, resolveRng(options));
}

/**
 * Roll a dice expression such as `2d6+3-1d4`.
 *
 * @throws {MalformedExpressionError} when the expression cannot be parsed.
 */
export function evaluate(
  expression: string,
  options: EvaluateOptions = {}
): Evaluation {
  let tree: ExpressionNode;
  try {
    tree = parseTree(expression, options);
  } catch (error) {
    if (isMalformedExpressionError(error)) {
      throw error.withExpression(expression);
    }
    throw error;
  }

  return { total: tree.value, rendered: toDisplayString(tree), tree };
}

/** Like {@link evaluate}, but malformed input comes back as a value. */
export function safeEvaluate(
  expression: string,
  options: EvaluateOptions = {}
): SafeEvaluation {
  try {
    return { ok: true, value: evaluate(expression, options) };
  } catch (error) {
    if (isMalformedExpressionError(error)) return { ok: false, error };
    throw error;
  }
}
