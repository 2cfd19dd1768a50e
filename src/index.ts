export { isMalformedExpressionError, MalformedExpressionError } from "./errors";
export type { ErrorKind } from "./errors";
export { evaluate, parseTree, safeEvaluate } from "./evaluate";
export type { SafeEvaluation } from "./evaluate";
export { classifyField, classifyFields, splitFields } from "./fields";
export { toDebugString, toDisplayString } from "./render";
export {
  formatEvaluation,
  parseCliArgs,
  PROMPT,
  respond,
  runRepl,
} from "./repl";
export type { CliArgs, ReplOptions } from "./repl";
export {
  createRng,
  getDefaultRng,
  resetDefaultRng,
  resolveRng,
  rollDie,
  setDefaultRng,
} from "./rng";
export {
  getMaxDicePerTerm,
  isDieText,
  parseDieTerm,
  parseLiteral,
  resetMaxDicePerTerm,
  setMaxDicePerTerm,
} from "./terms";
export { buildTree, expandDice, findRoot, operationNode } from "./tree";
export { OPERATOR_SYMBOL } from "./types";
export type {
  DieTerm,
  EvaluateOptions,
  Evaluation,
  ExpressionNode,
  Field,
  LeafNode,
  LiteralTerm,
  Operator,
  OperationNode,
  OperatorTerm,
  Rng,
  Term,
} from "./types";
