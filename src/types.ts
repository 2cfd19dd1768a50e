/** Binary operators supported between terms. */
export type Operator = "add" | "sub";

/** Source of uniformly distributed floats in [0, 1). */
export type Rng = () => number;

/** Raw token produced by the field splitter: `"+"`, `"-"` or a trimmed operand. */
export type Field = string;

export type OperatorTerm = {
  type: "operator";
  op: Operator;
};

/**
 * `[-][multiplier]d<faces>`, e.g. `3d6`, `d20` or `-2d6`. A negative term
 * subtracts every die it rolls.
 */
export type DieTerm = {
  type: "die";
  text: string;
  negative: boolean;
  multiplier: number;
  faces: number;
};

export type LiteralTerm = {
  type: "literal";
  text: string;
  value: number;
};

/** A field after classification. */
export type Term = OperatorTerm | DieTerm | LiteralTerm;

export type OperationNode = {
  readonly type: "operation";
  readonly op: Operator;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
  readonly value: number;
};

/**
 * A single die roll or a constant. `faces` is only present for dice and
 * `value` is fixed when the leaf is created. A negated die holds the
 * negated roll.
 */
export type LeafNode = {
  readonly type: "leaf";
  readonly term: string;
  readonly isDie: boolean;
  readonly faces: number | undefined;
  readonly value: number;
};

export type ExpressionNode = OperationNode | LeafNode;

/** What a caller gets back for one input line. */
export type Evaluation = {
  total: number;
  rendered: string;
  tree: ExpressionNode;
};

export type EvaluateOptions = {
  /** Random source for this call only. Takes precedence over `seed`. */
  rng?: Rng;
  /** Seed for a fresh deterministic generator. */
  seed?: string;
};

export const OPERATOR_SYMBOL: Record<Operator, "+" | "-"> = {
  add: "+",
  sub: "-",
};
