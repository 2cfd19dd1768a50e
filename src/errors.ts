export type ErrorKind =
  | "MalformedOperatorPlacement"
  | "AmbiguousOrMissingOperand"
  | "MalformedDieTerm"
  | "InvalidLiteral";

/** Raised for any input that cannot be turned into an expression tree. */
export class MalformedExpressionError extends Error {
  readonly kind: ErrorKind;
  readonly expression: string | undefined;

  constructor(kind: ErrorKind, message: string, expression?: string) {
    super(message);
    this.name = "MalformedExpressionError";
    this.kind = kind;
    this.expression = expression;
  }

  /** Re-raise with the full input attached, keeping the kind. */
  withExpression(expression: string): MalformedExpressionError {
    return new MalformedExpressionError(
      this.kind,
      `Cannot evaluate dice expression [${expression}]: ${this.message}`,
      expression
    );
  }
}

export function isMalformedExpressionError(
  error: unknown
): error is MalformedExpressionError {
  return error instanceof MalformedExpressionError;
}
