import { MalformedExpressionError } from "./errors";
import { isDieText, parseDieTerm, parseLiteral } from "./terms";
import type { Field, Term } from "./types";

/**
 * Split an expression into operand and operator fields, in input order.
 *
 * A `-` that directly follows a `-` operator with nothing in between is
 * taken as the sign of the next operand: `"5--3"` -> `["5", "-", "-3"]`.
 */
export function splitFields(expression: string): Field[] {
  const fields: Field[] = [];
  let current = "";
  let sign = "";

  for (const c of expression) {
    if (c !== "+" && c !== "-") {
      current += c;
      continue;
    }

    const operand = current.trim();
    if (operand === "") {
      if (sign !== "") {
        throw new MalformedExpressionError(
          "MalformedOperatorPlacement",
          `Unexpected '${c}' after a negative sign`
        );
      }
      if (fields.length === 0) {
        throw new MalformedExpressionError(
          "MalformedOperatorPlacement",
          `Expression cannot start with '${c}'`
        );
      }
      if (c === "-" && fields[fields.length - 1] === "-") {
        sign = "-";
        current = "";
        continue;
      }
    }

    fields.push(sign + operand, c);
    sign = "";
    current = "";
  }

  const last = current.trim();
  if (last !== "") {
    fields.push(sign + last);
  } else if (sign !== "") {
    throw new MalformedExpressionError(
      "MalformedOperatorPlacement",
      "Expression ends with a dangling '-'"
    );
  }

  return fields;
}

/** Turn one field into an operator, die or literal term. */
export function classifyField(field: Field): Term {
  const text = field.trim();

  switch (text) {
    case "+":
      return { type: "operator", op: "add" };
    case "-":
      return { type: "operator", op: "sub" };
    case "":
      throw new MalformedExpressionError(
        "MalformedOperatorPlacement",
        "Operator is missing an operand"
      );
  }

  return isDieText(text) ? parseDieTerm(text) : parseLiteral(text);
}

export function classifyFields(fields: readonly Field[]): Term[] {
  return fields.map(classifyField);
}
