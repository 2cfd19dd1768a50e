import { MalformedExpressionError } from "./errors";
import type { DieTerm, LiteralTerm } from "./types";

const DEFAULT_MAX_DICE_PER_TERM = 1000;

let maxDicePerTerm = DEFAULT_MAX_DICE_PER_TERM;

/** Limit how many dice a single `NdF` term may expand into. */
export function setMaxDicePerTerm(max: number): void {
  if (!Number.isSafeInteger(max) || max < 1) {
    throw new RangeError("setMaxDicePerTerm(max): max must be a positive integer");
  }
  maxDicePerTerm = max;
}

/** Returns the current per-term dice limit. */
export function getMaxDicePerTerm(): number {
  return maxDicePerTerm;
}

/** Restores the per-term dice limit to its default. */
export function resetMaxDicePerTerm(): void {
  maxDicePerTerm = DEFAULT_MAX_DICE_PER_TERM;
}

/** True when the operand refers to dice rather than a constant. */
export function isDieText(text: string): boolean {
  return text.includes("d") || text.includes("D");
}

/**
 * Parse `[-][multiplier]d<faces>`. The multiplier defaults to 1.
 *
 * - `"3d6"` -> `{ multiplier: 3, faces: 6 }`
 * - `"d20"` -> `{ multiplier: 1, faces: 20 }`
 * - `"-d6"` -> `{ negative: true, multiplier: 1, faces: 6 }`
 */
export function parseDieTerm(text: string): DieTerm {
  const negative = text[0] === "-";
  const start = negative ? 1 : 0;
  let i = start;
  while (i < text.length && isDigit(text[i])) i++;

  const multiplierDigits = text.slice(start, i);
  if (text[i] !== "d" && text[i] !== "D") {
    throw new MalformedExpressionError(
      "MalformedDieTerm",
      `Expected a die term of the form [count]d<faces>, found '${text}'`
    );
  }

  let j = i + 1;
  while (j < text.length && isDigit(text[j])) j++;

  const faceDigits = text.slice(i + 1, j);
  if (faceDigits.length === 0) {
    throw new MalformedExpressionError(
      "MalformedDieTerm",
      `Missing face count after 'd' in '${text}'`
    );
  }
  if (j < text.length) {
    throw new MalformedExpressionError(
      "MalformedDieTerm",
      `Unexpected '${text[j]}' in die term '${text}'`
    );
  }

  const multiplier =
    multiplierDigits.length === 0 ? 1 : parseInt(multiplierDigits, 10);
  const faces = parseInt(faceDigits, 10);

  if (!Number.isSafeInteger(faces) || faces < 1) {
    throw new MalformedExpressionError(
      "MalformedDieTerm",
      `Die in '${text}' must have at least one face`
    );
  }
  if (!Number.isSafeInteger(multiplier) || multiplier < 1) {
    throw new MalformedExpressionError(
      "MalformedDieTerm",
      `Die count in '${text}' must be a positive integer`
    );
  }
  if (multiplier > maxDicePerTerm) {
    throw new MalformedExpressionError(
      "MalformedDieTerm",
      `Rolling ${multiplier} dice in '${text}' exceeds the configured limit of ${maxDicePerTerm} dice per term (see setMaxDicePerTerm)`
    );
  }

  return { type: "die", text, negative, multiplier, faces };
}

/** Parse an optionally signed decimal integer. */
export function parseLiteral(text: string): LiteralTerm {
  const start = text[0] === "-" || text[0] === "+" ? 1 : 0;
  let i = start;
  while (i < text.length && isDigit(text[i])) i++;

  if (i === start || i < text.length) {
    throw new MalformedExpressionError(
      "InvalidLiteral",
      `Expected an integer, found '${text}'`
    );
  }

  const parsed = parseInt(text, 10);
  if (!Number.isSafeInteger(parsed)) {
    throw new MalformedExpressionError(
      "InvalidLiteral",
      `Integer '${text}' is out of range`
    );
  }

  // parseInt("-0") is -0
  const value = parsed === 0 ? 0 : parsed;
  return { type: "literal", text, value };
}

function isDigit(c: string | undefined): boolean {
  return c !== undefined && c >= "0" && c <= "9";
}
