import { MalformedExpressionError } from "../src/index";
import type { ErrorKind, Rng } from "../src/index";

/** Float that makes `rollDie(faces)` land on `value`. */
export function face(value: number, faces: number): number {
  return (value - 0.5) / faces;
}

/** Random source that replays `values` and fails when it runs out. */
export function scriptedRng(values: readonly number[]): Rng & { calls(): number } {
  let i = 0;
  const rng = () => {
    if (i >= values.length) throw new Error("scriptedRng exhausted");
    return values[i++];
  };
  return Object.assign(rng, { calls: () => i });
}

/** Kind of the MalformedExpressionError thrown by `fn`, if any. */
export function errorKind(fn: () => unknown): ErrorKind | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof MalformedExpressionError) return error.kind;
    throw error;
  }
  return undefined;
}
