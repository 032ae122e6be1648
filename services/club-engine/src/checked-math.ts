/**
 * Checked u64 arithmetic. Operands and results outside [0, U64_MAX] throw
 * instead of wrapping or going negative.
 */

import { U64_MAX } from "@coinvest/shared";
import { ArithmeticOverflowError } from "./types.js";

function inRange(value: bigint): boolean {
  return value >= 0n && value <= U64_MAX;
}

export function checkedAdd(left: bigint, right: bigint): bigint {
  const result = left + right;
  if (!inRange(left) || !inRange(right) || !inRange(result)) {
    throw new ArithmeticOverflowError(
      `u64 out of range: ${left} + ${right}`,
      "add",
      left,
      right
    );
  }
  return result;
}

export function checkedMul(left: bigint, right: bigint): bigint {
  const result = left * right;
  if (!inRange(left) || !inRange(right) || !inRange(result)) {
    throw new ArithmeticOverflowError(
      `u64 out of range: ${left} * ${right}`,
      "mul",
      left,
      right
    );
  }
  return result;
}
