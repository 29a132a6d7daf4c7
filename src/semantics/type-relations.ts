import { emitDiagnostic, type Position } from "../diagnostics/index.js";
import type { GlobalEnv } from "./global-env.js";
import type { Type } from "./types.js";

/** Widening order among the numeric primitives */
const numericRank: ReadonlyMap<string, number> = new Map([
  ["int", 0],
  ["long", 1],
  ["float", 2],
]);

const rankOf = (type: Type): number | undefined =>
  type.isPrimitiveType() ? numericRank.get(type.name) : undefined;

export const isNumericType = (type: Type): boolean =>
  rankOf(type) !== undefined;

export const isIntegralType = (type: Type): boolean =>
  type.is("int") || type.is("long");

/** User and array types are handled by reference */
export const isReferenceType = (type: Type): boolean =>
  type.isUserType() || type.isArrayType();

/** Whether a value of `source` converts implicitly to `target` */
export const isCompatible = (source: Type, target: Type): boolean => {
  if (source === target) return true;
  if (source.is("null")) return isReferenceType(target);

  const sourceRank = rankOf(source);
  const targetRank = rankOf(target);
  if (sourceRank === undefined || targetRank === undefined) return false;
  return sourceRank < targetRank;
};

/** Result type of an arithmetic operation over `a` and `b` */
export const joinTypes = (
  phase: number,
  position: Position,
  a: Type,
  b: Type,
  env: GlobalEnv
): Type => {
  if (isCompatible(a, b)) return b;
  if (isCompatible(b, a)) return a;

  emitDiagnostic({
    ctx: env,
    code: "TY0009",
    params: { kind: "incompatible-join", left: a.name, right: b.name },
    phase,
    position,
  });
  return env.primitive("int");
};
