/**
 * Runtime value representations for the calculator interpreter.
 */

import type { Environment } from './environment';
import { Expr, exprToString } from './ast';
import { CalcTypeMismatchError } from './errors';

export type CalcValue =
  | { kind: 'int'; value: bigint }
  | { kind: 'function'; param: string; body: Expr; closure: Environment };

export type CalcValueKind = CalcValue['kind'];

// ---- Value constructors ----

export function mkInt(value: bigint): CalcValue {
  return { kind: 'int', value };
}

/**
 * Build a closure. The environment is held by reference, so the
 * function sees assignments made to it after definition.
 */
export function mkFunction(param: string, body: Expr, closure: Environment): CalcValue {
  return { kind: 'function', param, body, closure };
}

// ---- Value utilities ----

export function valueToString(v: CalcValue): string {
  switch (v.kind) {
    case 'int': return String(v.value);
    case 'function': return `func (${v.param}) { ${exprToString(v.body)} }`;
  }
}

export function kindName(kind: CalcValueKind): string {
  return kind === 'int' ? 'integer' : 'function';
}

/**
 * Get the integer inside a value, or throw a type mismatch naming
 * the operation that needed it.
 */
export function asInteger(v: CalcValue, operation: string): bigint {
  if (v.kind === 'int') return v.value;
  throw new CalcTypeMismatchError(`${operation} expects an integer, got a value of type ${kindName(v.kind)}`);
}
