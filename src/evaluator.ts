/**
 * Tree-walking evaluator for the calculator language.
 *
 * Evaluation mutates the environment it is given: assignments are not
 * rolled back when a later part of the same expression fails.
 */

import { Environment } from './environment';
import { Expr, ArithmeticOperator, exprToString } from './ast';
import { CalcValue, mkInt, mkFunction, asInteger, kindName } from './values';
import {
  CalcError,
  CalcTypeMismatchError,
  CalcDivisionByZeroError,
  fromRangeError,
} from './errors';
import { Result, ok, error } from './result';

export type EvalResult = Result<CalcValue, CalcError>;

/**
 * Evaluate an expression, converting language errors into a result.
 */
export function run(expr: Expr, env: Environment): EvalResult {
  try {
    return ok(evaluate(expr, env));
  } catch (e) {
    if (e instanceof CalcError) return error(e);
    if (e instanceof RangeError) return error(fromRangeError(e));
    throw e;
  }
}

export function evaluate(expr: Expr, env: Environment): CalcValue {
  switch (expr.kind) {
    case 'integer':
      return mkInt(expr.value);
    case 'identifier':
      return env.get(expr.name);
    case 'binary':
      if (expr.op === '=') return evalAssignment(expr.left, expr.right, env);
      return evalArithmetic(expr.op, expr.left, expr.right, env);
    case 'call':
      return evalCall(expr.callee, expr.argument, env);
    case 'function':
      return mkFunction(expr.param, expr.body, env);
    case 'conditional': {
      const left = asInteger(evaluate(expr.left, env), `'${expr.relation}'`);
      const right = asInteger(evaluate(expr.right, env), `'${expr.relation}'`);
      return compare(expr.relation, left, right)
        ? evaluate(expr.consequence, env)
        : evaluate(expr.alternative, env);
    }
  }
}

function evalAssignment(target: Expr, valueNode: Expr, env: Environment): CalcValue {
  if (target.kind !== 'identifier') {
    throw new CalcTypeMismatchError(`Cannot assign to '${exprToString(target)}'`);
  }
  const value = evaluate(valueNode, env);
  env.assign(target.name, value);
  return value;
}

function evalArithmetic(op: ArithmeticOperator, leftNode: Expr, rightNode: Expr, env: Environment): CalcValue {
  const left = asInteger(evaluate(leftNode, env), `'${op}'`);
  const right = asInteger(evaluate(rightNode, env), `'${op}'`);

  switch (op) {
    case '+': return mkInt(left + right);
    case '-': return mkInt(left - right);
    case '*': return mkInt(left * right);
    case '/':
      if (right === 0n) {
        throw new CalcDivisionByZeroError();
      }
      return mkInt(left / right);
  }
}

function evalCall(calleeNode: Expr, argumentNode: Expr, env: Environment): CalcValue {
  const callee = evaluate(calleeNode, env);
  if (callee.kind !== 'function') {
    throw new CalcTypeMismatchError(`Cannot call a value of type ${kindName(callee.kind)}`);
  }
  const argument = evaluate(argumentNode, env);

  const scope = callee.closure.child();
  scope.assign(callee.param, argument);
  return evaluate(callee.body, scope);
}

function compare(relation: string, left: bigint, right: bigint): boolean {
  switch (relation) {
    case '<': return left < right;
    case '>': return left > right;
    case '<=': return left <= right;
    case '>=': return left >= right;
    case '==': return left === right;
    case '!=': return left !== right;
    default:
      throw new CalcTypeMismatchError(`Unknown relational operator '${relation}'`);
  }
}
