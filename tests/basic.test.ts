/**
 * Tests for the environment, value and expression helpers, built
 * directly without going through the parser.
 */

import {
  mkIntegerLiteral as int,
  mkIdentifier as id,
  mkBinaryOp,
  mkCall,
  mkFunctionDef,
  mkConditional,
  exprToString,
} from '../src/ast';
import { Environment } from '../src/environment';
import {
  CalcError,
  CalcRecursionError,
  CalcTypeMismatchError,
  CalcUnboundIdentifierError,
  fromRangeError,
} from '../src/errors';
import { asInteger, kindName, mkFunction, mkInt, valueToString } from '../src/values';

// ==================================================================
// Environment tests
// ==================================================================

describe('Environment', () => {
  test('assign and get a variable', () => {
    const env = new Environment();
    env.assign('x', mkInt(42n));
    expect(env.get('x')).toEqual(mkInt(42n));
  });

  test('undefined variable throws CalcUnboundIdentifierError', () => {
    const env = new Environment();
    expect(() => env.get('unknown')).toThrow(CalcUnboundIdentifierError);
  });

  test('unbound error names the identifier', () => {
    const err = new CalcUnboundIdentifierError('y');
    expect(err.identifier).toBe('y');
    expect(err.message).toBe("Undefined identifier 'y'");
  });

  test('assign overwrites an existing binding', () => {
    const env = new Environment();
    env.assign('x', mkInt(1n));
    env.assign('x', mkInt(2n));
    expect(env.get('x')).toEqual(mkInt(2n));
  });

  test('child scope inherits parent variables', () => {
    const parent = new Environment();
    parent.assign('x', mkInt(10n));
    expect(parent.child().get('x')).toEqual(mkInt(10n));
  });

  test('assigning in a child shadows without touching the parent', () => {
    const parent = new Environment();
    parent.assign('x', mkInt(10n));
    const child = parent.child();
    child.assign('x', mkInt(20n));
    expect(child.get('x')).toEqual(mkInt(20n));
    expect(parent.get('x')).toEqual(mkInt(10n));
  });

  test('bindings lists only this scope in definition order', () => {
    const parent = new Environment();
    parent.assign('b', mkInt(2n));
    parent.assign('a', mkInt(1n));
    parent.child().assign('c', mkInt(3n));
    expect(parent.bindings()).toEqual([
      ['b', mkInt(2n)],
      ['a', mkInt(1n)],
    ]);
  });
});

// ==================================================================
// Host error mapping
// ==================================================================

describe('fromRangeError', () => {
  test('stack overflow becomes a recursion error', () => {
    const err = fromRangeError(new RangeError('Maximum call stack size exceeded'));
    expect(err).toBeInstanceOf(CalcRecursionError);
    expect(err.message).toBe('Maximum recursion depth exceeded');
  });

  test('other range errors keep their message', () => {
    const err = fromRangeError(new RangeError('Maximum BigInt size exceeded'));
    expect(err).toBeInstanceOf(CalcError);
    expect(err).not.toBeInstanceOf(CalcRecursionError);
    expect(err.message).toBe('Maximum BigInt size exceeded');
  });
});

// ==================================================================
// Value tests
// ==================================================================

describe('values', () => {
  test('integers print in decimal', () => {
    expect(valueToString(mkInt(42n))).toBe('42');
    expect(valueToString(mkInt(-3n))).toBe('-3');
  });

  test('functions print as their literal', () => {
    const fn = mkFunction('n', mkBinaryOp('*', id('n'), int(2n)), new Environment());
    expect(valueToString(fn)).toBe('func (n) { n * 2 }');
  });

  test('asInteger unwraps integers', () => {
    expect(asInteger(mkInt(5n), "'+'")).toBe(5n);
  });

  test('asInteger rejects functions', () => {
    const fn = mkFunction('n', id('n'), new Environment());
    expect(() => asInteger(fn, "'*'")).toThrow(
      new CalcTypeMismatchError("'*' expects an integer, got a value of type function"),
    );
  });

  test('kind names', () => {
    expect(kindName('int')).toBe('integer');
    expect(kindName('function')).toBe('function');
  });
});

// ==================================================================
// Expression printing
// ==================================================================

describe('exprToString', () => {
  test('shows right-nested grouping', () => {
    const expr = mkBinaryOp('-', id('a'), mkBinaryOp('-', id('b'), id('c')));
    expect(exprToString(expr)).toBe('a - (b - c)');
  });

  test('calls and conditionals', () => {
    const expr = mkConditional(id('n'), '<=', int(1n), int(1n), mkBinaryOp('*', id('n'), mkCall(id('f'), int(2n))));
    expect(exprToString(expr)).toBe('if n <= 1 then 1 else n * f(2)');
  });

  test('nested function literal', () => {
    expect(exprToString(mkFunctionDef('a', mkFunctionDef('b', id('a'))))).toBe('func (a) { func (b) { a } }');
  });
});
