/**
 * Expression tree produced by the parser and walked by the evaluator.
 *
 * Each node owns its children; a tree is built fresh for every line.
 */

export type ArithmeticOperator = '+' | '-' | '*' | '/';
export type BinaryOperator = ArithmeticOperator | '=';

export type Expr =
  | { kind: 'integer'; value: bigint }
  | { kind: 'identifier'; name: string }
  | { kind: 'binary'; op: BinaryOperator; left: Expr; right: Expr }
  | { kind: 'call'; callee: Expr; argument: Expr }
  | { kind: 'function'; param: string; body: Expr }
  | { kind: 'conditional'; left: Expr; relation: string; right: Expr; consequence: Expr; alternative: Expr };

// ---- Node constructors ----

export function mkIntegerLiteral(value: bigint): Expr {
  return { kind: 'integer', value };
}

export function mkIdentifier(name: string): Expr {
  return { kind: 'identifier', name };
}

export function mkBinaryOp(op: BinaryOperator, left: Expr, right: Expr): Expr {
  return { kind: 'binary', op, left, right };
}

export function mkCall(callee: Expr, argument: Expr): Expr {
  return { kind: 'call', callee, argument };
}

export function mkFunctionDef(param: string, body: Expr): Expr {
  return { kind: 'function', param, body };
}

export function mkConditional(
  left: Expr,
  relation: string,
  right: Expr,
  consequence: Expr,
  alternative: Expr,
): Expr {
  return { kind: 'conditional', left, relation, right, consequence, alternative };
}

/**
 * Render an expression back to source text. Compound operands are
 * wrapped in parentheses so the parsed grouping shows.
 */
export function exprToString(expr: Expr): string {
  switch (expr.kind) {
    case 'integer': return String(expr.value);
    case 'identifier': return expr.name;
    case 'binary': return `${operand(expr.left)} ${expr.op} ${operand(expr.right)}`;
    case 'call': return `${operand(expr.callee)}(${exprToString(expr.argument)})`;
    case 'function': return `func (${expr.param}) { ${exprToString(expr.body)} }`;
    case 'conditional':
      return `if ${exprToString(expr.left)} ${expr.relation} ${exprToString(expr.right)}` +
        ` then ${exprToString(expr.consequence)} else ${exprToString(expr.alternative)}`;
  }
}

function operand(expr: Expr): string {
  const text = exprToString(expr);
  return expr.kind === 'integer' || expr.kind === 'identifier' || expr.kind === 'call'
    ? text
    : `(${text})`;
}
