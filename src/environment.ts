/**
 * Lexical scoping environment for the calculator interpreter.
 *
 * The global environment lives for the whole session. Each function
 * call gets a child scope of the function's captured environment
 * holding the parameter binding.
 */

import { CalcValue } from './values';
import { CalcUnboundIdentifierError } from './errors';

export class Environment {
  private vars: Map<string, CalcValue>;
  private parent: Environment | null;

  constructor(parent: Environment | null = null) {
    this.vars = new Map();
    this.parent = parent;
  }

  /**
   * Look up a variable by name, traversing the parent chain.
   */
  get(name: string): CalcValue {
    const value = this.vars.get(name);
    if (value !== undefined) {
      return value;
    }
    if (this.parent !== null) {
      return this.parent.get(name);
    }
    throw new CalcUnboundIdentifierError(name);
  }

  /**
   * Bind a name in this scope, replacing any previous binding here.
   * Parent scopes are never written.
   */
  assign(name: string, value: CalcValue): void {
    this.vars.set(name, value);
  }

  /** Bindings of this scope only, in definition order. */
  bindings(): Array<[string, CalcValue]> {
    return [...this.vars.entries()];
  }

  child(): Environment {
    return new Environment(this);
  }
}
