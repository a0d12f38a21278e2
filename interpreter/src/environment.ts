/**
 * Lexical scoping environment for the Kuzur interpreter.
 *
 * Each environment holds a map of bindings and a reference to its parent
 * scope. Call frames (one per function call, plus the global frame) bound
 * assignment: `assign` never writes past the nearest call frame, so a
 * function that assigns a global's name gets a local shadow instead.
 */

import { KuzurValue } from './values';
import { KuzurNameError } from './errors';
import type { Position } from './lexer';

export class Environment {
  private vars: Map<string, KuzurValue>;
  private parent: Environment | null;
  public readonly isCallFrame: boolean;

  constructor(parent: Environment | null = null, isCallFrame = true) {
    this.vars = new Map();
    this.parent = parent;
    this.isCallFrame = isCallFrame;
  }

  /**
   * Look up a binding by name, traversing the parent chain.
   */
  lookup(name: string, site?: Position): KuzurValue {
    const value = this.vars.get(name);
    if (value !== undefined) {
      return value;
    }
    if (this.parent !== null) {
      return this.parent.lookup(name, site);
    }
    throw new KuzurNameError(name, site);
  }

  /**
   * Check if a name is bound in this environment or any parent.
   */
  has(name: string): boolean {
    if (this.vars.has(name)) return true;
    if (this.parent !== null) return this.parent.has(name);
    return false;
  }

  /**
   * Insert or overwrite a binding in this frame only.
   */
  define(name: string, value: KuzurValue): void {
    this.vars.set(name, value);
  }

  /**
   * Update the nearest existing binding up to and including the enclosing
   * call frame; if there is none, define the name in this frame.
   */
  assign(name: string, value: KuzurValue): void {
    let env: Environment | null = this;
    while (env !== null) {
      if (env.vars.has(name)) {
        env.vars.set(name, value);
        return;
      }
      if (env.isCallFrame) break;
      env = env.parent;
    }
    this.vars.set(name, value);
  }

  /**
   * Names bound directly in this frame, in definition order.
   */
  names(): string[] {
    return [...this.vars.keys()];
  }

  /**
   * Create a child scope. Function calls pass `true`.
   */
  child(isCallFrame = false): Environment {
    return new Environment(this, isCallFrame);
  }
}
