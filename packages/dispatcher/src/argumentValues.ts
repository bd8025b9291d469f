import type {ArgumentValues} from '@switchyard/router';

import {DuplicateArgumentError} from './errors';

/** Argument name to value, in the order values were set. Each name is set at most once. */
export class ArgumentValueMap {
  private readonly values = new Map<string, unknown>();

  public set(name: string, value: unknown) {
    if (this.values.has(name)) {
      throw new DuplicateArgumentError(name);
    }

    this.values.set(name, value);
  }

  public has(name: string) {
    return this.values.has(name);
  }

  public get(name: string): unknown {
    return this.values.get(name);
  }

  public get size() {
    return this.values.size;
  }

  public names() {
    return [...this.values.keys()];
  }

  public toRecord(): ArgumentValues {
    return Object.freeze(Object.fromEntries(this.values));
  }
}
