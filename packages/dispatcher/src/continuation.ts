import type {BindingContext, CompletedBody} from '@switchyard/binding';

import type {RequestContext} from './context';
import {requestBodyArgumentInvalid, requestBodyInvalid, type DispatchError} from './errors';

export type DeferredExecutionState = 'pending' | 'resumed' | 'failed' | 'cancelled';

type DeferredExecutionSteps = {
  /** Runs the selected route with the context's argument values and transmits the result. */
  execute: () => Promise<void>;
  reject: (error: DispatchError) => Promise<void>;
};

/**
 * Continuation of a request whose route needs the completed body. Owns the request context until one of
 * `resume`, `fail` or `cancel` takes effect; later calls are ignored.
 */
export class DeferredExecution {
  private readonly context: RequestContext;
  private readonly bindingContext: BindingContext;
  private readonly steps: DeferredExecutionSteps;
  private currentState: DeferredExecutionState = 'pending';

  public constructor({
    context,
    bindingContext,
    steps
  }: {
    context: RequestContext;
    bindingContext: BindingContext;
    steps: DeferredExecutionSteps;
  }) {
    this.context = context;
    this.bindingContext = bindingContext;
    this.steps = steps;
  }

  public get state() {
    return this.currentState;
  }

  public async resume(body: CompletedBody) {
    if (!this.settle('resumed')) {
      return;
    }

    const {context} = this;
    for (const {argument, binder} of context.deferredBodyArguments) {
      const result = binder.bind(argument, body, this.bindingContext);
      if (result.ok) {
        context.values.set(argument.name, result.value);
        continue;
      }

      if (result.error.code === 'body_decode_failed') {
        await this.steps.reject(requestBodyInvalid(result.error.message));
        return;
      }

      if (!argument.optional) {
        await this.steps.reject(requestBodyArgumentInvalid(result.error.message));
        return;
      }

      context.values.set(argument.name, undefined);
    }

    for (const argument of context.route?.requiredArguments ?? []) {
      if (context.values.has(argument.name)) {
        continue;
      }

      if (!argument.optional) {
        await this.steps.reject(requestBodyArgumentInvalid(`Argument '${argument.name}' could not be bound`));
        return;
      }

      context.values.set(argument.name, undefined);
    }

    await this.steps.execute();
  }

  public async fail(error: DispatchError) {
    if (!this.settle('failed')) {
      return;
    }

    this.context.release();
    await this.steps.reject(error);
  }

  /** Drops the request without a response. */
  public cancel() {
    if (!this.settle('cancelled')) {
      return;
    }

    this.context.release();
  }

  private settle(state: Exclude<DeferredExecutionState, 'pending'>) {
    if (this.currentState !== 'pending') {
      return false;
    }

    this.currentState = state;
    return true;
  }
}
