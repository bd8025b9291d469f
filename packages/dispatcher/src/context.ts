import type {BodyBinder} from '@switchyard/binding';
import type {HttpRequest} from '@switchyard/http';
import type {Argument, RouteMatch} from '@switchyard/router';

import {ArgumentValueMap} from './argumentValues';
import {BodyAccumulator} from './bodyAccumulator';
import {RequestContextReleasedError, RouteAlreadySelectedError} from './errors';

export type DeferredBodyArgument = {
  readonly argument: Argument;
  readonly binder: BodyBinder;
};

/**
 * State of one request/response cycle. Threaded explicitly from the transport through the dispatcher,
 * subscriber and transmitter; nothing is stored on the connection.
 */
export class RequestContext {
  public readonly request: HttpRequest;
  public readonly correlationId: string;
  public readonly requestId: string;
  public readonly connectionId: string | undefined;

  private readonly argumentValues = new ArgumentValueMap();
  private readonly deferred: DeferredBodyArgument[] = [];
  private selectedRoute: RouteMatch | undefined;
  private bodyAccumulator: BodyAccumulator | undefined;
  private isReleased = false;

  public constructor({
    request,
    correlationId,
    requestId,
    connectionId
  }: {
    request: HttpRequest;
    correlationId: string;
    requestId: string;
    connectionId?: string;
  }) {
    this.request = request;
    this.correlationId = correlationId;
    this.requestId = requestId;
    this.connectionId = connectionId;
  }

  public get route() {
    return this.selectedRoute;
  }

  public get values() {
    this.assertActive();
    return this.argumentValues;
  }

  public get deferredBodyArguments(): readonly DeferredBodyArgument[] {
    return this.deferred;
  }

  public get requiresBody() {
    return this.deferred.length > 0;
  }

  public get accumulator() {
    return this.bodyAccumulator;
  }

  public get released() {
    return this.isReleased;
  }

  public selectRoute(route: RouteMatch) {
    this.assertActive();
    if (this.selectedRoute) {
      throw new RouteAlreadySelectedError(this.selectedRoute.pattern);
    }

    this.selectedRoute = route;
  }

  public deferBodyArgument(argument: Argument, binder: BodyBinder) {
    this.assertActive();
    this.deferred.push({argument, binder});
  }

  public openAccumulator() {
    this.assertActive();
    if (!this.bodyAccumulator) {
      this.bodyAccumulator = new BodyAccumulator();
    }

    return this.bodyAccumulator;
  }

  /** Drops buffered body bytes. Idempotent. */
  public release() {
    this.bodyAccumulator?.release();
    this.isReleased = true;
  }

  private assertActive() {
    if (this.isReleased) {
      throw new RequestContextReleasedError(this.requestId);
    }
  }
}
