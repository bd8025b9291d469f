import {HttpHeaders, HttpRequest} from '@switchyard/http';
import {argument} from '@switchyard/router';
import {describe, expect, it} from 'vitest';

import {
  bodyFieldBinder,
  bodyStreamBinder,
  headerBinder,
  pathOrQueryBinder,
  pathVariableBinder,
  queryValueBinder,
  requestBinder,
  wholeBodyBinder
} from '../binders';
import {createBinderRegistry} from '../registry';
import {ok, type Binder, type BindingContext} from '../types';

const context: BindingContext = {
  request: HttpRequest.from({method: 'GET', target: '/', headers: new HttpHeaders(), body: {kind: 'absent'}}),
  pathVariables: {},
  defaultCharset: 'utf-8'
};

describe('createBinderRegistry', () => {
  it('selects a built-in binder for each binding source', () => {
    const registry = createBinderRegistry();

    expect(registry.findBinder(argument.path('id'), context)).toBe(pathVariableBinder);
    expect(registry.findBinder(argument.query('q'), context)).toBe(queryValueBinder);
    expect(registry.findBinder(argument.header('accept'), context)).toBe(headerBinder);
    expect(registry.findBinder(argument.request('request'), context)).toBe(requestBinder);
    expect(registry.findBinder(argument.body('note'), context)).toBe(wholeBodyBinder);
    expect(registry.findBinder(argument.bodyField('title'), context)).toBe(bodyFieldBinder);
    expect(registry.findBinder(argument.bodyStream('content'), context)).toBe(bodyStreamBinder);
    expect(registry.findBinder(argument.named('id'), context)).toBe(pathOrQueryBinder);
  });

  it('consults custom registrations first, in registration order', () => {
    const clockBinder: Binder = {kind: 'plain', name: 'clock', bind: () => ok(1_700_000_000_000)};
    const unusedBinder: Binder = {kind: 'plain', name: 'unused', bind: () => ok(0)};
    const registry = createBinderRegistry([
      {binder: clockBinder, supports: candidate => candidate.name === 'now'}
    ]).register({binder: unusedBinder, supports: candidate => candidate.name === 'now'});

    expect(registry.findBinder(argument.named('now', 'number'), context)).toBe(clockBinder);
    expect(registry.findBinder(argument.named('other'), context)).toBe(pathOrQueryBinder);
  });
});
