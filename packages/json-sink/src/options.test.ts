import { describe, test, expect, jest } from '@jest/globals';
import os from 'os';
import {
  DEFAULT_SINK_URL,
  requestHeaders,
  resolveReporterState,
  staticHeaders,
  validateRequestType
} from './options';

const lookup = () => 'box-1';

describe('resolveReporterState', () => {
  test('applies defaults to an empty configuration', () => {
    expect(resolveReporterState({}, lookup)).toEqual({
      sinkUrl: 'http://localhost:8000',
      requestMethod: 'PUT',
      hostname: 'box-1',
      headers: {}
    });
  });

  test('uses configured values verbatim', () => {
    const lookupHostname = jest.fn(lookup);
    const state = resolveReporterState({ sink_url: 'http://sink:9000/m', request_type: 'post', hostname: 'h1' }, lookupHostname);
    expect(state).toEqual({ sinkUrl: 'http://sink:9000/m', requestMethod: 'POST', hostname: 'h1', headers: {} });
    expect(lookupHostname).not.toHaveBeenCalled();
  });

  test('auto hostname resolves to the local hostname', () => {
    expect(resolveReporterState({ hostname: 'auto' }).hostname).toBe(os.hostname());
  });

  test('accepts the json_ prefixed option names', () => {
    const state = resolveReporterState({ json_sink_url: 'http://legacy:8000', json_http_request_type: 'post' }, lookup);
    expect(state.sinkUrl).toBe('http://legacy:8000');
    expect(state.requestMethod).toBe('POST');
  });

  test('plain option names win over the prefixed ones', () => {
    const state = resolveReporterState({
      sink_url: 'http://new:8000',
      json_sink_url: 'http://legacy:8000',
      request_type: 'put',
      json_http_request_type: 'post'
    }, lookup);
    expect(state.sinkUrl).toBe('http://new:8000');
    expect(state.requestMethod).toBe('PUT');
  });

  test('malformed values fall back instead of failing', () => {
    const state = resolveReporterState({ sink_url: 42, hostname: 7, headers: { retries: 3 }, request_type: ['post'] }, lookup);
    expect(state).toEqual({ sinkUrl: DEFAULT_SINK_URL, requestMethod: 'PUT', hostname: 'box-1', headers: {} });
  });

  test('an empty hostname is kept as given', () => {
    const lookupHostname = jest.fn(lookup);
    expect(resolveReporterState({ hostname: '' }, lookupHostname).hostname).toBe('');
    expect(lookupHostname).not.toHaveBeenCalled();
  });

  test('state is frozen', () => {
    const state = resolveReporterState({ headers: { 'x-a': '1' } }, lookup);
    expect(Object.isFrozen(state)).toBe(true);
    expect(Object.isFrozen(state.headers)).toBe(true);
  });
});

describe('validateRequestType', () => {
  test.each([
    ['post', 'POST'],
    ['POST', 'POST'],
    ['put', 'PUT'],
    ['get', 'PUT'],
    ['delete', 'PUT'],
    [undefined, 'PUT'],
    [null, 'PUT'],
    [1, 'PUT']
  ])('%p selects %s', (input, method) => {
    expect(validateRequestType(input)).toBe(method);
  });

  test('reads symbolic names', () => {
    expect(validateRequestType(Symbol('post'))).toBe('POST');
    expect(validateRequestType(Symbol('patch'))).toBe('PUT');
  });
});

describe('headers', () => {
  test('static headers never carry a content type', () => {
    expect(staticHeaders({ 'Content-Type': 'text/plain', 'x-a': '1' })).toEqual({ 'x-a': '1' });
  });

  test('request headers always send JSON', () => {
    const state = resolveReporterState({ headers: { 'x-a': '1' } }, lookup);
    expect(requestHeaders(state)).toEqual({ 'x-a': '1', 'content-type': 'application/json' });
  });
});
