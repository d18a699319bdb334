import { describe, expect, test } from 'vitest';
import { parseApplicationRequest } from '../../src/api/routes';
import { RunStore } from '../../src/services/runStore';
import { ApplicationResult } from '../../src/types';
import { makeContext } from '../helpers/context';

describe('parseApplicationRequest', () => {
  test('accepts a well-formed body', () => {
    const body = { jobUrl: 'https://careers.example.com/jobs/42', email: 'ada@example.com', allowSubmit: true };
    expect(parseApplicationRequest(body)).toEqual({ request: body });
  });

  test('an absent body is an empty request', () => {
    expect(parseApplicationRequest(undefined)).toEqual({ request: {} });
  });

  test('null text fields are treated as absent', () => {
    const { request } = parseApplicationRequest({ jobUrl: null, email: null, firstName: 'Ada', proxy: { host: null } });
    expect(request).toEqual({ firstName: 'Ada', proxy: {} });
    expect(request?.jobUrl).toBeUndefined();
    expect(request?.email).toBeUndefined();
  });

  test('reports the first invalid field', () => {
    expect(parseApplicationRequest({ resumeUrl: 'not a url' })).toEqual({ error: 'resumeUrl: Invalid url' });
    expect(parseApplicationRequest({ planOnly: 'yes' })).toEqual({
      error: 'planOnly: Expected boolean, received string',
    });
    expect(parseApplicationRequest('apply please')).toEqual({ error: 'body: Expected object, received string' });
  });
});

function resultFor(runId: string): ApplicationResult {
  const ctx = makeContext();
  return {
    ok: true,
    runId,
    status: 'planned_only',
    phase: 'planned_only',
    platform: 'generic',
    elapsedMs: 0,
    evidence: ctx.evidence,
    log: [],
    state: ctx.snapshot(),
    metrics: {},
    attempts: 0,
  };
}

describe('RunStore', () => {
  test('keeps the most recent runs up to its limit', () => {
    const store = new RunStore(2);
    store.add(resultFor('run-a'));
    store.add(resultFor('run-b'));
    store.add(resultFor('run-c'));

    expect(store.size).toBe(2);
    expect(store.get('run-a')).toBeUndefined();
    expect(store.get('run-c')?.status).toBe('planned_only');
  });
});
