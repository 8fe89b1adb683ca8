// Tests for request validation, webhook conversion and the wire format

import { describe, it, expect } from 'vitest';
import { parseInvestigationRequest, validateInvestigationRequest } from '../schemas/investigation.js';
import { parseBatchInput, requestsFromWebhook } from '../schemas/alertmanager.js';
import { toWireResponse } from '../utils/wire-format.js';
import { InvalidRequestError } from '../utils/errors.js';
import { makeFinding } from './helpers.js';

describe('parseInvestigationRequest', () => {
  it('fills in defaults', () => {
    const request = parseInvestigationRequest({ request_id: 'r-1', alert: { name: 'TargetDown' } });

    expect(request).toEqual({
      requestId: 'r-1',
      alert: { name: 'TargetDown', labels: {}, severity: 'warning', description: '' },
    });
    expect(Object.isFrozen(request.alert.labels)).toBe(true);
  });

  it('normalises severity case and label values', () => {
    const request = parseInvestigationRequest({
      request_id: 'r-2',
      alert: { name: 'HighLatency', severity: 'CRITICAL', labels: { port: 8080 }, fingerprint: 'abc123' },
    });

    expect(request.alert.severity).toBe('critical');
    expect(request.alert.labels).toEqual({ port: '8080' });
    expect(request.alert.fingerprint).toBe('abc123');
  });

  it('rejects a request without an alert name', () => {
    try {
      parseInvestigationRequest({ request_id: 'r-3', alert: { labels: {} } });
      expect.fail('expected an InvalidRequestError');
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidRequestError);
      expect(err instanceof InvalidRequestError && err.issues).toEqual([
        { path: 'alert.name', message: 'alert.name is required' },
      ]);
      expect(err instanceof Error && err.message).toBe('Invalid investigation request: alert.name: alert.name is required');
    }
  });

  it('rejects a null label value', () => {
    expect(() => parseInvestigationRequest({ request_id: 'r-5', alert: { name: 'X', labels: { pod: null } } }))
      .toThrow(/^Invalid investigation request: alert\.labels\.pod: /);
  });

  it('rejects an unknown severity', () => {
    expect(() => parseInvestigationRequest({ request_id: 'r-4', alert: { name: 'X', severity: 'page' } }))
      .toThrow(/^Invalid investigation request: alert\.severity: /);
  });

  it('rejects a body that is not an object', () => {
    expect(() => parseInvestigationRequest('KubePodCrashLooping')).toThrow(InvalidRequestError);
  });
});

describe('validateInvestigationRequest', () => {
  it('requires a request id', () => {
    expect(() => validateInvestigationRequest({ requestId: '', alert: { name: 'X' } }))
      .toThrow('Invalid investigation request: requestId: requestId must not be empty');
  });
});

describe('requestsFromWebhook', () => {
  const payload = {
    version: '4',
    groupKey: '{}:{alertname="KubePodCrashLooping"}',
    status: 'firing',
    alerts: [
      {
        status: 'firing',
        labels: { alertname: 'KubePodCrashLooping', severity: 'critical', namespace: 'ai-platform', pod: 'litellm-0' },
        annotations: { summary: 'Pod is crash looping' },
        fingerprint: 'f00d',
      },
      {
        status: 'resolved',
        labels: { alertname: 'KubePodCrashLooping', namespace: 'ai-platform', pod: 'litellm-1' },
        annotations: {},
      },
      {
        status: 'firing',
        labels: { alertname: 'KubePodNotReady', namespace: 'ai-platform' },
        annotations: { description: 'Pod not ready for 15m', summary: 'ignored' },
      },
    ],
  };

  it('converts firing alerts only', () => {
    const requests = requestsFromWebhook(payload);

    expect(requests).toEqual([
      {
        requestId: 'f00d',
        alert: {
          name: 'KubePodCrashLooping',
          labels: { namespace: 'ai-platform', pod: 'litellm-0' },
          severity: 'critical',
          description: 'Pod is crash looping',
          fingerprint: 'f00d',
        },
      },
      {
        requestId: '{}:{alertname="KubePodCrashLooping"}#1',
        alert: {
          name: 'KubePodNotReady',
          labels: { namespace: 'ai-platform' },
          severity: 'warning',
          description: 'Pod not ready for 15m',
        },
      },
    ]);
  });

  it('rejects a payload without alerts', () => {
    expect(() => requestsFromWebhook({ receiver: 'triage' })).toThrow('Not an Alertmanager webhook payload');
  });
});

describe('parseBatchInput', () => {
  it('accepts an array of requests', () => {
    const requests = parseBatchInput([
      { request_id: 'b-1', alert: { name: 'TargetDown' } },
      { request_id: 'b-2', alert: { name: 'HighErrorRate', labels: { service: 'litellm' } } },
    ]);
    expect(requests.map(r => r.requestId)).toEqual(['b-1', 'b-2']);
  });

  it('names the entry that failed validation', () => {
    expect(() => parseBatchInput([{ request_id: 'b-1', alert: { name: 'TargetDown' } }, { request_id: 'b-2', alert: {} }]))
      .toThrow('Entry 1: Invalid investigation request: alert.name: alert.name is required');
  });
});

describe('toWireResponse', () => {
  it('renders snake_case keys', () => {
    const wire = toWireResponse({
      requestId: 'w-1',
      verdict: 'ACTIONABLE',
      confidence: 0.7,
      findings: [makeFinding('platform', 'OK', 0.7, 'Restart')],
      synthesis: 'OOM',
      suggestedAction: 'Restart',
      fallbackUsed: true,
      strategy: 'secondary',
      category: 'workload',
      latencyMs: 812,
    });

    expect(wire).toEqual({
      request_id: 'w-1',
      verdict: 'ACTIONABLE',
      confidence: 0.7,
      findings: [{
        domain: 'platform',
        status: 'OK',
        summary: 'PASS: platform looks fine',
        confidence: 0.7,
        evidence: [],
        recommendation: 'Restart',
        tools_used: [],
        latency_ms: 5,
      }],
      synthesis: 'OOM',
      suggested_action: 'Restart',
      fallback_used: true,
      strategy: 'secondary',
      category: 'workload',
      latency_ms: 812,
    });
  });
});
