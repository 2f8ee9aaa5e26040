import { describe, expect, it } from 'vitest';

import { SubscriptionState, getSubscriptionState } from '../src/subscription-state.js';
import { UnexpectedStatusError } from '../src/web-push-error.js';

describe('getSubscriptionState', () => {
  it.each([200, 201, 202, 204])('maps %i to active', (status) => {
    expect(getSubscriptionState(status, '')).toBe(SubscriptionState.ACTIVE);
  });

  it.each([404, 410])('maps %i to expired', (status) => {
    expect(getSubscriptionState(status, 'gone')).toBe(SubscriptionState.EXPIRED);
  });

  it.each([400, 401, 403, 413, 429, 500, 503, 301])('throws for %i with the raw status and body', (status) => {
    const body = `{"reason":"status ${status}"}`;

    let caught: unknown;
    try {
      getSubscriptionState(status, body);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(UnexpectedStatusError);
    if (caught instanceof UnexpectedStatusError) {
      expect(caught.statusCode).toBe(status);
      expect(caught.body).toBe(body);
      expect(caught.message).toBe(`Received unexpected response code: [${status}] - ${body}`);
    }
  });

  it('carries request details on the error', () => {
    let caught: unknown;
    try {
      getSubscriptionState(429, 'slow down', { endpoint: 'https://push.example.net/x' });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(UnexpectedStatusError);
    if (caught instanceof UnexpectedStatusError) {
      expect(caught.statusCode).toBe(429);
      expect(caught.endpoint).toBe('https://push.example.net/x');
    }
  });
});
