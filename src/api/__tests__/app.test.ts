/**
 * Tests for HTTP error mapping and the API routes
 */

import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import type { Server } from 'http';
import { createApp, toHttpError } from '../app.js';
import { createPluginRegistry } from '../../plugins/index.js';
import {
  InvalidCoefficientError,
  InvalidInputError,
  UnknownCompoundError,
  UnknownPresetError,
} from '../../domain/errors.js';

describe('toHttpError', () => {
  it('maps an unknown preset to 404 with its code', () => {
    const { status, body } = toHttpError(new UnknownPresetError('reckless', ['moderate']));
    expect(status).toBe(404);
    expect(body).toEqual({
      error: 'Unknown preset "reckless". Available presets: moderate',
      code: 'UNKNOWN_PRESET',
    });
  });

  it('maps caller mistakes to 400', () => {
    expect(toHttpError(new UnknownCompoundError('mystery')).status).toBe(400);
    expect(toHttpError(new InvalidInputError(['age: Required'])).status).toBe(400);
  });

  it('maps broken coefficient data to 500', () => {
    expect(toHttpError(new InvalidCoefficientError('moderate', ['bad'])).status).toBe(500);
  });

  it('passes through client errors raised by middleware', () => {
    const too_large = Object.assign(new Error('request entity too large'), { status: 413, expose: true });
    expect(toHttpError(too_large)).toEqual({ status: 413, body: { error: 'request entity too large' } });
  });

  it('does not expose errors that are not marked safe', () => {
    const internal = Object.assign(new Error('upstream detail'), { statusCode: 400, expose: false });
    expect(toHttpError(internal).status).toBe(500);
  });

  it('hides the message of unexpected errors', () => {
    expect(toHttpError(new Error('database exploded'))).toEqual({
      status: 500,
      body: { error: 'Internal server error' },
    });
  });
});

// ============================================================================
// Routes
// ============================================================================

describe('API routes', () => {
  let server: Server;
  let base_url = '';

  beforeAll(async () => {
    const app = createApp({ plugins: await createPluginRegistry() });
    await new Promise<void>((resolve) => {
      server = app.listen(0, '127.0.0.1', () => resolve());
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server did not bind to a TCP port');
    }
    base_url = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  function post(path: string, body: string): Promise<Response> {
    return fetch(`${base_url}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    });
  }

  it('calculates a regimen', async () => {
    const response = await post(
      '/api/calculate',
      JSON.stringify({
        regimen: { compounds: [{ compound: 'testosterone_cypionate', weeklyMg: 140, durationWeeks: 52 }] },
        activePlugins: [],
      })
    );
    expect(response.status).toBe(200);
    const body: { hash: string; record: { category: string } } = await response.json();
    expect(body.record.category).toBe('physiologic');
    expect(body.hash).toMatch(/^[0-9a-f]{64}$/);
  });

  it('answers malformed JSON with 400', async () => {
    const response = await post('/api/calculate', '{"regimen":');
    expect(response.status).toBe(400);
    const body: { error: string; code?: string } = await response.json();
    expect(body.error).not.toBe('Internal server error');
    expect(body.code).toBeUndefined();
  });

  it('answers an oversized body with 413', async () => {
    const response = await post('/api/calculate', JSON.stringify({ padding: 'x'.repeat(300 * 1024) }));
    expect(response.status).toBe(413);
    const body: { error: string } = await response.json();
    expect(body.error).toBe('request entity too large');
  });

  it('answers an unknown preset with 404', async () => {
    const response = await post('/api/calculate', JSON.stringify({ preset: 'reckless' }));
    expect(response.status).toBe(404);
    const body: { code: string } = await response.json();
    expect(body.code).toBe('UNKNOWN_PRESET');
  });
});
