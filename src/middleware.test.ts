import { NextRequest } from 'next/server';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { middleware } from '@/middleware';

const ALLOWED = 'http://localhost:3000';

function request(method: string, headers: Record<string, string>) {
  return new NextRequest('http://localhost/upload', { method, headers });
}

beforeEach(() => {
  vi.stubEnv('ALLOWED_ORIGINS', ALLOWED);
});

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('middleware', () => {
  it('answers a preflight from an allowed origin', async () => {
    const response = middleware(
      request('OPTIONS', {
        origin: ALLOWED,
        'access-control-request-method': 'POST',
        'access-control-request-headers': 'content-type',
      }),
    );

    expect(response.status).toBe(200);
    expect(await response.text()).toBe('OK');
    expect(response.headers.get('access-control-allow-origin')).toBe(ALLOWED);
    expect(response.headers.get('access-control-allow-credentials')).toBe(
      'true',
    );
    expect(response.headers.get('access-control-allow-headers')).toBe(
      'content-type',
    );
    expect(response.headers.get('access-control-max-age')).toBe('600');
  });

  it('refuses a preflight from another origin', async () => {
    const response = middleware(
      request('OPTIONS', {
        origin: 'https://other.example',
        'access-control-request-method': 'POST',
      }),
    );

    expect(response.status).toBe(400);
    expect(await response.text()).toBe('Disallowed CORS origin');
  });

  it('adds CORS headers to requests from an allowed origin', () => {
    const response = middleware(request('POST', { origin: ALLOWED }));

    expect(response.headers.get('access-control-allow-origin')).toBe(ALLOWED);
    expect(response.headers.get('vary')).toBe('Origin');
  });

  it('answers with a JSON error when the configuration is invalid', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.stubEnv('TIMETABLE_PAGE', 'zero');
    const response = middleware(request('POST', { origin: ALLOWED }));

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({
      error: 'Unexpected error processing the request.',
    });
    expect(errorSpy).toHaveBeenCalledOnce();
    errorSpy.mockRestore();
  });

  it('passes other requests through untouched', () => {
    const foreign = middleware(
      request('POST', { origin: 'https://other.example' }),
    );
    const sameOrigin = middleware(request('POST', {}));

    expect(foreign.headers.get('access-control-allow-origin')).toBeNull();
    expect(sameOrigin.headers.get('access-control-allow-origin')).toBeNull();
  });
});
