import { vi } from 'vitest';

export function createFetchMock() {
  return vi.fn<typeof fetch>();
}

export function imageResponse(body: Uint8Array | string, contentType: string = 'image/png'): Response {
  return new Response(typeof body === 'string' ? new TextEncoder().encode(body) : body, {
    status: 200,
    headers: { 'content-type': contentType },
  });
}

export function statusResponse(status: number, statusText: string): Response {
  return new Response('unavailable', { status, statusText, headers: { 'content-type': 'text/plain' } });
}

export function connectionRefused(): TypeError {
  const cause = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:80'), { code: 'ECONNREFUSED' });
  return new TypeError('fetch failed', { cause });
}
