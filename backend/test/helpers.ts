import { pino } from 'pino';
import { vi } from 'vitest';

export const silentLogger = pino({ level: 'silent' });

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });
}

// A fresh Response per call, a body can only be read once
export function mockFetchJson(body: unknown, status = 200) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => jsonResponse(body, status));
}

export function requestedUrl(fetchMock: ReturnType<typeof mockFetchJson>, call = 0): URL {
  const input = fetchMock.mock.calls[call][0];
  return new URL(input instanceof Request ? input.url : input.toString());
}
