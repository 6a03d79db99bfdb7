import type { Matcher, Silence } from '../alertmanager/index.js';

export const T1 = '2024-01-01T00:00:00Z';
export const T2 = '2024-01-02T00:00:00Z';

export function makeMatcher(overrides: Partial<Matcher> = {}): Matcher {
  return { name: 'severity', value: 'critical', isRegex: false, isEqual: true, ...overrides };
}

export function makeSilence(overrides: Partial<Silence> = {}): Silence {
  return {
    id: 's1',
    status: { state: 'active' },
    matchers: [makeMatcher()],
    startsAt: T1,
    endsAt: T2,
    updatedAt: T1,
    createdBy: 'alice',
    comment: '',
    ...overrides,
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(body: string, status: number): Response {
  return new Response(body, { status });
}

/** Await a promise that is expected to reject and hand back the rejection. */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('expected promise to reject');
}
