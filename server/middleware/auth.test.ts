import jwt from 'jsonwebtoken';
import { describe, expect, it } from 'vitest';
import { issueToken } from './auth';

describe('issueToken', () => {
  it('signs the subject and role with an expiry', () => {
    const token = issueToken('test-secret', 'ops', 'viewer', 60);
    const payload = jwt.verify(token, 'test-secret');

    expect(payload).toMatchObject({ sub: 'ops', role: 'viewer' });
    if (typeof payload === 'string') throw new Error('expected an object payload');
    expect((payload.exp ?? 0) - (payload.iat ?? 0)).toBe(60);
  });

  it('defaults to an eight hour lifetime', () => {
    const payload = jwt.decode(issueToken('test-secret', 'ops', 'admin'));
    if (payload === null || typeof payload === 'string') throw new Error('expected an object payload');
    expect((payload.exp ?? 0) - (payload.iat ?? 0)).toBe(8 * 60 * 60);
  });
});
