import { describe, it, expect, vi } from 'vitest';
import pino from 'pino';
import type { WebClient, UsersInfoResponse } from '@slack/web-api';
import { resolveUserDisplayName } from './users.js';

const logger = pino({ level: 'silent' });

function createMockClient(info: () => Promise<Partial<UsersInfoResponse>>): WebClient {
  return {
    users: { info: vi.fn(info) },
  } as unknown as WebClient;
}

describe('resolveUserDisplayName', () => {
  it('prefers the profile display name', async () => {
    const client = createMockClient(async () => ({
      ok: true,
      user: { id: 'U1', real_name: 'Alice Liddell', profile: { display_name: 'Alice', real_name: 'Alice Liddell' } },
    }));

    await expect(resolveUserDisplayName('U1', client, logger)).resolves.toBe('Alice');
    expect(vi.mocked(client.users.info)).toHaveBeenCalledWith({ user: 'U1' });
  });

  it('falls back to the profile real name when the display name is blank', async () => {
    const client = createMockClient(async () => ({
      ok: true,
      user: { id: 'U2', profile: { display_name: '  ', real_name: 'Bob Builder' } },
    }));

    await expect(resolveUserDisplayName('U2', client, logger)).resolves.toBe('Bob Builder');
  });

  it('falls back to the account real name', async () => {
    const client = createMockClient(async () => ({
      ok: true,
      user: { id: 'U3', real_name: 'Carol', profile: {} },
    }));

    await expect(resolveUserDisplayName('U3', client, logger)).resolves.toBe('Carol');
  });

  it('returns the raw user id when no name is present', async () => {
    const client = createMockClient(async () => ({ ok: true, user: { id: 'U4' } }));

    await expect(resolveUserDisplayName('U4', client, logger)).resolves.toBe('U4');
  });

  it('returns the raw user id and logs when the lookup fails', async () => {
    const client = createMockClient(async () => {
      throw new Error('An API error occurred: user_not_found');
    });
    const warn = vi.spyOn(logger, 'warn');

    await expect(resolveUserDisplayName('U5', client, logger)).resolves.toBe('U5');
    expect(warn).toHaveBeenCalledWith(
      { user: 'U5', err: 'An API error occurred: user_not_found' },
      'User lookup failed, using raw user id',
    );
  });
});
