/**
 * Admin compression-mode setting.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { configureApp } from '../src/app.js';
import { RuntimeSettings } from '../src/services/runtime-settings.service.js';
import { EMPTY_SECRETS_STATS } from './helpers.js';

const getRoleLevel = vi.fn<(userId: string) => Promise<number | null>>();

let app: FastifyInstance;
let settings: RuntimeSettings;

const URL_BASE = '/api/admin/settings/compression-mode';

beforeEach(async () => {
  getRoleLevel.mockReset().mockImplementation(async userId => (userId === 'admin-1' ? 10 : 3));
  settings = new RuntimeSettings('standard');
  app = await configureApp(Fastify(), {
    caseImages: { createArchive: vi.fn() },
    settings,
    users: { getRoleLevel },
    secrets: { stats: () => EMPTY_SECRETS_STATS },
    awsRegion: 'us-east-1',
    minRoleLevel: 10,
    corsOrigin: 'http://localhost:3000',
  });
  await app.ready();
});

afterEach(async () => {
  await app.close();
});

describe('GET /api/admin/settings/compression-mode', () => {
  it('returns the current mode to admins', async () => {
    const res = await app.inject({ method: 'GET', url: `${URL_BASE}?user_id=admin-1` });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ data: { mode: 'standard' } });
    expect(getRoleLevel).toHaveBeenCalledWith('admin-1');
  });

  it('forbids callers below the admin level', async () => {
    const res = await app.inject({ method: 'GET', url: `${URL_BASE}?user_id=clerk-1` });

    expect(res.statusCode).toBe(403);
    expect(res.json()).toEqual({
      detail: 'User does not have permission to perform this action.',
      code: 'FORBIDDEN',
    });
  });

  it('requires user_id', async () => {
    const res = await app.inject({ method: 'GET', url: URL_BASE });

    expect(res.statusCode).toBe(400);
    expect(res.json().code).toBe('VALIDATION_ERROR');
    expect(getRoleLevel).not.toHaveBeenCalled();
  });
});

describe('PUT /api/admin/settings/compression-mode', () => {
  it('switches the mode for subsequent reads', async () => {
    const res = await app.inject({
      method: 'PUT',
      url: `${URL_BASE}?user_id=admin-1`,
      payload: { mode: 'aggressive' },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ data: { mode: 'aggressive' } });
    expect(settings.getCompressionMode()).toBe('aggressive');
  });

  it('rejects unknown modes and keeps the current one', async () => {
    const res = await app.inject({
      method: 'PUT',
      url: `${URL_BASE}?user_id=admin-1`,
      payload: { mode: 'extreme' },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().code).toBe('VALIDATION_ERROR');
    expect(settings.getCompressionMode()).toBe('standard');
  });

  it('does not let non-admins change the mode', async () => {
    const res = await app.inject({
      method: 'PUT',
      url: `${URL_BASE}?user_id=clerk-1`,
      payload: { mode: 'aggressive' },
    });

    expect(res.statusCode).toBe(403);
    expect(settings.getCompressionMode()).toBe('standard');
  });
});
