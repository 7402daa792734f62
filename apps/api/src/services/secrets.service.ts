/**
 * Secrets Cache
 *
 * JSON secrets from AWS Secrets Manager, cached per name for a TTL.
 * Concurrent lookups of the same uncached secret share one AWS call.
 */

import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import { errorMessage } from '../utils/errors.js';

const SecretPayload = z.record(z.unknown());
export type SecretPayload = z.infer<typeof SecretPayload>;

interface CacheEntry {
  value: SecretPayload;
  fetchedAt: number;
  expiresAt: number;
}

export type SecretsCacheStatus = 'empty' | 'very_fresh' | 'healthy' | 'aging' | 'stale';

export interface SecretsCacheStats {
  cachedSecrets: number;
  hits: number;
  misses: number;
  oldestAgeSeconds: number | null;
  newestAgeSeconds: number | null;
  status: SecretsCacheStatus;
}

/**
 * Freshness from the mean of the oldest and newest entry ages, as a share
 * of the default TTL: under 20% very fresh, under 60% healthy, under 100%
 * aging, otherwise stale.
 */
export function secretsCacheStatus(oldestAgeSeconds: number | null, newestAgeSeconds: number | null, ttlSeconds: number): SecretsCacheStatus {
  if (oldestAgeSeconds === null || newestAgeSeconds === null) {
    return 'empty';
  }
  const share = (oldestAgeSeconds + newestAgeSeconds) / 2 / ttlSeconds;
  if (share < 0.2) return 'very_fresh';
  if (share < 0.6) return 'healthy';
  if (share < 1) return 'aging';
  return 'stale';
}

export class SecretsCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly inFlight = new Map<string, Promise<SecretPayload>>();
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly client: SecretsManagerClient,
    private readonly logger: FastifyBaseLogger,
    private readonly defaultTtlSeconds = 300,
    private readonly now: () => number = Date.now,
  ) {}

  async getSecret(name: string, ttlSeconds = this.defaultTtlSeconds): Promise<SecretPayload> {
    const cached = this.entries.get(name);
    if (cached && cached.expiresAt > this.now()) {
      this.hits++;
      return cached.value;
    }

    const pending = this.inFlight.get(name);
    if (pending) {
      this.hits++;
      return pending;
    }

    this.misses++;
    const fetch = this.fetchSecret(name)
      .then(value => {
        const fetchedAt = this.now();
        this.entries.set(name, { value, fetchedAt, expiresAt: fetchedAt + ttlSeconds * 1000 });
        return value;
      })
      .finally(() => {
        this.inFlight.delete(name);
      });
    this.inFlight.set(name, fetch);
    return fetch;
  }

  stats(): SecretsCacheStats {
    const now = this.now();
    const ages = [...this.entries.values()].map(entry => (now - entry.fetchedAt) / 1000);
    const oldestAgeSeconds = ages.length > 0 ? Math.max(...ages) : null;
    const newestAgeSeconds = ages.length > 0 ? Math.min(...ages) : null;
    return {
      cachedSecrets: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      oldestAgeSeconds,
      newestAgeSeconds,
      status: secretsCacheStatus(oldestAgeSeconds, newestAgeSeconds, this.defaultTtlSeconds),
    };
  }

  private async fetchSecret(name: string): Promise<SecretPayload> {
    let secretString: string | undefined;
    try {
      const response = await this.client.send(new GetSecretValueCommand({ SecretId: name }));
      secretString = response.SecretString;
    } catch (err) {
      this.logger.error({ code: 'SECRET_FETCH_FAILED', secretName: name, error: errorMessage(err) }, 'Failed to fetch secret');
      throw err;
    }

    if (secretString === undefined) {
      this.logger.error({ code: 'SECRET_NOT_STRING', secretName: name }, 'Secret has no string value');
      throw new Error(`Secret ${name} has no string value`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(secretString);
    } catch (err) {
      this.logger.error({ code: 'SECRET_NOT_JSON', secretName: name }, 'Secret is not valid JSON');
      throw new Error(`Secret ${name} is not valid JSON`, { cause: err });
    }

    const payload = SecretPayload.safeParse(parsed);
    if (!payload.success) {
      this.logger.error({ code: 'SECRET_NOT_JSON', secretName: name }, 'Secret is not a JSON object');
      throw new Error(`Secret ${name} is not a JSON object`);
    }
    return payload.data;
  }
}
