/**
 * Request log.
 *
 * One row per bulk request in `request_logs`. Recording MUST NOT throw:
 * a failed insert is logged and dropped.
 */

import type { FastifyBaseLogger } from 'fastify';
import { query } from '../db/index.js';
import { errorMessage } from '../utils/errors.js';

export interface RequestLogEntry {
  userId: string | null;
  endpoint: string;
  method: string;
  requestPayload?: unknown;
  queryParams?: unknown;
  responseStatus: number;
  responsePayload?: unknown;
  executionTimeMs: number;
  errorMessage?: string | null;
  clientIp?: string | null;
}

export interface RequestLogger {
  record(entry: RequestLogEntry): Promise<void>;
}

function jsonOrNull(value: unknown): string | null {
  return value === undefined ? null : JSON.stringify(value);
}

export class RequestLogService implements RequestLogger {
  constructor(private readonly logger: FastifyBaseLogger) {}

  async record(entry: RequestLogEntry): Promise<void> {
    try {
      await query(
        `INSERT INTO request_logs
           (timestamp, user_id, endpoint, method, request_payload, query_params,
            response_status, response_payload, execution_time_ms, error_message, client_ip)
         VALUES (NOW(), $1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
        [
          entry.userId,
          entry.endpoint,
          entry.method,
          jsonOrNull(entry.requestPayload),
          jsonOrNull(entry.queryParams),
          entry.responseStatus,
          jsonOrNull(entry.responsePayload),
          Math.round(entry.executionTimeMs),
          entry.errorMessage ?? null,
          entry.clientIp ?? null,
        ]
      );
    } catch (err) {
      this.logger.warn(
        { code: 'REQUEST_LOG_WRITE_FAILED', endpoint: entry.endpoint, error: errorMessage(err) },
        'Failed to write request log'
      );
    }
  }
}
