import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { QueryResult, QueryResultRow } from 'pg';

const mockQuery = vi.fn<(text: string, params?: unknown[]) => Promise<QueryResult<QueryResultRow>>>();

vi.mock('../src/db/index.js', () => ({
  query: (text: string, params?: unknown[]) => mockQuery(text, params),
}));

const { RequestLogService } = await import('../src/services/request-log.service.js');
const { silentLogger } = await import('./helpers.js');

function emptyResult(): QueryResult<QueryResultRow> {
  return { rows: [], rowCount: 1, command: 'INSERT', oid: 0, fields: [] };
}

beforeEach(() => {
  mockQuery.mockReset().mockResolvedValue(emptyResult());
});

describe('RequestLogService.record', () => {
  it('inserts one row with JSON-encoded payloads', async () => {
    await new RequestLogService(silentLogger).record({
      userId: 'admin-1',
      endpoint: '/api/backoffice/case-images',
      method: 'POST',
      requestPayload: { case_ids: ['A', 'B'] },
      responseStatus: 200,
      responsePayload: { cases_requested: 2 },
      executionTimeMs: 1234.6,
      clientIp: '10.0.0.5',
    });

    expect(mockQuery).toHaveBeenCalledTimes(1);
    const [sql, params] = mockQuery.mock.calls[0];
    expect(sql).toContain('INSERT INTO request_logs');
    expect(params).toEqual([
      'admin-1',
      '/api/backoffice/case-images',
      'POST',
      '{"case_ids":["A","B"]}',
      null,
      200,
      '{"cases_requested":2}',
      1235,
      null,
      '10.0.0.5',
    ]);
  });

  it('swallows insert failures', async () => {
    mockQuery.mockRejectedValueOnce(new Error('relation "request_logs" does not exist'));
    const warn = vi.spyOn(silentLogger, 'warn');

    await expect(
      new RequestLogService(silentLogger).record({
        userId: null,
        endpoint: '/api/backoffice/case-images',
        method: 'POST',
        responseStatus: 500,
        executionTimeMs: 10,
        errorMessage: 'Failed to create case images archive',
      }),
    ).resolves.toBeUndefined();

    expect(warn).toHaveBeenCalledWith(
      {
        code: 'REQUEST_LOG_WRITE_FAILED',
        endpoint: '/api/backoffice/case-images',
        error: 'relation "request_logs" does not exist',
      },
      'Failed to write request log',
    );
    warn.mockRestore();
  });
});
