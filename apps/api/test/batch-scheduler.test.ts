import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DEFAULT_BATCH_TUNING, type BatchTuning, type CaseFileRecord } from '@casevault/domain';
import { BatchScheduler } from '../src/services/case-images/batch-scheduler.js';
import type { CaseProcessor } from '../src/services/case-images/case-processor.js';
import { caseRecord, silentLogger } from './helpers.js';

const processCase = vi.fn<CaseProcessor['process']>();

const records = (n: number): CaseFileRecord[] =>
  Array.from({ length: n }, (_, i) => caseRecord({ caseId: `C${i + 1}`, demoFile: 'demo.pdf' }));

function scheduler(cores: number, tuning: BatchTuning = DEFAULT_BATCH_TUNING): BatchScheduler {
  return new BatchScheduler({ process: processCase }, tuning, () => cores, silentLogger);
}

beforeEach(() => {
  processCase.mockReset().mockImplementation(async (record: CaseFileRecord, workDir: string) => ({
    files: [`${workDir}/${record.caseId}/demo_demo.pdf`],
    errors: [],
    stats: { imagesCompressed: 0, pdfsCompressed: 1, compressionErrors: 0 },
  }));
});

describe('BatchScheduler', () => {
  it('merges files, errors and stats from every case', async () => {
    processCase.mockImplementation(async (record: CaseFileRecord) => ({
      files: record.caseId === 'C2' ? [] : [`/w/${record.caseId}.pdf`],
      errors: record.caseId === 'C2' ? ['Failed to download demo file for case C2: demo.pdf'] : [],
      stats: { imagesCompressed: 1, pdfsCompressed: 0, compressionErrors: record.caseId === 'C2' ? 1 : 0 },
    }));

    const result = await scheduler(8).run(records(3), '/w');

    expect(result.casesProcessed).toBe(3);
    expect(result.downloadedFiles.sort()).toEqual(['/w/C1.pdf', '/w/C3.pdf']);
    expect(result.downloadErrors).toEqual(['Failed to download demo file for case C2: demo.pdf']);
    expect(result.compressionStats).toEqual({ imagesCompressed: 3, pdfsCompressed: 0, compressionErrors: 1 });
  });

  it('records a crashed case and keeps processing the rest', async () => {
    processCase.mockImplementation(async (record: CaseFileRecord) => {
      if (record.caseId === 'C2') throw new Error('kaboom');
      return { files: [record.caseId], errors: [], stats: { imagesCompressed: 0, pdfsCompressed: 0, compressionErrors: 0 } };
    });

    const result = await scheduler(4).run(records(4), '/w');

    expect(result.casesProcessed).toBe(4);
    expect(result.downloadedFiles.sort()).toEqual(['C1', 'C3', 'C4']);
    expect(result.downloadErrors).toEqual(['Unexpected error processing case C2: kaboom']);
  });

  it('runs batches strictly one after another', async () => {
    const tuning: BatchTuning = {
      coreFraction: 1,
      maxCaseWorkers: 2,
      singleBatchMaxCases: 2,
      mediumBatchMaxCases: 4,
      mediumBatchSize: 3,
      largeBatchSize: 2,
    };
    const events: string[] = [];
    processCase.mockImplementation(async (record: CaseFileRecord) => {
      events.push(`start:${record.caseId}`);
      await new Promise(r => setTimeout(r, record.caseId === 'C1' ? 20 : 5));
      events.push(`end:${record.caseId}`);
      return { files: [], errors: [], stats: { imagesCompressed: 0, pdfsCompressed: 0, compressionErrors: 0 } };
    });

    const result = await scheduler(8, tuning).run(records(5), '/w');

    expect(result.casesProcessed).toBe(5);
    // batches of 2: [C1, C2], [C3, C4], [C5]
    expect(events.indexOf('start:C3')).toBeGreaterThan(events.indexOf('end:C1'));
    expect(events.indexOf('start:C3')).toBeGreaterThan(events.indexOf('end:C2'));
    expect(events.indexOf('start:C5')).toBeGreaterThan(events.indexOf('end:C4'));
    expect(events.slice(0, 2)).toEqual(['start:C1', 'start:C2']);
  });

  it('runs eleven cases as one batch on a 64-core host, capped at 24 workers', async () => {
    let active = 0;
    let peak = 0;
    processCase.mockImplementation(async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise(r => setTimeout(r, 10));
      active--;
      return { files: [], errors: [], stats: { imagesCompressed: 0, pdfsCompressed: 0, compressionErrors: 0 } };
    });

    const result = await scheduler(64).run(records(11), '/w');

    expect(result.casesProcessed).toBe(11);
    expect(peak).toBe(11);
  });

  it('bounds case concurrency by the computed worker count', async () => {
    let active = 0;
    let peak = 0;
    processCase.mockImplementation(async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise(r => setTimeout(r, 5));
      active--;
      return { files: [], errors: [], stats: { imagesCompressed: 0, pdfsCompressed: 0, compressionErrors: 0 } };
    });

    // 4 cores × 0.75 = 3 workers
    await scheduler(4).run(records(8), '/w');

    expect(peak).toBe(3);
  });

  it('hands each case its own directory even when names collide', async () => {
    const colliding = [
      caseRecord({ caseId: 'A', patientFirst: 'B', patientLast: 'C', demoFile: 'x.pdf' }),
      caseRecord({ caseId: 'A_B', patientFirst: 'C', demoFile: 'x.pdf' }),
    ];

    await scheduler(8).run(colliding, '/w');

    const directories = processCase.mock.calls.map(([record, , directoryName]) => [record.caseId, directoryName]);
    expect(directories.sort()).toEqual([
      ['A', 'A_B_C'],
      ['A_B', 'A_B_C_2'],
    ]);
  });

  it('returns an empty result for no cases', async () => {
    const result = await scheduler(8).run([], '/w');

    expect(result).toEqual({
      downloadedFiles: [],
      downloadErrors: [],
      compressionStats: { imagesCompressed: 0, pdfsCompressed: 0, compressionErrors: 0 },
      casesProcessed: 0,
    });
    expect(processCase).not.toHaveBeenCalled();
  });
});
