import { describe, it, expect } from 'vitest';
import { createJob } from '../src/ingestion/types.js';

describe('createJob', () => {
  const classification = {
    fingerprint: 'a'.repeat(64),
    mime: { type: 'application', subtype: 'pdf', charset: 'binary' },
    classificationErrors: [{ stage: 'mime' as const, message: 'Failed to determine MIME type: boom' }],
  };

  it('mints a transaction id and ISO timestamp', () => {
    const job = createJob('/data/report.pdf', classification);

    expect(job.transactionId).toMatch(/^[0-9a-f-]{36}$/);
    expect(new Date(job.transactionTime).toISOString()).toBe(job.transactionTime);
    expect(job.fileReference).toBe('/data/report.pdf');
    expect(job.fingerprint).toBe(classification.fingerprint);
    expect(job.classificationErrors).toEqual(classification.classificationErrors);
  });

  it('gives every job its own transaction id', () => {
    expect(createJob('/a', classification).transactionId).not.toBe(createJob('/a', classification).transactionId);
  });

  it('returns a frozen job', () => {
    const job = createJob('/data/report.pdf', classification);

    expect(Object.isFrozen(job)).toBe(true);
    expect(Object.isFrozen(job.classificationErrors)).toBe(true);
  });
});
