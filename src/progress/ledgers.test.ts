import { describe, it, expect } from 'vitest';
import { CompletionEmissionLedger, ProcessedAssetLedger, ProcessedBatchEventLedger } from './ledgers.js';

describe('ProcessedAssetLedger', () => {
  it('should accept an asset once per job', () => {
    const ledger = new ProcessedAssetLedger();

    expect(ledger.markAndCheck('job-1', 'img_1')).toBe(true);
    expect(ledger.markAndCheck('job-1', 'img_1')).toBe(false);
    expect(ledger.markAndCheck('job-2', 'img_1')).toBe(true);
    expect(ledger.size).toBe(2);
  });

  it('should forget a single entry', () => {
    const ledger = new ProcessedAssetLedger();
    ledger.markAndCheck('job-1', 'img_1');

    ledger.forget('job-1', 'img_1');

    expect(ledger.has('job-1', 'img_1')).toBe(false);
    expect(ledger.markAndCheck('job-1', 'img_1')).toBe(true);
  });

  it('should clear one job without touching others', () => {
    const ledger = new ProcessedAssetLedger();
    ledger.markAndCheck('job-1', 'a');
    ledger.markAndCheck('job-1', 'b');
    ledger.markAndCheck('job-2', 'a');

    ledger.clearJob('job-1');

    expect(ledger.has('job-1', 'a')).toBe(false);
    expect(ledger.has('job-2', 'a')).toBe(true);
    expect(ledger.size).toBe(1);
  });
});

describe('ProcessedBatchEventLedger', () => {
  it('should reject a redelivered batch event', () => {
    const ledger = new ProcessedBatchEventLedger();

    expect(ledger.markAndCheck('job-1', 'evt-1')).toBe(true);
    expect(ledger.markAndCheck('job-1', 'evt-1')).toBe(false);
    expect(ledger.markAndCheck('job-1', 'evt-2')).toBe(true);
  });

  it('should empty on clear', () => {
    const ledger = new ProcessedBatchEventLedger();
    ledger.markAndCheck('job-1', 'evt-1');

    ledger.clear();

    expect(ledger.size).toBe(0);
  });
});

describe('CompletionEmissionLedger', () => {
  it('should grant a claim only once', () => {
    const ledger = new CompletionEmissionLedger();

    expect(ledger.claim('job-1', 'image', 'embeddings')).toBe(true);
    expect(ledger.claim('job-1', 'image', 'embeddings')).toBe(false);
    expect(ledger.claim('job-1', 'video', 'embeddings')).toBe(true);
  });

  it('should not confuse keys whose joined parts collide', () => {
    const ledger = new CompletionEmissionLedger();

    expect(ledger.claim('a:b', 'c')).toBe(true);
    expect(ledger.claim('a', 'b:c')).toBe(true);
    expect(ledger.size).toBe(2);
  });

  it('should allow a released claim to be taken again', () => {
    const ledger = new CompletionEmissionLedger();
    ledger.claim('job-1', 'products.images.masked.batch');

    ledger.release('job-1', 'products.images.masked.batch');

    expect(ledger.has('job-1', 'products.images.masked.batch')).toBe(false);
    expect(ledger.claim('job-1', 'products.images.masked.batch')).toBe(true);
  });
});
