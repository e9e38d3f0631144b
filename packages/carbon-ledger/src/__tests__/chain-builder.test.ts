import {
  CanonicalizationError,
  ChainHeadConflictError,
  PayloadValidationError,
  PeriodAlreadyAnchoredError,
  RecordAlreadySupersededError,
  RecordHashCollisionError,
  RecordNotFoundError
} from 'carbon-ledger-core';
import { LedgerStore, StoreBackend } from 'carbon-ledger-storage';
import { ChainBuilder, splitPayload } from '../chain-builder';
import { CarbonLedger } from '../ledger';
import { PartitionLock } from '../partition-lock';
import { BACKENDS, ManualClock, makeTempDir, openLedger, openStore, removeDir } from './helpers';

describe('splitPayload', () => {
  it('moves configured fields out of the hashed payload', () => {
    expect(splitPayload({ emissions_kg: 5, uncertainty_pct: 10 }, ['uncertainty_pct'])).toEqual({
      hashed: { emissions_kg: 5 },
      annotations: { uncertainty_pct: 10 }
    });
  });
});

describe('PartitionLock', () => {
  it('runs calls for one partition in arrival order', async () => {
    const lock = new PartitionLock();
    const order: string[] = [];
    const slow = lock.run('acme', async () => {
      await new Promise(resolve => setTimeout(resolve, 20));
      order.push('first');
    });
    const fast = lock.run('acme', async () => {
      order.push('second');
    });

    await Promise.all([slow, fast]);
    expect(order).toEqual(['first', 'second']);
    expect(lock.isIdle('acme')).toBe(true);
  });

  it('does not hold other partitions back', async () => {
    const lock = new PartitionLock();
    const order: string[] = [];
    const slow = lock.run('acme', async () => {
      await new Promise(resolve => setTimeout(resolve, 20));
      order.push('acme');
    });
    const other = lock.run('globex', async () => {
      order.push('globex');
    });

    await Promise.all([slow, other]);
    expect(order).toEqual(['globex', 'acme']);
  });

  it('keeps going after a failed call', async () => {
    const lock = new PartitionLock();
    await expect(lock.run('acme', async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(lock.run('acme', async () => 'next')).resolves.toBe('next');
  });
});

describe('ChainBuilder retries', () => {
  let dir: string;
  let store: LedgerStore;
  let builder: ChainBuilder;

  beforeEach(async () => {
    dir = makeTempDir('chain-builder');
    store = openStore('SQLITE', dir);
    await store.initialize();
    builder = new ChainBuilder(store, {
      maxRetries: 3,
      annotationFields: [],
      clock: () => new Date('2024-03-01T12:00:00.000Z')
    });
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await store.shutdown();
    removeDir(dir);
  });

  it('re-reads the head and retries after a conflict', async () => {
    const commit = jest.spyOn(store, 'commitRecord');
    commit.mockImplementationOnce(async () => {
      throw new ChainHeadConflictError('acme', null, 'f'.repeat(64));
    });

    const record = await builder.append('acme', { emissions_kg: 1 });

    expect(commit).toHaveBeenCalledTimes(2);
    expect(await store.getRecord(record.id)).toEqual(record);
  });

  it('gives up after the configured number of attempts', async () => {
    const commit = jest.spyOn(store, 'commitRecord').mockImplementation(async () => {
      throw new ChainHeadConflictError('acme', null, 'f'.repeat(64));
    });

    await expect(builder.append('acme', { emissions_kg: 1 })).rejects.toBeInstanceOf(ChainHeadConflictError);
    expect(commit).toHaveBeenCalledTimes(3);
  });

  it('retries with a fresh timestamp when the period was anchored first', async () => {
    const commit = jest.spyOn(store, 'commitRecord');
    commit.mockImplementationOnce(async () => {
      throw new PeriodAlreadyAnchoredError('acme', '2024-03-01');
    });

    const record = await builder.append('acme', { emissions_kg: 1 });

    expect(commit).toHaveBeenCalledTimes(2);
    expect(await store.getRecord(record.id)).toEqual(record);
  });

  it('does not retry a hash collision', async () => {
    const commit = jest.spyOn(store, 'commitRecord').mockImplementation(async () => {
      throw new RecordHashCollisionError('acme', 'a'.repeat(64));
    });

    await expect(builder.append('acme', { emissions_kg: 1 })).rejects.toBeInstanceOf(RecordHashCollisionError);
    expect(commit).toHaveBeenCalledTimes(1);
  });

  it('rejects a non-positive retry budget', () => {
    expect(() => new ChainBuilder(store, { maxRetries: 0, annotationFields: [], clock: () => new Date() })).toThrow(
      RangeError
    );
  });
});

describe.each(BACKENDS)('ChainBuilder through the ledger (%s)', (backend: StoreBackend) => {
  let dir: string;
  let clock: ManualClock;
  let ledger: CarbonLedger;

  beforeEach(async () => {
    dir = makeTempDir(`chain-${backend.toLowerCase()}`);
    clock = new ManualClock('2024-03-01T08:00:00.000Z');
    ledger = await openLedger(backend, dir, { clock: clock.now, defaultPartition: 'acme' });
  });

  afterEach(async () => {
    await ledger.shutdown();
    removeDir(dir);
  });

  describe('validation', () => {
    it('rejects reserved field names', async () => {
      await expect(ledger.appendRecord({ __supersedes: 'x', emissions_kg: 1 })).rejects.toThrow(
        'Reserved payload field(s): __supersedes'
      );
    });

    it('rejects values that cannot be canonicalized', async () => {
      await expect(ledger.appendRecord({ emissions_kg: NaN })).rejects.toBeInstanceOf(CanonicalizationError);
    });

    it('rejects invalid partition names', async () => {
      await expect(ledger.appendRecord({ emissions_kg: 1 }, { partition: '../other' })).rejects.toBeInstanceOf(
        PayloadValidationError
      );
    });

    it('rejects a payload made only of annotation fields', async () => {
      await expect(ledger.appendRecord({ uncertainty_pct: 5 })).rejects.toThrow('Payload has no hashed fields');
    });

    it('writes nothing for a rejected payload', async () => {
      await expect(ledger.appendRecord({ emissions_kg: Infinity })).rejects.toThrow();
      expect(await ledger.listRecords('acme')).toEqual([]);
    });
  });

  describe('stored payload', () => {
    it('keeps the payload as it was when the append was requested', async () => {
      const payload = { activity: 'diesel', inputs: { litres: 1 } };
      const pending = ledger.appendRecord(payload);
      payload.inputs.litres = 2;
      const record = await pending;

      expect(record.payload).toEqual({ activity: 'diesel', inputs: { litres: 1 } });
      expect((await ledger.getRecord(record.id)).payload).toEqual({ activity: 'diesel', inputs: { litres: 1 } });
      expect(await ledger.verifyRecord(record.id)).toEqual({ ok: true, checked: 1 });
    });

    it('does not hand the stored payload back to the caller', async () => {
      const payload = { activity: 'diesel', inputs: { litres: 1 } };
      const record = await ledger.appendRecord(payload);

      expect(record.payload).not.toBe(payload);
      expect(record.payload.inputs).not.toBe(payload.inputs);
    });
  });

  describe('amend', () => {
    it('appends a superseding record and leaves the original alone', async () => {
      const original = await ledger.appendRecord({ activity: 'diesel', emissions_kg: 100 });
      clock.advance(1000);

      const amended = await ledger.amendRecord(original.id, { activity: 'diesel', emissions_kg: 110 });

      expect(amended.supersedes).toBe(original.id);
      expect(amended.payload).toEqual({ activity: 'diesel', emissions_kg: 110, __supersedes: original.id });
      expect(amended.previousHash).toBe(original.recordHash);
      expect(amended.partition).toBe('acme');
      expect(await ledger.getRecord(original.id)).toEqual(original);
      expect((await ledger.verifyChain('acme')).ok).toBe(true);
    });

    it('keeps the original partition', async () => {
      const original = await ledger.appendRecord({ emissions_kg: 5 }, { partition: 'plant-north' });
      const amended = await ledger.amendRecord(original.id, { emissions_kg: 6 });
      expect(amended.partition).toBe('plant-north');
      expect(amended.sequence).toBe(2);
    });

    it('only amends the latest revision', async () => {
      const original = await ledger.appendRecord({ emissions_kg: 100 });
      const second = await ledger.amendRecord(original.id, { emissions_kg: 110 });

      await expect(ledger.amendRecord(original.id, { emissions_kg: 120 })).rejects.toBeInstanceOf(
        RecordAlreadySupersededError
      );

      const third = await ledger.amendRecord(second.id, { emissions_kg: 120 });
      expect((await ledger.listRevisions(original.id)).map(record => record.id)).toEqual([
        original.id,
        second.id,
        third.id
      ]);
      expect((await ledger.listRevisions(third.id)).map(record => record.id)).toEqual([
        original.id,
        second.id,
        third.id
      ]);
    });

    it('fails for an unknown record', async () => {
      await expect(ledger.amendRecord('missing', { emissions_kg: 1 })).rejects.toBeInstanceOf(RecordNotFoundError);
    });
  });

  describe('annotations', () => {
    it('keeps annotation fields out of the hash', async () => {
      const record = await ledger.appendRecord({ emissions_kg: 100, uncertainty_pct: 5 });

      expect(record.payload).toEqual({ emissions_kg: 100 });
      expect(await ledger.getAnnotations(record.id)).toEqual({
        recordId: record.id,
        fields: { uncertainty_pct: 5 },
        entries: [{ recordId: record.id, fields: { uncertainty_pct: 5 }, createdAt: '2024-03-01T08:00:00.000Z' }]
      });
    });

    it('merges later annotations over earlier ones without touching the hash', async () => {
      const record = await ledger.appendRecord({ emissions_kg: 100, uncertainty_pct: 5 });
      clock.advance(60_000);

      await ledger.annotateRecord(record.id, { uncertainty_pct: 3, quality_flags: ['estimated'] });

      const annotations = await ledger.getAnnotations(record.id);
      expect(annotations.fields).toEqual({ uncertainty_pct: 3, quality_flags: ['estimated'] });
      expect(annotations.entries).toHaveLength(2);
      expect(annotations.entries[1].createdAt).toBe('2024-03-01T08:01:00.000Z');
      expect((await ledger.verifyRecord(record.id)).ok).toBe(true);
    });

    it('only accepts configured annotation fields', async () => {
      const record = await ledger.appendRecord({ emissions_kg: 100 });
      await expect(ledger.annotateRecord(record.id, { emissions_kg: 1 })).rejects.toThrow(
        'Not annotation field(s): emissions_kg'
      );
      await expect(ledger.annotateRecord(record.id, {})).rejects.toThrow('Annotation has no fields');
    });

    it('fails for an unknown record', async () => {
      await expect(ledger.annotateRecord('missing', { uncertainty_pct: 1 })).rejects.toBeInstanceOf(
        RecordNotFoundError
      );
    });
  });

  describe('concurrency', () => {
    it('chains concurrent appends to one partition without sharing a predecessor', async () => {
      const count = 20;
      await Promise.all(
        Array.from({ length: count }, (_, index) => ledger.appendRecord({ reading: index }))
      );

      const records = await ledger.listRecords('acme');
      expect(records).toHaveLength(count);
      expect(records.map(record => record.sequence)).toEqual(Array.from({ length: count }, (_, i) => i + 1));
      expect(new Set(records.map(record => record.previousHash)).size).toBe(count);
      records.slice(1).forEach((record, index) => {
        expect(record.previousHash).toBe(records[index].recordHash);
      });
      expect(await ledger.verifyChain('acme')).toEqual({ ok: true, checked: count });
    });

    it('lets two ledger instances share one store', async () => {
      const other = await openLedger(backend, dir, {
        clock: clock.now,
        defaultPartition: 'acme',
        appendMaxRetries: 100
      });
      const replica = await openLedger(backend, dir, {
        clock: clock.now,
        defaultPartition: 'acme',
        appendMaxRetries: 100
      });

      try {
        const writes = Array.from({ length: 10 }, (_, index) => [
          other.appendRecord({ writer: 'a', index }),
          replica.appendRecord({ writer: 'b', index })
        ]).flat();
        await Promise.all(writes);

        expect(await ledger.listRecords('acme')).toHaveLength(20);
        expect(await ledger.verifyChain('acme')).toEqual({ ok: true, checked: 20 });
      } finally {
        await other.shutdown();
        await replica.shutdown();
      }
    });
  });
});
