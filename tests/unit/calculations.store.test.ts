/**
 * Calculation Store Tests
 */

import {
  createCalculationRecord,
  MEMORY_STORE_MAX_RECORDS,
  MemoryCalculationStore,
  SupabaseCalculationStore
} from '../../src/services/calculations';
import { computeFence } from '../../src/calculations/fence';
import { getFallbackCatalog } from '../../src/services/pricing';
import { CalculationRecord, StandardFenceSpec } from '../../src/types';

interface MockResponse {
  data: unknown;
  error: { message: string } | null;
}

let mockResponse: MockResponse = { data: null, error: null };
const mockInserts: unknown[] = [];

jest.mock('../../src/services/database', () => {
  class MockQuery {
    select(): MockQuery {
      return this;
    }
    eq(): MockQuery {
      return this;
    }
    order(): MockQuery {
      return this;
    }
    limit(): MockQuery {
      return this;
    }
    maybeSingle(): MockQuery {
      return this;
    }
    insert(row: unknown): MockQuery {
      mockInserts.push(row);
      return this;
    }
    then<T>(resolve: (value: MockResponse) => T): Promise<T> {
      return Promise.resolve(mockResponse).then(resolve);
    }
  }

  return {
    isDatabaseConfigured: () => false,
    getSupabaseClient: () => ({ from: () => new MockQuery() })
  };
});

const spec: StandardFenceSpec = {
  fence_type: 'standard',
  fence_length: 100,
  post_spacing: 5,
  line_wire_count: 1,
  top_wire_count: 0,
  build_rate: 20,
  labor_rate: 55,
  batten_spacing_fraction: null
};

function makeRecord(): CalculationRecord {
  const result = computeFence(spec, getFallbackCatalog('Southland'));
  return createCalculationRecord(spec, result, 'Southland', { wire: 150 });
}

describe('Calculation Store', () => {
  describe('createCalculationRecord', () => {
    it('should stamp a unique id and creation time', () => {
      const first = makeRecord();
      const second = makeRecord();

      expect(first.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
      expect(first.id).not.toBe(second.id);
      expect(new Date(first.created_at).toISOString()).toBe(first.created_at);
      expect(first.region).toBe('Southland');
      expect(first.price_overrides).toEqual({ wire: 150 });
    });
  });

  describe('MemoryCalculationStore', () => {
    it('should return saved records by id', async () => {
      const store = new MemoryCalculationStore();
      const record = makeRecord();

      await store.save(record);

      expect(await store.get(record.id)).toEqual(record);
      expect(await store.get('missing')).toBeNull();
    });

    it('should list the most recent records first', async () => {
      const store = new MemoryCalculationStore();
      const records = [makeRecord(), makeRecord(), makeRecord()];
      for (const record of records) {
        await store.save(record);
      }

      const recent = await store.listRecent(2);

      expect(recent.map(r => r.id)).toEqual([records[2].id, records[1].id]);
    });

    it('should evict the oldest records beyond its capacity', async () => {
      const store = new MemoryCalculationStore(2);
      const [first, second, third] = [makeRecord(), makeRecord(), makeRecord()];
      for (const record of [first, second, third]) {
        await store.save(record);
      }

      expect(await store.get(first.id)).toBeNull();
      expect((await store.listRecent(10)).map(r => r.id)).toEqual([third.id, second.id]);
    });

    it('should treat a re-saved record as the newest', async () => {
      const store = new MemoryCalculationStore(2);
      const [first, second, third] = [makeRecord(), makeRecord(), makeRecord()];
      await store.save(first);
      await store.save(second);
      await store.save(first);
      await store.save(third);

      expect(await store.get(second.id)).toBeNull();
      expect((await store.listRecent(10)).map(r => r.id)).toEqual([third.id, first.id]);
    });

    it('should keep 500 records by default', () => {
      expect(MEMORY_STORE_MAX_RECORDS).toBe(500);
    });

    it('should forget everything on clear', async () => {
      const store = new MemoryCalculationStore();
      await store.save(makeRecord());

      store.clear();

      expect(await store.listRecent(10)).toEqual([]);
    });
  });

  describe('SupabaseCalculationStore', () => {
    beforeEach(() => {
      mockResponse = { data: null, error: null };
      mockInserts.length = 0;
    });

    it('should insert the record with its summary columns', async () => {
      const store = new SupabaseCalculationStore();
      const record = makeRecord();

      await store.save(record);

      expect(mockInserts).toEqual([{
        id: record.id,
        created_at: record.created_at,
        region: 'Southland',
        fence_type: 'standard',
        fence_length: 100,
        total_cost: 939.29,
        spec: record.spec,
        price_overrides: { wire: 150 },
        result: record.result
      }]);
    });

    it('should read a stored row back as a record', async () => {
      const store = new SupabaseCalculationStore();
      const record = makeRecord();
      mockResponse = { data: { ...record, fence_type: 'standard', total_cost: 939.29 }, error: null };

      expect(await store.get(record.id)).toEqual(record);
    });

    it('should return null for a missing row', async () => {
      const store = new SupabaseCalculationStore();

      expect(await store.get('missing')).toBeNull();
    });

    it('should skip unreadable rows when listing', async () => {
      const store = new SupabaseCalculationStore();
      const record = makeRecord();
      mockResponse = { data: [record, { id: 'broken' }], error: null };

      const recent = await store.listRecent(10);

      expect(recent.map(r => r.id)).toEqual([record.id]);
    });

    it('should surface database errors', async () => {
      const store = new SupabaseCalculationStore();
      mockResponse = { data: null, error: { message: 'permission denied' } };

      await expect(store.save(makeRecord())).rejects.toThrow('Failed to save calculation: permission denied');
    });
  });
});
