/**
 * Database Health Check Tests
 */

import { checkDatabase, FENCE_TABLES, isDatabaseConfigured } from '../../src/services/database';

const mockTableErrors: Record<string, string> = {};
const mockCheckedTables: string[] = [];

jest.mock('../../src/config', () => ({
  config: { supabaseUrl: 'http://localhost:54321', supabaseAnonKey: 'test-anon-key' }
}));

jest.mock('@supabase/supabase-js', () => ({
  createClient: () => ({
    from: (table: string) => ({
      select: () => {
        mockCheckedTables.push(table);
        const message = mockTableErrors[table];
        return Promise.resolve(message ? { error: { message }, count: null } : { error: null, count: 0 });
      }
    })
  })
}));

describe('Database', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    mockCheckedTables.length = 0;
    for (const table of Object.keys(mockTableErrors)) {
      delete mockTableErrors[table];
    }
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should treat real credentials as configured', () => {
    expect(isDatabaseConfigured()).toBe(true);
  });

  it('should report a connection once every table answers', async () => {
    expect(await checkDatabase()).toEqual({
      configured: true,
      connected: true,
      message: 'Connected to Supabase'
    });
    expect(mockCheckedTables).toEqual([...FENCE_TABLES]);
  });

  it('should name the first table that fails', async () => {
    mockTableErrors.fence_calculations = 'relation does not exist';

    expect(await checkDatabase()).toEqual({
      configured: true,
      connected: false,
      message: 'Database configured but fence_calculations is unavailable: relation does not exist'
    });
    expect(console.error).toHaveBeenCalledWith('❌ Table fence_calculations check failed:', 'relation does not exist');
  });

  it('should stop at a failing materials table', async () => {
    mockTableErrors.materials = 'permission denied';

    const status = await checkDatabase();

    expect(status.message).toBe('Database configured but materials is unavailable: permission denied');
    expect(mockCheckedTables).toEqual(['materials']);
  });
});
