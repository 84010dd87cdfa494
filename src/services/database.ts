/**
 * Supabase Database Client
 * Backs the regional price list (materials) and the calculation history
 * (fence_calculations).
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { config } from '../config';

export const FENCE_TABLES = ['materials', 'fence_calculations'] as const;

export type FenceTable = typeof FENCE_TABLES[number];

export interface DatabaseStatus {
  configured: boolean;
  connected: boolean;
  message: string;
}

// Values shipped in .env.example
const PLACEHOLDER_CREDENTIALS = ['your_supabase_url_here', 'your_supabase_anon_key_here'];

let supabaseClient: SupabaseClient | null = null;

function isRealCredential(value: string | undefined): value is string {
  return !!value && !PLACEHOLDER_CREDENTIALS.includes(value);
}

export function isDatabaseConfigured(): boolean {
  return isRealCredential(config.supabaseUrl) && isRealCredential(config.supabaseAnonKey);
}

export function getSupabaseClient(): SupabaseClient {
  if (!supabaseClient) {
    const { supabaseUrl, supabaseAnonKey } = config;
    if (!isRealCredential(supabaseUrl) || !isRealCredential(supabaseAnonKey)) {
      throw new Error('Missing Supabase credentials in environment variables');
    }
    // Server-side use only: no auth session to persist
    supabaseClient = createClient(supabaseUrl, supabaseAnonKey, {
      auth: { persistSession: false }
    });
  }
  return supabaseClient;
}

/**
 * Check each table the service reads or writes. Returns the first failure.
 */
export async function checkDatabase(): Promise<DatabaseStatus> {
  if (!isDatabaseConfigured()) {
    return {
      configured: false,
      connected: false,
      message: 'Database not configured - using fallback pricing and in-memory storage'
    };
  }

  try {
    const client = getSupabaseClient();
    for (const table of FENCE_TABLES) {
      const { error } = await client.from(table).select('*', { count: 'exact', head: true });
      if (error) {
        console.error(`❌ Table ${table} check failed:`, error.message);
        return {
          configured: true,
          connected: false,
          message: `Database configured but ${table} is unavailable: ${error.message}`
        };
      }
    }
    return { configured: true, connected: true, message: 'Connected to Supabase' };
  } catch (err) {
    console.error('❌ Database connection error:', err);
    return { configured: true, connected: false, message: 'Database configured but connection failed' };
  }
}
