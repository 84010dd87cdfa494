/**
 * Environment Configuration
 */

import dotenv from 'dotenv';

dotenv.config();

function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    console.warn(`⚠️  Ignoring invalid ${name}="${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

export const config = {
  port: numberFromEnv('PORT', 3000),
  supabaseUrl: process.env.SUPABASE_URL,
  supabaseAnonKey: process.env.SUPABASE_ANON_KEY,
  defaultRegion: process.env.DEFAULT_REGION || 'Southland',
  currency: process.env.CURRENCY || 'NZD',
  laborRatePerHour: numberFromEnv('LABOR_RATE_PER_HOUR', 55),
  buildRateMetersPerHour: numberFromEnv('BUILD_RATE_METERS_PER_HOUR', 20)
} as const;

export type AppConfig = typeof config;
