import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createClient } from '@supabase/supabase-js';
import { getSupabase, resetSupabase } from './supabase';

vi.mock('@supabase/supabase-js', () => ({
  createClient: vi.fn(() => ({ channel: vi.fn() })),
}));

describe('supabase', () => {
  beforeEach(() => {
    resetSupabase();
    vi.mocked(createClient).mockClear();
  });

  afterEach(() => {
    delete process.env.SUPABASE_URL;
    delete process.env.SUPABASE_SERVICE_ROLE_KEY;
    delete process.env.SUPABASE_ANON_KEY;
    resetSupabase();
  });

  it('throws when the environment is missing', () => {
    expect(() => getSupabase()).toThrow('Missing Supabase environment variables');
  });

  it('creates the client once with the anon key as fallback', () => {
    process.env.SUPABASE_URL = 'http://localhost:54321';
    process.env.SUPABASE_ANON_KEY = 'test-anon-key';

    const first = getSupabase();
    const second = getSupabase();

    expect(first).toBe(second);
    expect(createClient).toHaveBeenCalledTimes(1);
    expect(createClient).toHaveBeenCalledWith('http://localhost:54321', 'test-anon-key', {
      auth: { autoRefreshToken: false, persistSession: false },
    });
  });

  it('prefers the service role key', () => {
    process.env.SUPABASE_URL = 'http://localhost:54321';
    process.env.SUPABASE_ANON_KEY = 'test-anon-key';
    process.env.SUPABASE_SERVICE_ROLE_KEY = 'test-service-key';

    getSupabase();

    expect(vi.mocked(createClient).mock.calls[0][1]).toBe('test-service-key');
  });
});
