// ============================================
// Supabase client: shared by the record store and vector search
// ============================================

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { config } from "../config/env.js";

export const supabase: SupabaseClient = createClient(
  config.supabase.url,
  config.supabase.serviceRoleKey,
  {
    auth: { persistSession: false, autoRefreshToken: false },
  }
);
