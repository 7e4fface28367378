import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { AppConfig } from "./config";

// Server-only admin client (bypasses RLS). Sessions are never persisted on
// the server.
export const createSupabaseAdmin = (
  config: Pick<AppConfig, "supabaseUrl" | "supabaseServiceRoleKey">
): SupabaseClient =>
  createClient(config.supabaseUrl, config.supabaseServiceRoleKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
  });
