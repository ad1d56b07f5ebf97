/**
 * @ideagate/db
 * Database client and repositories for the decision archive, cache and strategy passages
 */

// Supabase client
export {
  createSupabaseClient,
  isSupabaseConfigured,
  testConnection,
  type SupabaseSettings,
} from "./supabase.js";

export { DatabaseError, toDatabaseError, type PostgrestErrorLike } from "./errors.js";

// Types
export * from "./types.js";

// Repositories
export * from "./repositories/index.js";
