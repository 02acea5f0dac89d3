import { DATA_DIR } from './config.js';
import logger from './logger.js';
import { FileRecordStore, SupabaseRecordStore, type RecordStore } from './record-store.js';
import { getSupabaseAdmin, isSupabaseConfigured } from './supabase.js';

function createStore(): RecordStore {
  if (isSupabaseConfigured()) {
    logger.info('Record store: Supabase');
    return new SupabaseRecordStore(getSupabaseAdmin());
  }
  logger.info({ dir: DATA_DIR }, 'Record store: JSON files (Supabase not configured)');
  return new FileRecordStore(DATA_DIR);
}

/** Process-wide record store, selected by whether Supabase credentials are present */
export const store: RecordStore = createStore();
