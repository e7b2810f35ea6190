import fs from 'node:fs';
import type { CacheConfig, RecordStore } from '../types/index.js';
import { JsonlRecordStore } from './jsonl-store.js';
import { SqliteRecordStore } from './sqlite-store.js';

/**
 * Open the record store selected by `config.backend` under `config.cacheDir`.
 * The directory must already exist.
 */
export function createRecordStore(config: Pick<CacheConfig, 'cacheDir' | 'backend'>): RecordStore {
    if (!fs.existsSync(config.cacheDir)) {
        throw new Error(`Cache directory does not exist: ${config.cacheDir}`);
    }
    switch (config.backend) {
        case 'jsonl':
            return new JsonlRecordStore(config.cacheDir);
        case 'sqlite':
            return new SqliteRecordStore(config.cacheDir);
    }
}
