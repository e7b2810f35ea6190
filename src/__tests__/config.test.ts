import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DEFAULT_CACHE_DIR, resolveConfig } from '../utils/config.js';

describe('resolveConfig', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'citecache-config-'));
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should fall back to defaults', async () => {
        const config = await resolveConfig({}, { searchFrom: tmpDir, env: {} });
        expect(config.cacheDir).toBe(DEFAULT_CACHE_DIR);
        expect(config.backend).toBe('sqlite');
        expect(config.tolerance).toBe(10);
        expect(config.data.citations.limit).toBe(100);
        expect(config.apiKey).toBeUndefined();
    });

    it('should deep-merge nested groups from the config file', async () => {
        fs.writeFileSync(
            path.join(tmpDir, 'citecache.config.json'),
            JSON.stringify({ backend: 'jsonl', data: { citations: { limit: 50 } }, retry: { maxAttempts: 2 } })
        );

        const config = await resolveConfig({}, { searchFrom: tmpDir, env: {} });
        expect(config.backend).toBe('jsonl');
        expect(config.data.citations.limit).toBe(50);
        expect(config.data.references.limit).toBe(100);
        expect(config.retry).toEqual({ maxAttempts: 2, minBackoffMs: 1000, maxBackoffMs: 5000 });
    });

    it('should read YAML rc files', async () => {
        fs.writeFileSync(path.join(tmpDir, '.citecacherc.yaml'), 'tolerance: 3\nbatchSize: 8\n');

        const config = await resolveConfig({}, { searchFrom: tmpDir, env: {} });
        expect(config.tolerance).toBe(3);
        expect(config.batchSize).toBe(8);
    });

    it('should apply overrides over environment over file', async () => {
        fs.writeFileSync(
            path.join(tmpDir, 'citecache.config.json'),
            JSON.stringify({ cacheDir: '/from/file', apiKey: 'file-key', tolerance: 4 })
        );

        const config = await resolveConfig(
            { cacheDir: '/from/overrides' },
            { searchFrom: tmpDir, env: { S2_API_KEY: 'test-secret', CITECACHE_DIR: '/from/env', CITECACHE_LOG_LEVEL: 'warn' } }
        );
        expect(config.cacheDir).toBe('/from/overrides');
        expect(config.apiKey).toBe('test-secret');
        expect(config.tolerance).toBe(4);
        expect(config.logLevel).toBe('warn');
    });

    it('should load an explicit config file', async () => {
        const file = path.join(tmpDir, 'custom.json');
        fs.writeFileSync(file, JSON.stringify({ maxLoadedShards: 2 }));

        const config = await resolveConfig({}, { configFile: file, env: {} });
        expect(config.maxLoadedShards).toBe(2);
    });

    it('should reject invalid config files', async () => {
        fs.writeFileSync(path.join(tmpDir, 'citecache.config.json'), JSON.stringify({ backend: 'redis' }));

        await expect(resolveConfig({}, { searchFrom: tmpDir, env: {} })).rejects.toThrow(/Invalid config file/);
    });
});
