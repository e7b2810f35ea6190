import fs from 'node:fs';
import path from 'node:path';
import { getLogger } from '../utils/logger.js';

const SHARD_NAME = /^(\d+)\.json$/;

interface Shard {
    /** Exclusive upper bound of the cited corpus ids held in the shard */
    bound: number;
    file: string;
}

/**
 * Read-only view over a sharded offline citation index.
 *
 * Each shard is a JSON object `{citedCorpusId: citingCorpusId[]}` named by
 * the zero-padded exclusive upper bound of the cited ids it holds, e.g.
 * `0001000000.json` holds every cited id below 1 000 000 not held by a
 * lower shard. Only the shard covering a lookup is read; up to
 * `maxLoadedShards` parsed shards stay in memory, least recently used first out.
 */
export class CorpusCitationIndex {
    private readonly shards: Shard[];
    private readonly loaded = new Map<number, Map<number, number[]>>();
    private readonly maxLoadedShards: number;
    private readonly logger = getLogger();

    constructor(
        readonly rootDir: string,
        options: { maxLoadedShards?: number } = {}
    ) {
        this.maxLoadedShards = Math.max(1, options.maxLoadedShards ?? 4);
        this.shards = fs
            .readdirSync(rootDir)
            .flatMap((name): Shard[] => {
                const match = SHARD_NAME.exec(name);
                return match?.[1] ? [{ bound: Number(match[1]), file: path.join(rootDir, name) }] : [];
            })
            .sort((a, b) => a.bound - b.bound);
        this.logger.debug({ rootDir, shards: this.shards.length }, 'Corpus citation index opened');
    }

    get shardCount(): number {
        return this.shards.length;
    }

    get loadedShardCount(): number {
        return this.loaded.size;
    }

    /**
     * Citing corpus ids for `corpusId`, or null when no shard covers it
     * or the shard has no entry for it.
     */
    getCitations(corpusId: number): Set<number> | null {
        const shard = this.shards.find((candidate) => corpusId < candidate.bound);
        if (!shard) return null;

        const citing = this.loadShard(shard).get(corpusId);
        return citing ? new Set(citing) : null;
    }

    private loadShard(shard: Shard): Map<number, number[]> {
        const cached = this.loaded.get(shard.bound);
        if (cached) {
            // Refresh recency
            this.loaded.delete(shard.bound);
            this.loaded.set(shard.bound, cached);
            return cached;
        }

        const started = Date.now();
        const data = new Map<number, number[]>();
        const raw: unknown = JSON.parse(fs.readFileSync(shard.file, 'utf-8'));
        if (typeof raw === 'object' && raw !== null && !Array.isArray(raw)) {
            for (const [cited, citing] of Object.entries(raw)) {
                if (!Array.isArray(citing)) continue;
                data.set(
                    Number(cited),
                    citing.filter((id): id is number => typeof id === 'number')
                );
            }
        } else {
            this.logger.warn({ file: shard.file }, 'Shard is not a JSON object, treating as empty');
        }

        this.loaded.set(shard.bound, data);
        while (this.loaded.size > this.maxLoadedShards) {
            const oldest = this.loaded.keys().next();
            if (oldest.done) break;
            this.loaded.delete(oldest.value);
        }
        this.logger.debug({ file: shard.file, entries: data.size, ms: Date.now() - started }, 'Loaded citation shard');
        return data;
    }
}
