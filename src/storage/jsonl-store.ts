import fs from 'node:fs';
import path from 'node:path';
import { entryFromDetails, normalizeEntry } from '../metadata/entry.js';
import { mergeCitations, mergeReferences } from '../merge/edge-merge.js';
import { parseStoredRecord } from '../sources/schema.js';
import type { MetadataEntry, PaperData, RecordStore, StoredMetadata } from '../types/index.js';
import { CacheError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { groupByCorpusId } from './groups.js';

export const METADATA_FILE = 'metadata.jsonl';
export const DUPLICATES_FILE = 'duplicates.csv';
export const PAPERS_DIR = 'papers';

/**
 * File-backed record store.
 *
 * Layout under the root directory:
 * - `papers/<paperId>.json`: one record per canonical key
 * - `metadata.jsonl`: one `{key: entry}` object per line, appended on update
 * - `duplicates.csv`: one `key:canonical` pair per line, appended on update
 *
 * Later lines win over earlier ones for the same key.
 */
export class JsonlRecordStore implements RecordStore {
    readonly backend = 'jsonl' as const;
    private readonly logger = getLogger();
    private readonly papersDir: string;

    constructor(private readonly rootDir: string) {
        this.papersDir = path.join(rootDir, PAPERS_DIR);
        fs.mkdirSync(this.papersDir, { recursive: true });
        this.logger.debug({ rootDir }, 'JSONL store opened');
    }

    get metadataFile(): string {
        return path.join(this.rootDir, METADATA_FILE);
    }

    get duplicatesFile(): string {
        return path.join(this.rootDir, DUPLICATES_FILE);
    }

    get(key: string): PaperData | null {
        const file = this.paperFile(key);
        if (file === null || !fs.existsSync(file)) return null;

        let raw: unknown;
        try {
            raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
        } catch (error) {
            const err = new CacheError('StorageCorrupt', `Unreadable record file for ${key}`, error);
            this.logger.warn({ key, err }, 'Corrupt stored record');
            return null;
        }
        const record = parseStoredRecord(raw);
        if (record === null) {
            const err = new CacheError('StorageCorrupt', `Malformed record for ${key}`);
            this.logger.warn({ key, err }, 'Corrupt stored record');
        }
        return record;
    }

    put(key: string, data: PaperData, discardExisting: boolean): void {
        const file = this.paperFile(key);
        if (file === null) {
            throw new Error(`Refusing to store record under unsafe key: ${key}`);
        }

        let record = data;
        if (!discardExisting) {
            const existing = this.get(key);
            if (existing) {
                record = {
                    details: data.details,
                    citations: mergeCitations(existing.citations, data.citations),
                    references: mergeReferences(existing.references, data.references),
                };
            }
        }

        // Write then rename so a crash never leaves a half-written record
        const tmp = `${file}.tmp`;
        fs.writeFileSync(tmp, JSON.stringify(record));
        fs.renameSync(tmp, file);
        this.logger.debug({ key, citations: record.citations.data.length }, 'Stored record');
    }

    delete(key: string): boolean {
        const file = this.paperFile(key);
        const existed = file !== null && fs.existsSync(file);
        if (file !== null && existed) fs.unlinkSync(file);

        const { entries } = this.loadMetadataIndex();
        const kept = entries.filter(([k]) => k !== key);
        if (kept.length !== entries.length) this.writeMetadata(kept);

        const duplicates = this.loadDuplicates();
        if (duplicates.delete(key)) this.writeDuplicates(duplicates);
        return existed;
    }

    loadMetadataIndex(): StoredMetadata {
        const entries = new Map<string, MetadataEntry>();
        let repaired = false;

        if (fs.existsSync(this.metadataFile)) {
            const lines = fs.readFileSync(this.metadataFile, 'utf-8').split('\n');
            for (const [lineNo, line] of lines.entries()) {
                if (!line.trim()) continue;
                const parsed = this.parseMetadataLine(line);
                if (parsed === null) {
                    this.logger.warn({ file: this.metadataFile, line: lineNo + 1 }, 'Skipping unreadable metadata line');
                    repaired = true;
                    continue;
                }
                for (const [key, entry, wasRepaired] of parsed) {
                    if (entries.has(key)) {
                        // Keep first-seen order for the key, latest value
                        repaired = true;
                    }
                    repaired ||= wasRepaired;
                    entries.set(key, entry);
                }
            }
        } else {
            this.logger.debug({ file: this.metadataFile }, 'No metadata file, starting empty');
        }

        const list = [...entries];
        if (repaired) {
            this.logger.info({ file: this.metadataFile, entries: list.length }, 'Rewriting repaired metadata file');
            this.writeMetadata(list);
        }

        return {
            entries: list,
            knownDuplicates: this.loadDuplicates(),
            inferredGroups: groupByCorpusId(list),
        };
    }

    appendMetadata(key: string, entry: MetadataEntry): void {
        fs.appendFileSync(this.metadataFile, `${JSON.stringify({ [key]: entry })}\n`);
    }

    rebuildMetadataIndex(): Array<[string, MetadataEntry]> {
        const entries: Array<[string, MetadataEntry]> = [];
        for (const key of this.keys()) {
            const record = this.get(key);
            if (record === null) {
                this.logger.warn({ key }, 'Skipping unreadable record during rebuild');
                continue;
            }
            entries.push([key, entryFromDetails(record.details)]);
        }
        this.writeMetadata(entries);
        this.logger.info({ entries: entries.length }, 'Rebuilt metadata index');
        return entries;
    }

    loadDuplicates(): Map<string, string> {
        const duplicates = new Map<string, string>();
        if (!fs.existsSync(this.duplicatesFile)) return duplicates;

        for (const line of fs.readFileSync(this.duplicatesFile, 'utf-8').split('\n')) {
            const trimmed = line.trim();
            if (!trimmed) continue;
            const [key, canonical, ...rest] = trimmed.split(':');
            if (!key || !canonical || rest.length > 0) {
                this.logger.warn({ line: trimmed }, 'Skipping malformed duplicates line');
                continue;
            }
            // Re-insert so iteration order follows the latest write
            duplicates.delete(key);
            duplicates.set(key, canonical);
        }
        return duplicates;
    }

    appendDuplicate(key: string, canonical: string): void {
        fs.appendFileSync(this.duplicatesFile, `${key}:${canonical}\n`);
    }

    keys(): string[] {
        return fs
            .readdirSync(this.papersDir)
            .filter((name) => name.endsWith('.json'))
            .map((name) => name.slice(0, -'.json'.length))
            .sort();
    }

    close(): void {
        this.logger.debug({ rootDir: this.rootDir }, 'JSONL store closed');
    }

    private paperFile(key: string): string | null {
        if (!key || path.basename(key) !== key || key.startsWith('.')) return null;
        return path.join(this.papersDir, `${key}.json`);
    }

    /**
     * One metadata line: a JSON object of one or more `{key: entry}` pairs,
     * or a legacy comma-separated `key,value,...` line.
     */
    private parseMetadataLine(line: string): Array<[string, MetadataEntry, boolean]> | null {
        const trimmed = line.trim();
        if (!trimmed.startsWith('{')) {
            const [key, ...values] = trimmed.split(',');
            if (!key || values.length === 0) return null;
            const entry = normalizeEntry(values);
            return entry ? [[key, entry, true]] : null;
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(trimmed);
        } catch {
            return null;
        }
        if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return null;

        const result: Array<[string, MetadataEntry, boolean]> = [];
        for (const [key, value] of Object.entries(parsed)) {
            const entry = normalizeEntry(value);
            if (entry === null) return null;
            result.push([key, entry, !isCurrentLayout(value, entry)]);
        }
        return result;
    }

    private writeMetadata(entries: Array<[string, MetadataEntry]>): void {
        const body = entries.map(([key, entry]) => JSON.stringify({ [key]: entry })).join('\n');
        fs.writeFileSync(this.metadataFile, entries.length > 0 ? `${body}\n` : '');
    }

    private writeDuplicates(duplicates: Map<string, string>): void {
        const body = [...duplicates].map(([key, canonical]) => `${key}:${canonical}`).join('\n');
        fs.writeFileSync(this.duplicatesFile, duplicates.size > 0 ? `${body}\n` : '');
    }
}

function isCurrentLayout(raw: unknown, entry: MetadataEntry): boolean {
    return JSON.stringify(raw) === JSON.stringify(entry);
}
