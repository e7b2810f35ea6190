import Database from 'better-sqlite3';
import path from 'node:path';
import { entryFromDetails } from '../metadata/entry.js';
import { mergeCitations, mergeReferences } from '../merge/edge-merge.js';
import { parsePaperDetails, parseStoredRecord } from '../sources/schema.js';
import type { EdgeList, MetadataEntry, PaperData, RecordStore, StoredMetadata } from '../types/index.js';
import { CacheError, isCacheError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export const DATABASE_FILE = 'citecache.db';

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Papers: details of each stored record
CREATE TABLE IF NOT EXISTS papers (
  paper_id TEXT PRIMARY KEY,
  corpus_id INTEGER,
  data_json TEXT NOT NULL
);

-- Paging state of each stored edge list
CREATE TABLE IF NOT EXISTS edge_lists (
  paper_id TEXT NOT NULL,
  direction TEXT NOT NULL CHECK (direction IN ('citations', 'references')),
  page_offset INTEGER NOT NULL DEFAULT 0,
  next_offset INTEGER,
  PRIMARY KEY (paper_id, direction)
);

-- Citation edges. Each side keeps the entry as its own record lists it:
-- citing_pos and citing_entry_json for the citing paper's references,
-- cited_pos and cited_entry_json for the cited paper's citations.
-- A NULL position means that side does not list the edge.
CREATE TABLE IF NOT EXISTS citations (
  citing_id TEXT NOT NULL,
  cited_id TEXT NOT NULL,
  citing_pos INTEGER,
  citing_entry_json TEXT,
  cited_pos INTEGER,
  cited_entry_json TEXT,
  PRIMARY KEY (citing_id, cited_id)
);

-- External ids per canonical key
CREATE TABLE IF NOT EXISTS metadata (
  paper_id TEXT PRIMARY KEY,
  acl TEXT NOT NULL DEFAULT '',
  arxiv TEXT NOT NULL DEFAULT '',
  corpusid TEXT NOT NULL DEFAULT '',
  doi TEXT NOT NULL DEFAULT '',
  mag TEXT NOT NULL DEFAULT '',
  url TEXT NOT NULL DEFAULT '',
  dblp TEXT NOT NULL DEFAULT '',
  pubmed TEXT NOT NULL DEFAULT '',
  pmc TEXT NOT NULL DEFAULT ''
);

-- Corpus id to canonical key; seq keeps first-seen order within a corpus id
CREATE TABLE IF NOT EXISTS corpus (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  corpus_id TEXT NOT NULL,
  paper_id TEXT NOT NULL,
  UNIQUE (corpus_id, paper_id)
);

-- Known duplicates: key -> canonical key
CREATE TABLE IF NOT EXISTS duplicates (
  paper_id TEXT PRIMARY KEY,
  canonical_id TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_citations_cited ON citations(cited_id, cited_pos);
CREATE INDEX IF NOT EXISTS idx_citations_citing ON citations(citing_id, citing_pos);
CREATE INDEX IF NOT EXISTS idx_corpus_paper ON corpus(paper_id);
`;

interface PaperRow {
    paper_id: string;
    data_json: string;
}

interface EdgeRow {
    entry_json: string | null;
}

interface EdgeListRow {
    page_offset: number;
    next_offset: number | null;
}

interface MetadataRow {
    paper_id: string;
    acl: string;
    arxiv: string;
    corpusid: string;
    doi: string;
    mag: string;
    url: string;
    dblp: string;
    pubmed: string;
    pmc: string;
}

interface EdgeWrite {
    citing_id: string;
    cited_id: string;
    entry_json: string;
    pos: number;
}

type Direction = 'citations' | 'references';

function parseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

/**
 * Relational record store on better-sqlite3.
 * Handles schema migration, WAL mode and normalised edge storage.
 *
 * An edge listed by both of its papers is one `citations` row, but each
 * side keeps its own copy of the entry, so a record reads back exactly as
 * it was stored whatever other records say about the same counterpart.
 */
export class SqliteRecordStore implements RecordStore {
    readonly backend = 'sqlite' as const;
    private readonly db: Database.Database;
    private readonly logger = getLogger();

    constructor(rootDir: string, fileName: string = DATABASE_FILE) {
        const dbPath = fileName === ':memory:' ? fileName : path.join(rootDir, fileName);
        this.db = new Database(dbPath);

        // Set pragmas
        this.db.pragma('journal_mode = WAL');

        // Run migrations
        this.migrate();

        this.logger.debug({ dbPath }, 'SQLite store opened');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const version = this.db.pragma('user_version', { simple: true });
        const currentVersion = typeof version === 'number' ? version : 0;

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            this.logger.debug('Database migrated to v1');
        }
    }

    // ─── Records ──────────────────────────────────────────────

    get(key: string): PaperData | null {
        const row = this.db
            .prepare<[string], PaperRow>('SELECT paper_id, data_json FROM papers WHERE paper_id = ?')
            .get(key);
        if (!row) return null;

        const raw = {
            details: parseJson(row.data_json),
            citations: this.readEdgeList(key, 'citations'),
            references: this.readEdgeList(key, 'references'),
        };
        const record = parseStoredRecord(raw);
        if (record === null) {
            const err = new CacheError('StorageCorrupt', `Malformed record for ${key}`);
            this.logger.warn({ key, err }, 'Corrupt stored record');
        }
        return record;
    }

    put(key: string, data: PaperData, discardExisting: boolean): void {
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

        const write = this.db.transaction((stored: PaperData) => {
            this.db
                .prepare<{ paper_id: string; corpus_id: number | null; data_json: string }>(`
      INSERT INTO papers (paper_id, corpus_id, data_json)
      VALUES (@paper_id, @corpus_id, @data_json)
      ON CONFLICT(paper_id) DO UPDATE SET
        corpus_id = excluded.corpus_id,
        data_json = excluded.data_json
    `)
                .run({ paper_id: key, corpus_id: stored.details.corpusId ?? null, data_json: JSON.stringify(stored.details) });

            this.clearEdges(key);

            this.writeEdges(
                'citations',
                stored.citations.data.map((entry, pos) => ({
                    citing_id: entry.citingPaper.paperId,
                    cited_id: key,
                    entry_json: JSON.stringify(entry),
                    pos,
                }))
            );
            this.writeEdges(
                'references',
                stored.references.data.map((entry, pos) => ({
                    citing_id: key,
                    cited_id: entry.citedPaper.paperId,
                    entry_json: JSON.stringify(entry),
                    pos,
                }))
            );

            this.db.exec('DELETE FROM citations WHERE citing_pos IS NULL AND cited_pos IS NULL');
            this.writeEdgeList(key, 'citations', stored.citations);
            this.writeEdgeList(key, 'references', stored.references);
        });

        write(record);
        this.logger.debug({ key, citations: record.citations.data.length }, 'Stored record');
    }

    delete(key: string): boolean {
        const remove = this.db.transaction((): boolean => {
            const result = this.db.prepare<[string]>('DELETE FROM papers WHERE paper_id = ?').run(key);
            this.clearEdges(key);
            this.db.exec('DELETE FROM citations WHERE citing_pos IS NULL AND cited_pos IS NULL');
            for (const table of ['edge_lists', 'metadata', 'corpus', 'duplicates']) {
                this.db.prepare<[string]>(`DELETE FROM ${table} WHERE paper_id = ?`).run(key);
            }
            return result.changes > 0;
        });
        return remove();
    }

    keys(): string[] {
        return this.db
            .prepare<[], { paper_id: string }>('SELECT paper_id FROM papers ORDER BY paper_id')
            .all()
            .map((row) => row.paper_id);
    }

    // ─── Metadata ─────────────────────────────────────────────

    loadMetadataIndex(): StoredMetadata {
        const rows = this.db.prepare<[], MetadataRow>('SELECT * FROM metadata ORDER BY rowid').all();
        const entries = rows.map((row): [string, MetadataEntry] => [
            row.paper_id,
            {
                ACL: row.acl,
                ARXIV: row.arxiv,
                CORPUSID: row.corpusid,
                DOI: row.doi,
                MAG: row.mag,
                URL: row.url,
                DBLP: row.dblp,
                PUBMED: row.pubmed,
                PMC: row.pmc,
            },
        ]);

        const inferredGroups = new Map<string, string[]>();
        const corpusRows = this.db
            .prepare<[], { corpus_id: string; paper_id: string }>('SELECT corpus_id, paper_id FROM corpus ORDER BY seq')
            .all();
        for (const row of corpusRows) {
            const group = inferredGroups.get(row.corpus_id) ?? [];
            group.push(row.paper_id);
            inferredGroups.set(row.corpus_id, group);
        }
        for (const [corpusId, group] of inferredGroups) {
            if (group.length < 2) inferredGroups.delete(corpusId);
        }

        return { entries, knownDuplicates: this.loadDuplicates(), inferredGroups };
    }

    appendMetadata(key: string, entry: MetadataEntry): void {
        const write = this.db.transaction(() => {
            this.insertMetadata(key, entry);
        });
        write();
    }

    rebuildMetadataIndex(): Array<[string, MetadataEntry]> {
        const rows = this.db
            .prepare<[], PaperRow>('SELECT paper_id, data_json FROM papers ORDER BY rowid')
            .all();

        const entries: Array<[string, MetadataEntry]> = [];
        for (const row of rows) {
            const details = parsePaperDetails(parseJson(row.data_json));
            if (isCacheError(details)) {
                this.logger.warn({ key: row.paper_id }, 'Skipping unreadable record during rebuild');
                continue;
            }
            entries.push([row.paper_id, entryFromDetails(details)]);
        }

        const rebuild = this.db.transaction(() => {
            this.db.exec('DELETE FROM metadata; DELETE FROM corpus;');
            for (const [key, entry] of entries) {
                this.insertMetadata(key, entry);
            }
        });
        rebuild();
        this.logger.info({ entries: entries.length }, 'Rebuilt metadata index');
        return entries;
    }

    // ─── Duplicates ───────────────────────────────────────────

    loadDuplicates(): Map<string, string> {
        const rows = this.db
            .prepare<[], { paper_id: string; canonical_id: string }>(
                'SELECT paper_id, canonical_id FROM duplicates ORDER BY rowid'
            )
            .all();
        return new Map(rows.map((row) => [row.paper_id, row.canonical_id]));
    }

    appendDuplicate(key: string, canonical: string): void {
        // REPLACE re-inserts, so rowid order follows the latest write
        this.db
            .prepare<[string, string]>('INSERT OR REPLACE INTO duplicates (paper_id, canonical_id) VALUES (?, ?)')
            .run(key, canonical);
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        this.logger.debug('SQLite store closed');
    }

    /**
     * Get the raw better-sqlite3 instance (for advanced queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }

    private readEdgeList(key: string, direction: Direction): unknown {
        const [keyColumn, posColumn, entryColumn] =
            direction === 'citations'
                ? (['cited_id', 'cited_pos', 'cited_entry_json'] as const)
                : (['citing_id', 'citing_pos', 'citing_entry_json'] as const);

        const rows = this.db
            .prepare<[string], EdgeRow>(`
      SELECT ${entryColumn} AS entry_json
      FROM citations
      WHERE ${keyColumn} = ? AND ${posColumn} IS NOT NULL
      ORDER BY ${posColumn}
    `)
            .all(key);

        const paging = this.db
            .prepare<[string, Direction], EdgeListRow>(
                'SELECT page_offset, next_offset FROM edge_lists WHERE paper_id = ? AND direction = ?'
            )
            .get(key, direction);

        const data = rows.map((row) => (row.entry_json === null ? undefined : parseJson(row.entry_json)));
        const list: Record<string, unknown> = { offset: paging?.page_offset ?? 0, data };
        if (paging && paging.next_offset !== null) list['next'] = paging.next_offset;
        return list;
    }

    /** Unlist every edge of `key` on its own side */
    private clearEdges(key: string): void {
        this.db
            .prepare<[string]>('UPDATE citations SET cited_pos = NULL, cited_entry_json = NULL WHERE cited_id = ?')
            .run(key);
        this.db
            .prepare<[string]>('UPDATE citations SET citing_pos = NULL, citing_entry_json = NULL WHERE citing_id = ?')
            .run(key);
    }

    private writeEdges(direction: Direction, edges: EdgeWrite[]): void {
        const [posColumn, entryColumn] =
            direction === 'citations'
                ? (['cited_pos', 'cited_entry_json'] as const)
                : (['citing_pos', 'citing_entry_json'] as const);
        const upsertEdge = this.db.prepare<EdgeWrite>(`
      INSERT INTO citations (citing_id, cited_id, ${posColumn}, ${entryColumn})
      VALUES (@citing_id, @cited_id, @pos, @entry_json)
      ON CONFLICT(citing_id, cited_id) DO UPDATE SET
        ${posColumn} = excluded.${posColumn},
        ${entryColumn} = excluded.${entryColumn}
    `);

        for (const edge of edges) {
            upsertEdge.run(edge);
        }
    }

    private writeEdgeList<E>(key: string, direction: Direction, list: EdgeList<E>): void {
        this.db
            .prepare<[string, Direction, number, number | null]>(`
      INSERT INTO edge_lists (paper_id, direction, page_offset, next_offset)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(paper_id, direction) DO UPDATE SET
        page_offset = excluded.page_offset,
        next_offset = excluded.next_offset
    `)
            .run(key, direction, list.offset, list.next ?? null);
    }

    private insertMetadata(key: string, entry: MetadataEntry): void {
        const row: MetadataRow = {
            paper_id: key,
            acl: entry.ACL,
            arxiv: entry.ARXIV,
            corpusid: entry.CORPUSID,
            doi: entry.DOI,
            mag: entry.MAG,
            url: entry.URL,
            dblp: entry.DBLP,
            pubmed: entry.PUBMED,
            pmc: entry.PMC,
        };
        this.db
            .prepare<MetadataRow>(`
      INSERT INTO metadata (paper_id, acl, arxiv, corpusid, doi, mag, url, dblp, pubmed, pmc)
      VALUES (@paper_id, @acl, @arxiv, @corpusid, @doi, @mag, @url, @dblp, @pubmed, @pmc)
      ON CONFLICT(paper_id) DO UPDATE SET
        acl = excluded.acl, arxiv = excluded.arxiv, corpusid = excluded.corpusid,
        doi = excluded.doi, mag = excluded.mag, url = excluded.url,
        dblp = excluded.dblp, pubmed = excluded.pubmed, pmc = excluded.pmc
    `)
            .run(row);

        this.db
            .prepare<[string, string]>('DELETE FROM corpus WHERE paper_id = ? AND corpus_id != ?')
            .run(key, entry.CORPUSID);
        if (entry.CORPUSID) {
            this.db
                .prepare<[string, string]>('INSERT OR IGNORE INTO corpus (corpus_id, paper_id) VALUES (?, ?)')
                .run(entry.CORPUSID, key);
        }
    }
}
