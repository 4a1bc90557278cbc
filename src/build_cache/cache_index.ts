// cache_index.ts — record index for the build cache
//
// One row per published slot: size, creation time, and a monotonic use
// sequence that orders eviction (lowest = least recently used). The index is
// shared by every process using the same cache root; SQLite WAL mode and a
// busy timeout serialize concurrent writers.
//
// CONTRACT: Synchronous API (better-sqlite3 blocks by design)

import Database from 'better-sqlite3';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface CacheRecord {
    fingerprint: string;
    slot_dir: string;
    size_bytes: number;
    created_at: string;
    last_used_seq: number;
    hit_count: number;
}

/* -------------------------------------------------------------------------- */
/* Constants                                                                  */
/* -------------------------------------------------------------------------- */

const SCHEMA_VERSION = 1;

/* -------------------------------------------------------------------------- */
/* Cache Index                                                                */
/* -------------------------------------------------------------------------- */

export class CacheIndex {
    private readonly db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);
        this.configureDatabase();
        this.runMigrations();
    }

    /* ------------------------------------------------------------------------ */
    /* SQLite Configuration                                                     */
    /* ------------------------------------------------------------------------ */

    private configureDatabase(): void {
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('synchronous = NORMAL');
        this.db.pragma('busy_timeout = 5000');
    }

    private runMigrations(): void {
        const tx = this.db.transaction(() => {
            this.db.exec(`
                CREATE TABLE IF NOT EXISTS schema_version (
                    version INTEGER PRIMARY KEY,
                    applied_at TEXT DEFAULT CURRENT_TIMESTAMP
                ) STRICT
            `);

            const row = this.db
                .prepare<[], { version: number }>(`SELECT version FROM schema_version ORDER BY version DESC LIMIT 1`)
                .get();
            const current = row?.version ?? 0;

            if (current < 1) {
                this.db.exec(`
                    CREATE TABLE IF NOT EXISTS cache_records (
                        fingerprint TEXT PRIMARY KEY,
                        slot_dir TEXT NOT NULL,
                        size_bytes INTEGER NOT NULL DEFAULT 0,
                        created_at TEXT DEFAULT CURRENT_TIMESTAMP,
                        last_used_seq INTEGER NOT NULL,
                        hit_count INTEGER NOT NULL DEFAULT 0,
                        CHECK(length(fingerprint) = 64),
                        CHECK(size_bytes >= 0)
                    ) STRICT;

                    CREATE INDEX IF NOT EXISTS idx_cache_records_used ON cache_records(last_used_seq);
                `);
                this.db.prepare(`INSERT INTO schema_version (version) VALUES (?)`).run(SCHEMA_VERSION);
            }
        });
        tx.immediate();
    }

    private nextSeq(): number {
        const row = this.db
            .prepare<[], { seq: number }>(`SELECT COALESCE(MAX(last_used_seq), 0) + 1 AS seq FROM cache_records`)
            .get();
        return row?.seq ?? 1;
    }

    /* ------------------------------------------------------------------------ */
    /* Records                                                                  */
    /* ------------------------------------------------------------------------ */

    /** Insert or replace a record; it becomes the most recently used. */
    upsert(fingerprint: string, slotDir: string, sizeBytes: number): void {
        const tx = this.db.transaction(() => {
            this.db
                .prepare(`
                    INSERT INTO cache_records (fingerprint, slot_dir, size_bytes, last_used_seq)
                    VALUES (?, ?, ?, ?)
                    ON CONFLICT(fingerprint) DO UPDATE SET
                        slot_dir = excluded.slot_dir,
                        size_bytes = excluded.size_bytes,
                        created_at = CURRENT_TIMESTAMP,
                        last_used_seq = excluded.last_used_seq
                `)
                .run(fingerprint, slotDir, Math.round(sizeBytes), this.nextSeq());
        });
        tx.immediate();
    }

    /** Record a cache hit. Returns false if the fingerprint has no record. */
    touch(fingerprint: string): boolean {
        const tx = this.db.transaction(() => {
            const info = this.db
                .prepare(`UPDATE cache_records SET last_used_seq = ?, hit_count = hit_count + 1 WHERE fingerprint = ?`)
                .run(this.nextSeq(), fingerprint);
            return info.changes > 0;
        });
        return tx.immediate();
    }

    get(fingerprint: string): CacheRecord | undefined {
        return this.db
            .prepare<[string], CacheRecord>(`SELECT * FROM cache_records WHERE fingerprint = ?`)
            .get(fingerprint);
    }

    /** All records, least recently used first. */
    list(): CacheRecord[] {
        return this.db.prepare<[], CacheRecord>(`SELECT * FROM cache_records ORDER BY last_used_seq ASC`).all();
    }

    remove(fingerprint: string): void {
        this.db.prepare(`DELETE FROM cache_records WHERE fingerprint = ?`).run(fingerprint);
    }

    count(): number {
        const row = this.db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM cache_records`).get();
        return row?.n ?? 0;
    }

    totalBytes(): number {
        const row = this.db
            .prepare<[], { total: number }>(`SELECT COALESCE(SUM(size_bytes), 0) AS total FROM cache_records`)
            .get();
        return row?.total ?? 0;
    }

    close(): void {
        if (this.db.open) this.db.close();
    }
}
