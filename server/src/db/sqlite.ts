import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import type { MediaItem, MediaRepository, NewMediaItem } from './db.js';
import { MEDIA_FORMATS } from './db.js';
import { SCHEMA_SQL } from './schema.js';

const IN_MEMORY = ':memory:';

interface MediaRow {
    id: number;
    title: string;
    artist: string;
    location: string;
    format: string;
}

/**
 * SQLite implementation of MediaRepository.
 * Uses better-sqlite3 for synchronous, fast, zero-config persistence.
 */
export class SQLiteRepository implements MediaRepository {
    private db: Database.Database;

    constructor(dbPath: string) {
        if (dbPath !== IN_MEMORY) {
            // Ensure data directory exists
            const dir = path.dirname(dbPath);
            if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
        }

        this.db = new Database(dbPath);
        if (dbPath !== IN_MEMORY) this.db.pragma('journal_mode = WAL');
    }

    get name(): string {
        return this.db.name;
    }

    init(): void {
        this.db.exec(SCHEMA_SQL);
    }

    list(): MediaItem[] {
        const rows = this.db.prepare<[], MediaRow>('SELECT * FROM media ORDER BY id').all();
        return rows.map(rowToMediaItem);
    }

    getById(id: number): MediaItem | null {
        const row = this.db.prepare<[number], MediaRow>('SELECT * FROM media WHERE id = ?').get(id);
        return row ? rowToMediaItem(row) : null;
    }

    create(item: NewMediaItem): MediaItem {
        const result = this.db.prepare<[string, string, string, string]>(`
      INSERT INTO media (title, artist, location, format)
      VALUES (?, ?, ?, ?)
    `).run(item.title, item.artist, item.location, item.format);

        return { id: Number(result.lastInsertRowid), ...item };
    }

    remove(id: number): boolean {
        const result = this.db.prepare<[number]>('DELETE FROM media WHERE id = ?').run(id);
        return result.changes > 0;
    }

    search(query: string): MediaItem[] {
        const like = `%${escapeLike(query.trim())}%`;
        const rows = this.db.prepare<{ like: string }, MediaRow>(`
      SELECT * FROM media
      WHERE title LIKE @like ESCAPE '\\'
         OR artist LIKE @like ESCAPE '\\'
         OR location LIKE @like ESCAPE '\\'
         OR format LIKE @like ESCAPE '\\'
      ORDER BY id
    `).all({ like });
        return rows.map(rowToMediaItem);
    }

    count(): number {
        const row = this.db.prepare<[], { c: number }>('SELECT COUNT(*) AS c FROM media').get();
        return row?.c ?? 0;
    }

    close(): void {
        this.db.close();
    }
}

/** Escape LIKE wildcards so user input matches literally */
export function escapeLike(value: string): string {
    return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/** Convert a DB row to a MediaItem */
function rowToMediaItem(row: MediaRow): MediaItem {
    const format = MEDIA_FORMATS.find((f) => f === row.format);
    if (!format) throw new Error(`Unknown media format in row ${row.id}: ${row.format}`);
    return {
        id: row.id,
        title: row.title,
        artist: row.artist,
        location: row.location,
        format,
    };
}
