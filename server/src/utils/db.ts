import sqlite3 from 'sqlite3';
import type { Database } from 'sqlite3';
import type { DatabaseConfig, SongRepository } from '../types/interfaces.js';
import type { Song } from '../../../shared/types/common.js';
import { NotFoundError } from './errors.js';

// Database row type (what we get from SQLite)
interface SongRow {
    id: number;
    title: string;
    artist: string;
}

const convertSongRow = (row: SongRow): Song => ({
    id: row.id,
    title: row.title,
    artist: row.artist,
});

export class DbClient implements SongRepository {
    private constructor(private readonly db: Database) {}

    static open(config: DatabaseConfig): Promise<DbClient> {
        return new Promise((resolve, reject) => {
            const db = new sqlite3.Database(config.filename, (err) => {
                if (err) {
                    reject(err);
                    return;
                }
                resolve(new DbClient(db));
            });
        });
    }

    /** Opens the database and makes sure the songs table exists. */
    static async connect(config: DatabaseConfig): Promise<DbClient> {
        const client = await DbClient.open(config);
        await client.init();
        return client;
    }

    init(): Promise<void> {
        return new Promise((resolve, reject) => {
            this.db.run(
                `
        CREATE TABLE IF NOT EXISTS songs (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          title TEXT NOT NULL CHECK(length(title) > 0),
          artist TEXT NOT NULL CHECK(length(artist) > 0)
        )
      `,
                (err: Error | null) => {
                    if (err) {
                        reject(err);
                        return;
                    }
                    resolve();
                },
            );
        });
    }

    async listAll(): Promise<Song[]> {
        return new Promise((resolve, reject) => {
            this.db.all<SongRow>(
                'SELECT id, title, artist FROM songs ORDER BY id',
                [],
                (err, rows) => {
                    if (err) {
                        reject(err);
                        return;
                    }
                    resolve(rows.map(convertSongRow));
                },
            );
        });
    }

    async get(id: number): Promise<Song> {
        return new Promise((resolve, reject) => {
            this.db.get<SongRow | undefined>(
                'SELECT id, title, artist FROM songs WHERE id = ?',
                [id],
                (err, row) => {
                    if (err) {
                        reject(err);
                        return;
                    }
                    if (!row) {
                        reject(NotFoundError.song(id));
                        return;
                    }
                    resolve(convertSongRow(row));
                },
            );
        });
    }

    async create(title: string, artist: string): Promise<Song> {
        const lastId = await new Promise<number>((resolve, reject) => {
            this.db.run(
                'INSERT INTO songs (title, artist) VALUES (?, ?)',
                [title, artist],
                function (err: Error | null) {
                    if (err) {
                        reject(err);
                        return;
                    }
                    resolve(this.lastID);
                },
            );
        });

        return this.get(lastId);
    }

    async update(id: number, title: string, artist: string): Promise<Song> {
        const changes = await new Promise<number>((resolve, reject) => {
            this.db.run(
                'UPDATE songs SET title = ?, artist = ? WHERE id = ?',
                [title, artist, id],
                function (err: Error | null) {
                    if (err) {
                        reject(err);
                        return;
                    }
                    resolve(this.changes);
                },
            );
        });

        if (changes === 0) {
            throw NotFoundError.song(id);
        }
        return this.get(id);
    }

    async delete(id: number): Promise<void> {
        const changes = await new Promise<number>((resolve, reject) => {
            this.db.run(
                'DELETE FROM songs WHERE id = ?',
                [id],
                function (err: Error | null) {
                    if (err) {
                        reject(err);
                        return;
                    }
                    resolve(this.changes);
                },
            );
        });

        if (changes === 0) {
            throw NotFoundError.song(id);
        }
    }

    close(): Promise<void> {
        return new Promise((resolve, reject) => {
            this.db.close((err) => {
                if (err) {
                    reject(err);
                    return;
                }
                resolve();
            });
        });
    }
}
