/**
 * Unit Tests: SQLite song store
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DbClient } from '../../server/src/utils/db.js';
import { NotFoundError } from '../../server/src/utils/errors.js';

describe('Unit: DbClient', () => {
    let db: DbClient;

    beforeEach(async () => {
        db = await DbClient.connect({ filename: ':memory:' });
    });

    afterEach(async () => {
        await db.close();
    });

    it('should assign increasing ids and return the stored row', async () => {
        const first = await db.create('Night Market', 'Lena Voss');
        const second = await db.create('Dry Season', 'Tomas Adeyemi');

        expect(first).toEqual({ id: 1, title: 'Night Market', artist: 'Lena Voss' });
        expect(second).toEqual({ id: 2, title: 'Dry Season', artist: 'Tomas Adeyemi' });
    });

    it('should list songs in insertion order', async () => {
        await db.create('B side', 'Two');
        await db.create('A side', 'One');

        const songs = await db.listAll();
        expect(songs.map((song) => song.title)).toEqual(['B side', 'A side']);
    });

    it('should get a song by id', async () => {
        await db.create('Night Market', 'Lena Voss');

        await expect(db.get(1)).resolves.toEqual({
            id: 1,
            title: 'Night Market',
            artist: 'Lena Voss',
        });
    });

    it('should reject get for a missing id', async () => {
        await expect(db.get(100)).rejects.toThrow(NotFoundError);
        await expect(db.get(100)).rejects.toThrow(
            'Song with id: 100 does not exist',
        );
    });

    it('should overwrite both fields on update', async () => {
        await db.create('Night Market', 'Lena Voss');

        const updated = await db.update(1, 'Day Market', 'L. Voss');

        expect(updated).toEqual({ id: 1, title: 'Day Market', artist: 'L. Voss' });
        await expect(db.get(1)).resolves.toEqual(updated);
    });

    it('should reject update for a missing id without inserting', async () => {
        await expect(db.update(5, 'Ghost', 'Nobody')).rejects.toThrow(
            'Song with id: 5 does not exist',
        );
        await expect(db.listAll()).resolves.toEqual([]);
    });

    it('should delete a song and then report it missing', async () => {
        await db.create('Night Market', 'Lena Voss');

        await db.delete(1);

        await expect(db.listAll()).resolves.toEqual([]);
        await expect(db.delete(1)).rejects.toThrow(NotFoundError);
    });

    it('should not reuse the id of a deleted song', async () => {
        await db.create('One', 'First');
        await db.create('Two', 'Second');
        await db.delete(2);

        const next = await db.create('Three', 'Third');
        expect(next.id).toBe(3);
    });

    it('should refuse empty fields at the table level', async () => {
        await expect(db.create('', 'Lena Voss')).rejects.toThrow(
            /CHECK constraint failed/,
        );
        await expect(db.create('Night Market', '')).rejects.toThrow(
            /CHECK constraint failed/,
        );
        await expect(db.listAll()).resolves.toEqual([]);
    });

    it('should keep the table when init runs again', async () => {
        await db.create('Night Market', 'Lena Voss');

        await db.init();

        await expect(db.listAll()).resolves.toHaveLength(1);
    });
});
