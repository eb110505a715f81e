/**
 * Test Data Factories
 */

import type { SongPayload } from '../../shared/types/common.js';
import type { DbClient } from '../../server/src/utils/db.js';

export const SEED_SONGS: SongPayload[] = [
    { title: 'Harbor Lights', artist: 'The Quiet Tides' },
    { title: 'Paper Kites', artist: 'Mina Ortega' },
    { title: 'Slow Orbit', artist: 'Northbound Choir' },
    { title: 'Copper Rain', artist: 'Devi & The Lanterns' },
];

export const validSong: SongPayload = {
    title: 'test song',
    artist: 'test artist',
};

export const invalidSong: SongPayload = {
    title: '',
    artist: '',
};

/** Inserts the seed songs one after another so ids run 1..n. */
export async function seedSongs(songs: DbClient): Promise<void> {
    for (const { title, artist } of SEED_SONGS) {
        await songs.create(title, artist);
    }
}
