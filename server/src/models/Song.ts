import { z } from 'zod';
import type { Song, SongPayload } from '../../../shared/types/common.js';
import { ValidationError } from '../utils/errors.js';

/**
 * Wire shape of a song. Both fields must be present and non-empty;
 * values are stored exactly as sent.
 */
export const SongPayloadSchema = z.object({
    title: z.string().min(1),
    artist: z.string().min(1),
});

export const toWire = (song: Song): SongPayload => ({
    title: song.title,
    artist: song.artist,
});

export const fromWire = (payload: unknown): SongPayload => {
    const result = SongPayloadSchema.safeParse(payload);
    if (!result.success) {
        throw new ValidationError();
    }
    return result.data;
};

export const displaySong = (song: Song): string =>
    `${song.title} - ${song.artist}`;
