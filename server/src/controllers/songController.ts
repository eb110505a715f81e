import type { RequestHandler } from 'express';
import type { SongRepository } from '../types/interfaces.js';
import { fromWire, toWire } from '../models/Song.js';
import { NotFoundError } from '../utils/errors.js';

// Only a canonical positive integer names a stored song, so the
// 404 message can always echo the segment as it was sent
export const parseSongId = (raw: string): number => {
    if (!/^[1-9]\d*$/.test(raw)) {
        throw NotFoundError.song(raw);
    }
    const id = parseInt(raw, 10);
    if (!Number.isSafeInteger(id)) {
        throw NotFoundError.song(raw);
    }
    return id;
};

export class SongController {
    constructor(private readonly songs: SongRepository) {}

    getAllSongs: RequestHandler = async (_req, res, next) => {
        try {
            const songs = await this.songs.listAll();
            res.json(songs.map(toWire));
        } catch (error) {
            next(error);
        }
    };

    getSong: RequestHandler = async (req, res, next) => {
        try {
            const song = await this.songs.get(parseSongId(req.params.id));
            res.json(toWire(song));
        } catch (error) {
            next(error);
        }
    };

    createSong: RequestHandler = async (req, res, next) => {
        try {
            const { title, artist } = fromWire(req.body);
            const song = await this.songs.create(title, artist);
            res.status(201).json(toWire(song));
        } catch (error) {
            next(error);
        }
    };

    updateSong: RequestHandler = async (req, res, next) => {
        try {
            const id = parseSongId(req.params.id);
            // A missing song is reported before the body is looked at
            await this.songs.get(id);

            const { title, artist } = fromWire(req.body);
            const song = await this.songs.update(id, title, artist);
            res.json(toWire(song));
        } catch (error) {
            next(error);
        }
    };

    deleteSong: RequestHandler = async (req, res, next) => {
        try {
            await this.songs.delete(parseSongId(req.params.id));
            res.status(204).end();
        } catch (error) {
            next(error);
        }
    };
}
