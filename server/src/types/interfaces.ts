import type { Song } from '../../../shared/types/common.js';

export interface DatabaseConfig {
    filename: string;
}

export interface SongRepository {
    listAll(): Promise<Song[]>;
    get(id: number): Promise<Song>;
    create(title: string, artist: string): Promise<Song>;
    update(id: number, title: string, artist: string): Promise<Song>;
    delete(id: number): Promise<void>;
}

export interface AuthIdentity {
    username: string;
}

export interface TokenValidator {
    validate(token: string): AuthIdentity;
}
