export interface Song {
    id: number;
    title: string;
    artist: string;
}

// What the API sends and accepts for a song; the id never travels.
export type SongPayload = Pick<Song, 'title' | 'artist'>;

export interface LoginResponse {
    token: string;
}

export interface ErrorResponse {
    message: string;
}
