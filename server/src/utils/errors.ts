export class HttpError extends Error {
    readonly status: number;

    constructor(status: number, message: string) {
        super(message);
        this.name = new.target.name;
        this.status = status;
    }
}

export const SONG_FIELDS_REQUIRED =
    'Both title and artist are required to add a song';

export class ValidationError extends HttpError {
    constructor(message: string = SONG_FIELDS_REQUIRED) {
        super(400, message);
    }
}

export class UnauthorizedError extends HttpError {
    constructor(message: string = 'Authentication credentials were not provided.') {
        super(401, message);
    }
}

export class NotFoundError extends HttpError {
    constructor(message: string = 'Not found') {
        super(404, message);
    }

    static song(id: number | string): NotFoundError {
        return new NotFoundError(`Song with id: ${id} does not exist`);
    }
}
