import { Router } from 'express';
import type { SongController } from '../controllers/songController.js';

export const songRoutes = (songController: SongController): Router => {
    const router = Router();

    router.get('/', songController.getAllSongs);
    router.post('/', songController.createSong);

    router.get('/:id', songController.getSong);
    router.put('/:id', songController.updateSong);
    router.delete('/:id', songController.deleteSong);

    return router;
};

export default songRoutes;
