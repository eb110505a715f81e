import { Router } from 'express';
import type { AuthController } from '../controllers/authController.js';

export const authRoutes = (authController: AuthController): Router => {
    const router = Router();

    // Public routes - no auth required
    router.post('/login', authController.login);

    return router;
};

export default authRoutes;
