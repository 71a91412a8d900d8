import { Router, type Router as RouterType } from 'express';
import walletRoutes from './wallet.routes.js';

const router: RouterType = Router();

router.use('/wallet', walletRoutes);

export default router;
