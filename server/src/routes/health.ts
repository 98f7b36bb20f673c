import { Router } from 'express';
import type { Request, Response } from 'express';

const router: Router = Router();

router.get('/', (_req: Request, res: Response) => {
    res.json({ status: 'ok', uptime: Math.round(process.uptime()) });
});

export default router;
