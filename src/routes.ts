// routes.ts
import { Router } from 'express';
import type { Request, RequestHandler, Response } from 'express';
import { z } from 'zod';
import { recordAnalysis, type ServiceDeps } from './analysisService.js';

const analyzeRequestSchema = z.object({
    image: z.string().min(1),
    image_name: z.string().min(1).max(255).optional(),
});

const limitSchema = z.coerce.number().int().min(1).max(100).default(10);
const idSchema = z.coerce.number().int().positive();

function asyncRoute(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
    return (req, res, next) => {
        handler(req, res).catch(next);
    };
}

export function createAnalysisRouter(deps: ServiceDeps): Router {
    const router = Router();

    router.post('/analyze', asyncRoute(async (req, res) => {
        const parsed = analyzeRequestSchema.safeParse(req.body);
        if (!parsed.success) {
            const missingImage = parsed.error.issues.some(issue => issue.path[0] === 'image');
            res.status(400).json({
                error: missingImage ? 'Image is missing from the request' : 'Invalid image_name',
            });
            return;
        }

        const analysis = await recordAnalysis(parsed.data, deps);
        res.json({ success: true, analysis });
    }));

    router.get('/health', (_req, res) => {
        res.json({
            status: 'healthy',
            service: 'UX Analyzer API',
            profile: deps.config.profileName,
            timestamp: new Date().toISOString(),
        });
    });

    router.get('/analyses', asyncRoute(async (req, res) => {
        const limit = limitSchema.safeParse(req.query.limit);
        if (!limit.success) {
            res.status(400).json({ error: 'limit must be an integer between 1 and 100' });
            return;
        }
        const analyses = await deps.store.getRecent(limit.data);
        res.json({ success: true, analyses });
    }));

    router.get('/analyses/:id', asyncRoute(async (req, res) => {
        const id = idSchema.safeParse(req.params.id);
        const analysis = id.success ? await deps.store.getById(id.data) : undefined;
        if (!analysis) {
            res.status(404).json({ error: 'Analysis not found' });
            return;
        }
        res.json({ success: true, analysis });
    }));

    router.get('/stats', asyncRoute(async (_req, res) => {
        const stats = await deps.store.getStats();
        res.json({ success: true, stats });
    }));

    return router;
}
