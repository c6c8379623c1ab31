import { Router, Request, Response } from 'express';
import { SessionStore } from '../../application/SessionStore';
import { SessionSnapshot } from '../../domain/entities/SessionContext';
import { isRecord } from '../../infrastructure/renderers/json';
import { BadRequestError } from '../middleware/errorHandler';

function summarize(session: SessionSnapshot): Record<string, unknown> {
    return {
        version: session.version,
        locale: session.locale,
        hasVisitorData: session.visitorData !== undefined,
        authenticated: session.credentials !== undefined,
    };
}

function stringField(body: unknown, name: string): string | undefined {
    const value = isRecord(body) ? body[name] : undefined;
    return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

/**
 * Session management. Credentials are accepted but never echoed back.
 */
export function createSessionRoutes(session: SessionStore): Router {
    const router = Router();

    router.get('/session', (req: Request, res: Response) => {
        res.json(summarize(session.snapshot()));
    });

    /**
     * PUT /session/locale  { hl, gl }
     */
    router.put('/session/locale', (req: Request, res: Response) => {
        const hl = stringField(req.body, 'hl');
        const gl = stringField(req.body, 'gl');
        if (!hl || !gl) {
            throw new BadRequestError('Both "hl" and "gl" are required');
        }
        session.setLocale({ hl, gl });
        res.json(summarize(session.snapshot()));
    });

    /**
     * PUT /session/credentials  { cookie }
     */
    router.put('/session/credentials', (req: Request, res: Response) => {
        const cookie = stringField(req.body, 'cookie');
        if (!cookie) {
            throw new BadRequestError('"cookie" is required');
        }
        session.setCredentials({ cookie });
        res.json(summarize(session.snapshot()));
    });

    router.delete('/session/credentials', (req: Request, res: Response) => {
        session.clearCredentials();
        res.json(summarize(session.snapshot()));
    });

    return router;
}
