import { Router, Request, Response } from 'express';
import { ContinuationCursor } from '../../domain/entities/ContinuationCursor';
import { MusicItem } from '../../domain/entities/MusicItem';
import { ResultPage } from '../../domain/entities/ResultPage';
import { IMusicCatalog, QueueParams, SearchFilter } from '../../domain/ports/IMusicCatalog';
import { isSearchFilter } from '../../application/EndpointCatalog';
import { asyncHandler, BadRequestError } from '../middleware/errorHandler';

function queryString(req: Request, name: string): string | undefined {
    const value = req.query[name];
    return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function continuationOf(req: Request): ContinuationCursor | null {
    const token = queryString(req, 'continuation');
    return token ? ContinuationCursor.from(token) : null;
}

function toBody<T extends MusicItem>(page: ResultPage<T>): { items: readonly T[]; continuation: string | null } {
    return {
        items: page.items,
        continuation: page.continuation ? page.continuation.token : null,
    };
}

/**
 * Read-only catalog routes. Pages are returned as `{ items, continuation }`;
 * pass `continuation` back as a query parameter to fetch the next page.
 */
export function createCatalogRoutes(catalog: IMusicCatalog): Router {
    const router = Router();

    /**
     * GET /search?q=&filter=&continuation=
     */
    router.get(
        '/search',
        asyncHandler(async (req: Request, res: Response) => {
            const query = queryString(req, 'q');
            const rawFilter = queryString(req, 'filter');
            const continuation = continuationOf(req);

            if (!query && !continuation) {
                throw new BadRequestError('Query parameter "q" is required');
            }

            let filter: SearchFilter | undefined;
            if (rawFilter !== undefined) {
                if (!isSearchFilter(rawFilter)) {
                    throw new BadRequestError(`Unknown search filter: ${rawFilter}`);
                }
                filter = rawFilter;
            }

            const page = await catalog.search({ query: query ?? '', filter }, continuation);
            res.json(toBody(page));
        })
    );

    /**
     * GET /browse/:browseId?params=&continuation=
     */
    router.get(
        '/browse/:browseId',
        asyncHandler(async (req: Request, res: Response) => {
            const page = await catalog.browse(
                { browseId: req.params.browseId, params: queryString(req, 'params') },
                continuationOf(req)
            );
            res.json(toBody(page));
        })
    );

    /**
     * GET /queue?videoId=&playlistId=&playlistSetVideoId=&params=&index=&continuation=
     */
    router.get(
        '/queue',
        asyncHandler(async (req: Request, res: Response) => {
            const params: QueueParams = {
                videoId: queryString(req, 'videoId'),
                playlistId: queryString(req, 'playlistId'),
                playlistSetVideoId: queryString(req, 'playlistSetVideoId'),
                params: queryString(req, 'params'),
            };

            const index = queryString(req, 'index');
            if (index !== undefined) {
                if (!/^\d+$/.test(index)) {
                    throw new BadRequestError('Query parameter "index" must be a non-negative integer');
                }
                params.index = parseInt(index, 10);
            }

            const page = await catalog.queue(params, continuationOf(req));
            res.json(toBody(page));
        })
    );

    /**
     * GET /related/:videoId?continuation=
     */
    router.get(
        '/related/:videoId',
        asyncHandler(async (req: Request, res: Response) => {
            const page = await catalog.related({ videoId: req.params.videoId }, continuationOf(req));
            res.json(toBody(page));
        })
    );

    return router;
}
