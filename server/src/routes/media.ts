import { Router } from 'express';
import type { MediaRepository } from '../db/db.js';
import { NotFoundError, parseInput } from '../errors.js';
import { createMediaSchema, mediaIdParamsSchema, searchQuerySchema } from '../schemas.js';

export function mediaRouter(repo: MediaRepository): Router {
    const router = Router();

    router.get('/', (_req, res) => {
        res.json(repo.list());
    });

    router.post('/', (req, res) => {
        const body = parseInput(createMediaSchema, req.body, 'body');
        const created = repo.create(body);
        res.status(201).json(created);
    });

    // Must be registered before /:id
    router.get('/search', (req, res) => {
        const { query } = parseInput(searchQuerySchema, req.query, 'query');
        res.json(repo.search(query));
    });

    router.get('/:id', (req, res) => {
        const { id } = parseInput(mediaIdParamsSchema, req.params, 'params');
        const item = repo.getById(id);
        if (!item) throw new NotFoundError('Media not found');
        res.json(item);
    });

    router.delete('/:id', (req, res) => {
        const { id } = parseInput(mediaIdParamsSchema, req.params, 'params');
        if (!repo.remove(id)) throw new NotFoundError('Media not found');
        res.json({ message: `Media ${id} deleted successfully` });
    });

    return router;
}
