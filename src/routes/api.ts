import { Router, Request, Response } from 'express';
import { toCatalog } from '../catalog.js';
import { PolicyParseError } from '../errors.js';
import { LoadResult } from '../loader.js';
import { parsePolicy } from '../parser.js';
import { renderPolicy } from '../renderer.js';

/**
 * Settings shared by the catalog routes
 */
export interface ApiOptions {
  title: string;
  oscalVersion: string;
}

/**
 * Create API routes for policy conversion
 */
export function createApiRoutes(data: LoadResult, options: ApiOptions): Router {
  const router = Router();

  /**
   * GET /api/documents
   * List all parsed documents
   */
  router.get('/documents', (_req: Request, res: Response) => {
    res.json(Array.from(data.documents.keys()));
  });

  /**
   * GET /api/catalog/:id
   * Catalog JSON for a loaded document
   */
  router.get('/catalog/:id', (req: Request, res: Response) => {
    const { id } = req.params;
    const parsed = data.documents.get(id);

    if (!parsed) {
      res.status(404).json({ error: `Document not found: ${id}` });
      return;
    }

    res.json(toCatalog(parsed, { oscalVersion: options.oscalVersion }));
  });

  /**
   * GET /api/render/:id
   * Render a loaded document as HTML
   */
  router.get('/render/:id', (req: Request, res: Response) => {
    const { id } = req.params;
    const parsed = data.documents.get(id);

    if (!parsed) {
      res.status(404).json({ error: `Document not found: ${id}` });
      return;
    }

    res.json(renderPolicy(parsed));
  });

  /**
   * POST /api/convert
   * Convert a text/plain policy body to catalog JSON
   */
  router.post('/convert', (req: Request, res: Response) => {
    const body: unknown = req.body;

    if (typeof body !== 'string' || body.trim().length === 0) {
      res.status(400).json({ error: 'Request body must be non-empty text/plain policy content' });
      return;
    }

    try {
      const parsed = parsePolicy(body, { title: options.title });
      res.json({
        ...toCatalog(parsed, { oscalVersion: options.oscalVersion }),
        warnings: parsed.warnings
      });
    } catch (err) {
      if (err instanceof PolicyParseError) {
        res.status(err.statusCode).json({ error: err.message, kind: err.kind });
        return;
      }
      throw err;
    }
  });

  return router;
}
