import { Router } from 'express';
import type { Request, Response } from 'express';
import { compilePattern, parseLevel, resolveRenderMode } from '../config.js';
import { InputError } from '../errors.js';
import { filterHeadlines } from '../filters.js';
import type { FilterCriteria } from '../filters.js';
import { searchHeadlines } from '../loader.js';
import type { LoadResult } from '../loader.js';
import { prepareForOutput } from '../output.js';
import { parseOutline } from '../parser.js';
import { unwrapText } from '../unwrap.js';

/**
 * Read a single string query parameter
 */
function stringParam(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * `?html`, `?html=1` and `?html=true` all switch a flag on
 */
function flagParam(value: unknown): boolean {
  return typeof value === 'string' && (value === '' || value === '1' || value === 'true');
}

function criteriaFromQuery(query: Request['query']): FilterCriteria {
  const criteria: FilterCriteria = {};

  const minLevel = stringParam(query.minLevel);
  if (minLevel) criteria.minLevel = parseLevel(minLevel, 'minLevel');
  const maxLevel = stringParam(query.maxLevel);
  if (maxLevel) criteria.maxLevel = parseLevel(maxLevel, 'maxLevel');

  const title = stringParam(query.title);
  if (title) criteria.title = compilePattern(title, 'title');
  const customId = stringParam(query.customId);
  if (customId) criteria.customId = compilePattern(customId, 'customId');
  const sectionTitle = stringParam(query.sectionTitle);
  if (sectionTitle) criteria.sectionTitle = compilePattern(sectionTitle, 'sectionTitle');
  const sectionCustomId = stringParam(query.sectionCustomId);
  if (sectionCustomId) criteria.sectionCustomId = compilePattern(sectionCustomId, 'sectionCustomId');

  return criteria;
}

/**
 * Create API routes for outline documents
 */
export function createApiRoutes(data: LoadResult): Router {
  const router = Router();

  function documentText(id: string): string {
    const content = data.corpus.get(id);
    if (content === undefined) {
      throw new InputError(`Document not found: ${id}`);
    }
    return content;
  }

  /**
   * GET /api/documents
   * List all loaded documents
   */
  router.get('/documents', (_req: Request, res: Response) => {
    res.json(Array.from(data.corpus.keys()));
  });

  /**
   * GET /api/document/:id
   * Raw text of a document
   */
  router.get('/document/:id', (req: Request, res: Response) => {
    res.type('text/plain').send(documentText(req.params.id));
  });

  /**
   * GET /api/headlines/:id
   * Filtered headline records
   * Query params: ?html&markdown&includeLevel&minLevel=1&maxLevel=2&title=re
   *               &customId=re&sectionTitle=re&sectionCustomId=re
   */
  router.get('/headlines/:id', (req: Request, res: Response) => {
    const mode = resolveRenderMode({
      html: flagParam(req.query.html),
      markdown: flagParam(req.query.markdown)
    });
    const criteria = criteriaFromQuery(req.query);
    const text = documentText(req.params.id);

    const { headlines } = mode === 'plain'
      ? data.parseResultMap.get(req.params.id) ?? parseOutline(text)
      : parseOutline(text, { mode });

    const records = prepareForOutput(filterHeadlines(headlines, criteria), {
      includeLevel: flagParam(req.query.includeLevel)
    });
    res.json(records);
  });

  /**
   * GET /api/unwrap/:id
   * Document text with hard-wrapped paragraphs joined
   */
  router.get('/unwrap/:id', (req: Request, res: Response) => {
    res.type('text/plain').send(unwrapText(documentText(req.params.id)));
  });

  /**
   * GET /api/search
   * Search titles, properties and content
   * Query params: ?q=budget&limit=20
   */
  router.get('/search', (req: Request, res: Response) => {
    const q = stringParam(req.query.q);

    if (!q) {
      res.status(400).json({ error: 'Query parameter "q" is required' });
      return;
    }

    const limitParam = stringParam(req.query.limit);
    const limit = limitParam ? parseInt(limitParam, 10) : NaN;

    const results = searchHeadlines(q, data.parseResults, {
      limit: !isNaN(limit) && limit > 0 ? limit : undefined
    });

    res.json(results.map(r => ({
      documentId: r.documentId,
      title: r.headline.title,
      path: r.headline.path,
      snippet: r.snippet,
      matchType: r.matchType
    })));
  });

  return router;
}
