/**
 * Static file server for the chat UI
 *
 * Serves the chat page, styles and the bundled client script.
 */

import { Request, Response } from 'express';
import * as fs from 'fs';
import * as path from 'path';
import * as logger from './lib/utils/logger';
import { trackEvent, trackStaticRequest } from './lib/utils/telemetry';

export const STATIC_PREFIX = '/static';

// Content type mapping
const CONTENT_TYPES: Record<string, string> = {
  '.html': 'text/html; charset=utf-8',
  '.css': 'text/css; charset=utf-8',
  '.js': 'text/javascript; charset=utf-8',
  '.json': 'application/json; charset=utf-8',
  '.map': 'application/json; charset=utf-8',
  '.woff2': 'font/woff2',
  '.woff': 'font/woff',
  '.ttf': 'font/ttf',
};

type Resolution =
  | { ok: true; absolutePath: string }
  | { ok: false; status: 400 | 403; body: string };

/**
 * Maps a request path onto a file inside the static directory
 */
export function resolveStaticPath(staticDir: string, requestPath: string): Resolution {
  let filePath: string;
  try {
    filePath = decodeURIComponent(requestPath);
  } catch {
    return { ok: false, status: 400, body: 'Bad Request' };
  }

  if (filePath === '/' || filePath === '') {
    filePath = '/index.html';
  }

  // Security: Prevent directory traversal
  const root = path.resolve(staticDir);
  const absolutePath = path.join(root, filePath);
  if (filePath.includes('..') || !absolutePath.startsWith(root + path.sep)) {
    return { ok: false, status: 403, body: 'Forbidden' };
  }

  return { ok: true, absolutePath };
}

/**
 * Creates a handler that serves files from the static directory. The
 * request path is taken relative to `prefix`.
 */
export function createStaticHandler(staticDir: string, prefix: string = '') {
  return function webServer(req: Request, res: Response): void {
    const startTime = Date.now();
    const requestPath = prefix ? req.path.slice(prefix.length) : req.path;

    const resolution = resolveStaticPath(staticDir, requestPath);
    if (!resolution.ok) {
      logger.warn('Static file request rejected', { path: requestPath, status: resolution.status });
      trackEvent('WebServer.SecurityViolation', {
        type: resolution.status === 403 ? 'directory_traversal' : 'malformed_path',
        path: requestPath,
      });
      trackStaticRequest('rejected', Date.now() - startTime);

      res.status(resolution.status).type('text/plain').send(resolution.body);
      return;
    }

    const { absolutePath } = resolution;

    try {
      if (!fs.existsSync(absolutePath) || !fs.statSync(absolutePath).isFile()) {
        logger.warn('File not found', { path: requestPath });
        trackStaticRequest('not_found', Date.now() - startTime);

        res.status(404).type('text/plain').send('Not Found');
        return;
      }

      const content = fs.readFileSync(absolutePath);
      const ext = path.extname(absolutePath).toLowerCase();
      const contentType = CONTENT_TYPES[ext] || 'application/octet-stream';

      logger.debug('Serving static file', {
        path: requestPath,
        size: content.length,
        contentType,
      });
      trackStaticRequest('success', Date.now() - startTime);

      res
        .status(200)
        .set({
          'Content-Type': contentType,
          'Cache-Control': 'public, max-age=300', // Cache for 5 minutes
        })
        .send(content);
    } catch (error) {
      logger.logError('Error serving static file', error, { path: requestPath });
      trackStaticRequest('error', Date.now() - startTime);

      res.status(500).type('text/plain').send('Internal Server Error');
    }
  };
}
