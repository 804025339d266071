import cors from 'cors';
import express from 'express';
import type { Request, Response } from 'express';
import crypto from 'node:crypto';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { generatePlaylist, type PlaylistPipelineDeps, type PlaylistRun } from '../pipeline/generatePlaylist';
import { ConfigurationError, errorMessage, isPlaylistError } from '../playlist/errors';
import type { Credentials } from '../playlist/types';

export const PLAYLIST_CONTENT_TYPE = 'application/x-mpegurl; charset=utf-8';

const headerValue = (req: Request, name: string): string => String(req.get(name) || '').trim();

const queryValue = (req: Request, name: string): string => {
  const value = req.query[name];
  return typeof value === 'string' ? value.trim() : '';
};

/**
 * Credentials supplied with the request, if any. Both halves must be present; a lone username
 * or password is a configuration error rather than a silent mix with the configured pair.
 */
export const requestCredentials = (req: Request): Credentials | undefined => {
  const username = headerValue(req, 'x-playlist-username') || queryValue(req, 'username');
  const password = headerValue(req, 'x-playlist-password') || queryValue(req, 'password');
  if (!username && !password) return undefined;
  if (!username || !password) {
    throw new ConfigurationError('Request credentials need both username and password');
  }
  return { username, password };
};

const sendFailure = (res: Response, error: unknown, deps: PlaylistPipelineDeps) => {
  const stage = isPlaylistError(error) ? error.stage : 'internal';
  const status = stage === 'acquisition' ? 502 : 500;
  const message = errorMessage(error);
  if (stage === 'internal') {
    deps.logger.error('Playlist request failed', { error: message });
  } else {
    deps.logger.warn('Playlist request failed', { stage, error: message });
  }
  res.status(status).type('text/plain; charset=utf-8').send(`stage: ${stage}\nerror: ${message}\n`);
};

export const createApp = (deps: PlaylistPipelineDeps) => {
  const app = express();
  app.use(cors());

  app.get('/api/healthz', (_req: Request, res: Response) => {
    res.json({ ok: true, ts: new Date().toISOString() });
  });

  const servePlaylist = async (req: Request, res: Response, requestDeps: PlaylistPipelineDeps) => {
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort(new Error('client disconnected'));
    });

    let run: PlaylistRun;
    try {
      run = await generatePlaylist(requestDeps, { credentials: requestCredentials(req), signal: controller.signal });
    } catch (error) {
      if (controller.signal.aborted) return;
      sendFailure(res, error, requestDeps);
      return;
    }

    res.status(200);
    res.setHeader('Content-Type', PLAYLIST_CONTENT_TYPE);
    res.setHeader('Cache-Control', 'no-store');
    res.setHeader('X-Playlist-Origin', run.origin);
    try {
      await pipeline(Readable.from(run.lines), res);
    } catch (error) {
      // Output already started: the response is torn down, never finished with an error body.
      await run.cancel();
      if (!controller.signal.aborted) {
        requestDeps.logger.error('Playlist stream failed', { origin: run.origin, error: errorMessage(error) });
      }
    }
  };

  app.get(['/playlist.m3u', '/m3u'], (req: Request, res: Response) => {
    const requestDeps = { ...deps, logger: deps.logger.child({ requestId: crypto.randomUUID(), path: req.path }) };
    servePlaylist(req, res, requestDeps).catch((error: unknown) => {
      requestDeps.logger.error('Playlist handler crashed', { error: errorMessage(error) });
      if (!res.headersSent) {
        sendFailure(res, error, requestDeps);
      } else {
        res.destroy();
      }
    });
  });

  return app;
};
