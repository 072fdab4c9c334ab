import express, { Express } from 'express';
import cors from 'cors';
import { createMediaPlayerRoutes } from './routes/media-players.js';
import { createAuthMiddleware, type AuthOptions } from './middleware/auth.js';
import { errorHandler } from './middleware/error.js';
import type { MediaPlayerManager } from './services/media-player-manager.js';
import type { ThumbnailStore } from './services/thumbnail-store.js';

export interface AppDependencies {
  manager: MediaPlayerManager;
  thumbnails: ThumbnailStore;
  /** Directory served under /media/local for resolved media-source URLs. */
  mediaDir?: string;
  /** Defaults to the configured API key. */
  auth?: AuthOptions;
}

export function createApp({ manager, thumbnails, mediaDir, auth }: AppDependencies): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Health check endpoint (no auth required)
  app.get('/health', (_req, res) => {
    res.json({
      success: true,
      status: 'healthy',
      players: manager.list().length,
      timestamp: new Date(),
      uptime: process.uptime(),
    });
  });

  // The agent downloads resolved media from here, without an API key
  if (mediaDir) {
    app.use('/media/local', express.static(mediaDir));
  }

  // API routes (with auth)
  app.use('/api', createAuthMiddleware(auth), createMediaPlayerRoutes(manager, thumbnails));

  // Error handling
  app.use(errorHandler);

  return app;
}
