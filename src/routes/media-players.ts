import { Router, Request, Response } from 'express';
import { z } from 'zod';
import logger from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { httpStatusFor } from '../middleware/error.js';
import type { AgentMirror } from '../services/agent-mirror.js';
import type { MediaPlayerManager } from '../services/media-player-manager.js';
import type { ThumbnailStore } from '../services/thumbnail-store.js';

const imageSchema = z.object({ url: z.string().optional() }).passthrough();

const playMediaExtraSchema = z.object({
  metadata: z.object({
    title: z.string().nullish(),
    artist: z.string().nullish(),
    album_name: z.string().nullish(),
    albumtitle: z.string().nullish(),
    album_artist: z.string().nullish(),
    albumartist: z.string().nullish(),
    images: z.array(imageSchema).nullish(),
    imageUrl: z.string().nullish(),
  }).passthrough().nullish(),
}).passthrough();

// Request validation schemas
const commandSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('turn_off') }),
  z.object({ action: z.literal('play') }),
  z.object({ action: z.literal('pause') }),
  z.object({ action: z.literal('stop') }),
  z.object({ action: z.literal('next') }),
  z.object({ action: z.literal('previous') }),
  z.object({ action: z.literal('volume_up') }),
  z.object({ action: z.literal('volume_down') }),
  z.object({ action: z.literal('mute'), muted: z.boolean().default(true) }),
  z.object({ action: z.literal('set_volume'), volume: z.number() }),
  z.object({ action: z.literal('seek'), position: z.number() }),
  z.object({
    action: z.literal('play_media'),
    mediaType: z.string().min(1),
    mediaId: z.string().min(1),
    extra: playMediaExtraSchema.optional(),
  }),
]);

export type PlayerCommand = z.infer<typeof commandSchema>;

export async function runCommand(player: AgentMirror, command: PlayerCommand): Promise<void> {
  switch (command.action) {
    case 'turn_off':
      return player.turnOff();
    case 'play':
      return player.play();
    case 'pause':
      return player.pause();
    case 'stop':
      return player.stopPlayback();
    case 'next':
      return player.nextTrack();
    case 'previous':
      return player.previousTrack();
    case 'volume_up':
      return player.volumeUp();
    case 'volume_down':
      return player.volumeDown();
    case 'mute':
      return player.mute(command.muted);
    case 'set_volume':
      return player.setVolume(command.volume);
    case 'seek':
      return player.seek(command.position);
    case 'play_media':
      return player.playMedia(command.mediaType, command.mediaId, command.extra);
  }
}

export function createMediaPlayerRoutes(manager: MediaPlayerManager, thumbnails: ThumbnailStore): Router {
  const router = Router();

  // Get all media players
  router.get('/media_players', (_req: Request, res: Response) => {
    const players = manager.list().map((player) => player.getState());
    res.json({
      success: true,
      players,
      count: players.length,
    });
  });

  // Get specific media player
  router.get('/media_players/:entityId', (req: Request, res: Response) => {
    const player = manager.get(req.params.entityId);
    if (!player) {
      res.status(404).json({
        success: false,
        error: 'Media player not found',
      });
      return;
    }

    res.json({
      success: true,
      player: player.getState(),
    });
  });

  // Send a command to the agent behind a media player
  router.post('/media_players/:entityId/commands', async (req: Request, res: Response) => {
    const { entityId } = req.params;
    const validation = commandSchema.safeParse(req.body);

    if (!validation.success) {
      return res.status(400).json({
        success: false,
        error: 'Invalid request',
        details: validation.error.errors,
      });
    }

    const player = manager.get(entityId);
    if (!player) {
      return res.status(404).json({
        success: false,
        error: 'Media player not found',
      });
    }

    try {
      await runCommand(player, validation.data);
    } catch (error) {
      // Anything the bridge did not raise came from the transport or the media resolver
      const status = httpStatusFor(error, 502);
      if (status === 502) {
        logger.error(`Command ${validation.data.action} for ${entityId} failed:`, error);
      }
      return res.status(status).json({
        success: false,
        error: errorMessage(error),
      });
    }

    logger.info(`Command ${validation.data.action} sent to ${entityId}`);
    return res.json({
      success: true,
      player: player.getState(),
    });
  });

  // Browse playable media for a media player
  router.get('/media_players/:entityId/browse', async (req: Request, res: Response) => {
    const player = manager.get(req.params.entityId);
    if (!player) {
      return res.status(404).json({
        success: false,
        error: 'Media player not found',
      });
    }

    const mediaContentId = typeof req.query.mediaContentId === 'string' ? req.query.mediaContentId : undefined;
    try {
      const media = await player.browseMedia(mediaContentId);
      return res.json({
        success: true,
        media,
      });
    } catch (error) {
      logger.warn(`Browse failed for ${req.params.entityId}: ${errorMessage(error)}`);
      return res.status(404).json({
        success: false,
        error: errorMessage(error),
      });
    }
  });

  // Latest thumbnail pushed by the agent
  router.get('/hass_agent/:entityId/thumbnail.png', (req: Request, res: Response) => {
    const image = thumbnails.get(req.params.entityId);
    if (!image) {
      res.status(404).json({
        success: false,
        error: 'No thumbnail available',
      });
      return;
    }

    res.set('Cache-Control', 'no-cache');
    res.type('png').send(image);
  });

  return router;
}
