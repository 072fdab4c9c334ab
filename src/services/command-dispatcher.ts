import logger from '../utils/logger.js';
import { InvalidCommandArgumentError, MirrorUnavailableError } from '../utils/errors.js';
import type { MediaResolver } from './media-source.js';
import type { PubSubTransport } from '../types/transport.js';
import type {
  CommandEnvelope,
  DeviceMirror,
  PlaybackState,
  PlayMediaExtra,
  PlayMediaInfo,
} from '../types/media-player.js';

const SUPPORTED_MEDIA_TYPE_PREFIXES = ['music', 'audio/', 'provider'];

export interface CommandDispatcherOptions {
  resolver: MediaResolver;
  /** Title shown when playMedia metadata carries none. */
  defaultTitle: string;
  /** Called after every optimistic local change. */
  onChange: () => void;
}

export interface DisplayMetadata {
  title: string;
  artist: string | null;
  albumName: string | null;
  albumArtist: string | null;
  imageUrl: string | null;
}

export function isSupportedMediaType(mediaType: string): boolean {
  return SUPPORTED_MEDIA_TYPE_PREFIXES.some((prefix) => mediaType.startsWith(prefix));
}

export function extractDisplayMetadata(extra: PlayMediaExtra | undefined, defaultTitle: string): DisplayMetadata {
  const metadata = extra?.metadata ?? {};
  const images = metadata.images;
  const firstImageUrl = Array.isArray(images) && images.length > 0 ? images[0].url : undefined;

  return {
    title: metadata.title || defaultTitle,
    artist: metadata.artist ?? null,
    albumName: metadata.album_name || metadata.albumtitle || null,
    albumArtist: metadata.album_artist || metadata.albumartist || null,
    imageUrl: firstImageUrl ? firstImageUrl : metadata.imageUrl ?? null,
  };
}

/**
 * Sends player commands to the agent on its command topic. Commands that have
 * a predictable outcome update the mirror right away; the next snapshot from
 * the agent overwrites whatever was guessed here.
 *
 * Note that stop, turnOff and pause all go out as "pause" and mute is sent
 * without the desired state: the agent only understands those.
 */
export class CommandDispatcher {
  constructor(
    private readonly mirror: DeviceMirror,
    private readonly transport: PubSubTransport,
    private readonly options: CommandDispatcherOptions
  ) {}

  async turnOff(): Promise<void> {
    this.setPlayback('idle');
    await this.send('pause');
  }

  async play(): Promise<void> {
    this.setPlayback('playing');
    await this.send('play');
  }

  async pause(): Promise<void> {
    this.setPlayback('paused');
    await this.send('pause');
  }

  async stop(): Promise<void> {
    this.setPlayback('idle');
    await this.send('pause');
  }

  async next(): Promise<void> {
    await this.send('next');
  }

  async previous(): Promise<void> {
    await this.send('previous');
  }

  async volumeUp(): Promise<void> {
    await this.send('volumeup');
  }

  async volumeDown(): Promise<void> {
    await this.send('volumedown');
  }

  // The agent toggles; it has no "set mute" command.
  async mute(_muted: boolean): Promise<void> {
    await this.send('mute');
  }

  /** Volume stays as last reported until the agent confirms the new level. */
  async setVolume(fraction: number): Promise<void> {
    if (!Number.isFinite(fraction) || fraction < 0 || fraction > 1) {
      this.reject(`Invalid volume level ${fraction}, expected a value between 0 and 1`);
    }
    await this.send('setvolume', Math.round(fraction * 100));
  }

  async seek(positionSeconds: number): Promise<void> {
    if (!Number.isFinite(positionSeconds) || positionSeconds < 0) {
      this.reject(`Invalid seek position ${positionSeconds}`);
    }

    this.mirror.track.positionSeconds = positionSeconds;
    this.mirror.track.positionTimestamp = new Date();
    this.options.onChange();
    await this.send('seek', positionSeconds);
  }

  async playMedia(mediaType: string, mediaId: string, extra?: PlayMediaExtra): Promise<void> {
    if (!isSupportedMediaType(mediaType)) {
      this.reject(`Invalid media type ${JSON.stringify(mediaType)}. Only music is supported!`);
    }

    logger.debug(`Playing media: ${mediaType}, ${mediaId}`, { entityId: this.mirror.entityId, extra });

    const { resolver } = this.options;
    let url = mediaId;
    if (resolver.isMediaSourceId(url)) {
      const resolved = await resolver.resolve(url, this.mirror.entityId);
      url = resolved.url;
    }
    url = resolver.processPlayMediaUrl(url);

    // The mirror may have been torn down while the source was resolving
    if (this.mirror.destroyed) {
      throw new MirrorUnavailableError(this.mirror.entityId, 'destroyed');
    }

    const display = extractDisplayMetadata(extra, this.options.defaultTitle);
    this.mirror.track = {
      ...this.mirror.track,
      title: display.title,
      artist: display.artist,
      albumName: display.albumName,
      albumArtist: display.albumArtist,
      imageUrl: display.imageUrl,
      mediaId: url,
    };
    this.mirror.playback = 'playing';
    this.options.onChange();

    const info: PlayMediaInfo = {
      title: display.title,
      artist: display.artist,
      albumtitle: display.albumName,
      albumartist: display.albumArtist,
      image_url: display.imageUrl,
    };
    await this.send('playmedia', url, info);
  }

  private setPlayback(playback: PlaybackState): void {
    this.mirror.playback = playback;
    this.options.onChange();
  }

  private reject(message: string): never {
    logger.error(message, { entityId: this.mirror.entityId });
    throw new InvalidCommandArgumentError(message);
  }

  private async send(command: string, data: unknown = null, info: PlayMediaInfo | null = null): Promise<void> {
    logger.debug(`Sending command: ${command}`, { topic: this.mirror.commandTopic });

    const envelope: CommandEnvelope = { command, data, info };
    await this.transport.publish(this.mirror.commandTopic, JSON.stringify(envelope));
  }
}
