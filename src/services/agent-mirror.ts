import { CommandDispatcher } from './command-dispatcher.js';
import { Subscriber } from './subscriber.js';
import { emptyTrack, isAvailable } from './state-reconciler.js';
import { commandTopic } from './topics.js';
import { MirrorUnavailableError } from '../utils/errors.js';
import type { DeviceEntry } from './device-registry.js';
import type { BrowseNode, MediaResolver } from './media-source.js';
import type { ThumbnailStore } from './thumbnail-store.js';
import type { PubSubTransport } from '../types/transport.js';
import type {
  DeviceInfo,
  DeviceMirror,
  MediaPlayerFeature,
  MediaPlayerView,
  PlayMediaExtra,
} from '../types/media-player.js';

export const DEVICE_DOMAIN = 'hass_agent';

export const SUPPORTED_FEATURES: MediaPlayerFeature[] = [
  'volume_mute',
  'pause',
  'stop',
  'previous_track',
  'next_track',
  'volume_step',
  'play',
  'play_media',
  'seek',
  'browse_media',
  'volume_set',
  'turn_off',
];

export interface AgentMirrorOptions {
  transport: PubSubTransport;
  thumbnails: ThumbnailStore;
  resolver: MediaResolver;
  defaultTitle: string;
  onChange?: (mirror: AgentMirror) => void;
}

export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/**
 * One remote media agent as seen by the host: mirrored player state plus
 * the commands that can be sent to it.
 */
export class AgentMirror {
  readonly entityId: string;
  readonly uniqueId: string;
  readonly deviceInfo: DeviceInfo;

  private readonly mirror: DeviceMirror;
  private readonly subscriber: Subscriber;
  private readonly dispatcher: CommandDispatcher;
  private started = false;

  constructor(device: DeviceEntry, private readonly options: AgentMirrorOptions) {
    this.entityId = `media_player.${slugify(device.name) || slugify(device.uniqueId)}`;
    this.uniqueId = `media_player_${device.uniqueId}`;
    this.deviceInfo = {
      identifiers: [[DEVICE_DOMAIN, device.uniqueId]],
      name: device.name,
      manufacturer: device.manufacturer,
      model: device.model,
      swVersion: device.swVersion,
    };

    this.mirror = {
      deviceId: device.uniqueId,
      deviceName: device.name,
      entityId: this.entityId,
      commandTopic: commandTopic(device.name),
      playback: 'idle',
      volume: 0,
      muted: false,
      track: emptyTrack(),
      lastUpdated: 0,
      destroyed: false,
    };

    const notify = () => this.notify();
    this.subscriber = new Subscriber(this.mirror, options.transport, options.thumbnails, notify);
    this.dispatcher = new CommandDispatcher(this.mirror, options.transport, {
      resolver: options.resolver,
      defaultTitle: options.defaultTitle,
      onChange: notify,
    });
  }

  get name(): string {
    return this.mirror.deviceName;
  }

  get destroyed(): boolean {
    return this.mirror.destroyed;
  }

  async start(): Promise<void> {
    if (this.mirror.destroyed) {
      throw new MirrorUnavailableError(this.entityId, 'destroyed');
    }
    await this.subscriber.subscribe();
    if (this.mirror.destroyed) {
      throw new MirrorUnavailableError(this.entityId, 'destroyed');
    }
    this.started = true;
  }

  /** Unsubscribes and freezes the mirror. Safe to call more than once. */
  async stop(): Promise<void> {
    this.mirror.destroyed = true;
    this.started = false;
    this.options.thumbnails.delete(this.entityId);
    await this.subscriber.unsubscribe();
  }

  isAvailable(now: number = Date.now()): boolean {
    return isAvailable(this.mirror, now);
  }

  getState(now: number = Date.now()): MediaPlayerView {
    const { track } = this.mirror;
    return {
      entityId: this.entityId,
      uniqueId: this.uniqueId,
      name: this.mirror.deviceName,
      available: this.isAvailable(now),
      state: this.mirror.playback,
      volumeLevel: this.mirror.volume / 100,
      isVolumeMuted: this.mirror.muted,
      mediaTitle: track.title,
      mediaArtist: track.artist,
      mediaAlbumName: track.albumName,
      mediaAlbumArtist: track.albumArtist,
      mediaDuration: track.durationSeconds,
      mediaPosition: track.positionSeconds,
      mediaPositionUpdatedAt: track.positionTimestamp ? track.positionTimestamp.toISOString() : null,
      mediaImageUrl: track.imageUrl,
      mediaContentId: track.mediaId,
      mediaContentType: 'music',
      deviceClass: 'speaker',
      supportedFeatures: [...SUPPORTED_FEATURES],
      deviceInfo: {
        ...this.deviceInfo,
        identifiers: this.deviceInfo.identifiers.map(([domain, id]): [string, string] => [domain, id]),
      },
      lastUpdated: this.mirror.lastUpdated > 0 ? new Date(this.mirror.lastUpdated).toISOString() : null,
    };
  }

  async turnOff(): Promise<void> {
    return this.ready().turnOff();
  }

  async play(): Promise<void> {
    return this.ready().play();
  }

  async pause(): Promise<void> {
    return this.ready().pause();
  }

  async stopPlayback(): Promise<void> {
    return this.ready().stop();
  }

  async nextTrack(): Promise<void> {
    return this.ready().next();
  }

  async previousTrack(): Promise<void> {
    return this.ready().previous();
  }

  async volumeUp(): Promise<void> {
    return this.ready().volumeUp();
  }

  async volumeDown(): Promise<void> {
    return this.ready().volumeDown();
  }

  async mute(muted: boolean): Promise<void> {
    return this.ready().mute(muted);
  }

  async setVolume(fraction: number): Promise<void> {
    return this.ready().setVolume(fraction);
  }

  async seek(positionSeconds: number): Promise<void> {
    return this.ready().seek(positionSeconds);
  }

  async playMedia(mediaType: string, mediaId: string, extra?: PlayMediaExtra): Promise<void> {
    return this.ready().playMedia(mediaType, mediaId, extra);
  }

  /** Browse the media source, keeping only audio items and folders. */
  async browseMedia(mediaContentId?: string): Promise<BrowseNode> {
    const node = await this.options.resolver.browse(mediaContentId);
    return {
      ...node,
      children: node.children?.filter(
        (child) => child.canExpand || child.mediaContentType.startsWith('audio/')
      ),
    };
  }

  private ready(): CommandDispatcher {
    if (this.mirror.destroyed) {
      throw new MirrorUnavailableError(this.entityId, 'destroyed');
    }
    if (!this.started) {
      throw new MirrorUnavailableError(this.entityId, 'not_started');
    }
    return this.dispatcher;
  }

  private notify(): void {
    if (this.mirror.destroyed) return;
    this.options.onChange?.(this);
  }
}
