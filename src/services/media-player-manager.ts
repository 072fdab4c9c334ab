import { EventEmitter } from 'events';
import logger from '../utils/logger.js';
import { DeviceNotFoundError } from '../utils/errors.js';
import { AgentMirror } from './agent-mirror.js';
import type { DeviceRegistry } from './device-registry.js';
import type { MediaResolver } from './media-source.js';
import type { ThumbnailStore } from './thumbnail-store.js';
import type { PubSubTransport } from '../types/transport.js';
import type { MediaPlayerView } from '../types/media-player.js';

export interface MediaPlayerManagerEvents {
  'state_changed': (view: MediaPlayerView) => void;
  'player:added': (entityId: string) => void;
  'player:removed': (entityId: string) => void;
}

export declare interface MediaPlayerManager {
  on<U extends keyof MediaPlayerManagerEvents>(
    event: U, listener: MediaPlayerManagerEvents[U]
  ): this;
  off<U extends keyof MediaPlayerManagerEvents>(
    event: U, listener: MediaPlayerManagerEvents[U]
  ): this;
  emit<U extends keyof MediaPlayerManagerEvents>(
    event: U, ...args: Parameters<MediaPlayerManagerEvents[U]>
  ): boolean;
}

export interface MediaPlayerManagerOptions {
  transport: PubSubTransport;
  registry: DeviceRegistry;
  resolver: MediaResolver;
  thumbnails: ThumbnailStore;
  defaultTitle: string;
}

export class MediaPlayerManager extends EventEmitter {
  private players: Map<string, AgentMirror> = new Map();

  constructor(private readonly options: MediaPlayerManagerOptions) {
    super();
  }

  /**
   * Create and subscribe a mirror for each registry id. A device that cannot
   * be set up is logged and skipped; the rest still start.
   */
  async setup(uniqueIds: string[]): Promise<AgentMirror[]> {
    const started: AgentMirror[] = [];
    for (const uniqueId of uniqueIds) {
      try {
        started.push(await this.addDevice(uniqueId));
      } catch (error) {
        logger.error(`Failed to set up media player for device ${uniqueId}:`, error);
      }
    }
    return started;
  }

  async addDevice(uniqueId: string): Promise<AgentMirror> {
    const device = await this.options.registry.getDevice(uniqueId);
    if (!device) {
      throw new DeviceNotFoundError(uniqueId);
    }

    const player = new AgentMirror(device, {
      transport: this.options.transport,
      thumbnails: this.options.thumbnails,
      resolver: this.options.resolver,
      defaultTitle: this.options.defaultTitle,
      onChange: (mirror) => this.emit('state_changed', mirror.getState()),
    });

    if (this.players.has(player.entityId)) {
      throw new Error(`Media player ${player.entityId} already exists`);
    }

    await player.start();
    this.players.set(player.entityId, player);
    logger.info(`Media player ${player.entityId} added for device ${device.name}`);
    this.emit('player:added', player.entityId);
    return player;
  }

  async removeDevice(entityId: string): Promise<boolean> {
    const player = this.players.get(entityId);
    if (!player) return false;

    this.players.delete(entityId);
    await player.stop();
    logger.info(`Media player ${entityId} removed`);
    this.emit('player:removed', entityId);
    return true;
  }

  get(entityId: string): AgentMirror | undefined {
    return this.players.get(entityId);
  }

  list(): AgentMirror[] {
    return Array.from(this.players.values());
  }

  async shutdown(): Promise<void> {
    for (const entityId of Array.from(this.players.keys())) {
      try {
        await this.removeDevice(entityId);
      } catch (error) {
        logger.warn(`Error while removing ${entityId}`, error);
      }
    }
  }
}
