import { describe, it, expect, beforeEach, vi } from 'vitest';
import { MediaPlayerManager } from './media-player-manager.js';
import { InMemoryDeviceRegistry } from './device-registry.js';
import { ThumbnailStore } from './thumbnail-store.js';
import { FakeTransport } from '../test/fake-transport.js';
import { DeviceNotFoundError } from '../utils/errors.js';
import type { MediaResolver } from './media-source.js';
import type { MediaPlayerView } from '../types/media-player.js';

describe('MediaPlayerManager', () => {
  let transport: FakeTransport;
  let registry: InMemoryDeviceRegistry;
  let manager: MediaPlayerManager;

  beforeEach(() => {
    transport = new FakeTransport();
    registry = new InMemoryDeviceRegistry([
      { uniqueId: 'desk-pc', name: 'Desk' },
      { uniqueId: 'tv-pc', name: 'TV' },
    ]);
    const resolver: MediaResolver = {
      isMediaSourceId: () => false,
      resolve: vi.fn(),
      processPlayMediaUrl: (url: string) => url,
      browse: vi.fn(),
    };
    manager = new MediaPlayerManager({
      transport,
      registry,
      resolver,
      thumbnails: new ThumbnailStore(),
      defaultTitle: 'Home Assistant',
    });
  });

  it('sets up a mirror per registered device and skips unknown ones', async () => {
    const players = await manager.setup(['desk-pc', 'missing', 'tv-pc']);

    expect(players.map((player) => player.entityId)).toEqual(['media_player.desk', 'media_player.tv']);
    expect(manager.list()).toHaveLength(2);
    expect(transport.handlers.size).toBe(4);
  });

  it('fails to add a device the registry does not know', async () => {
    await expect(manager.addDevice('missing')).rejects.toBeInstanceOf(DeviceNotFoundError);
    expect(manager.list()).toHaveLength(0);
    expect(transport.subscriptions).toHaveLength(0);
  });

  it('refuses a second mirror for the same entity', async () => {
    registry.add({ uniqueId: 'desk-pc-2', name: 'desk' });
    await manager.addDevice('desk-pc');

    await expect(manager.addDevice('desk-pc-2')).rejects.toThrow('media_player.desk already exists');
    expect(transport.subscriptions).toHaveLength(2);
  });

  it('emits state_changed with the new view for each applied snapshot', async () => {
    const views: MediaPlayerView[] = [];
    manager.on('state_changed', (view) => views.push(view));
    await manager.setup(['desk-pc']);

    transport.deliver('hass.agent/media_player/Desk/state', '{"state":"playing","volume":20,"muted":false}');
    transport.deliver('hass.agent/media_player/Desk/state', 'garbage');

    expect(views).toHaveLength(1);
    expect(views[0].entityId).toBe('media_player.desk');
    expect(views[0].state).toBe('playing');
    expect(views[0].volumeLevel).toBe(0.2);
  });

  it('emits state_changed for optimistic commands', async () => {
    const listener = vi.fn();
    manager.on('state_changed', listener);
    const [player] = await manager.setup(['desk-pc']);

    await player.pause();

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0][0].state).toBe('paused');
  });

  it('removes a mirror and drops its subscriptions', async () => {
    const removed = vi.fn();
    manager.on('player:removed', removed);
    await manager.setup(['desk-pc', 'tv-pc']);

    await expect(manager.removeDevice('media_player.desk')).resolves.toBe(true);
    await expect(manager.removeDevice('media_player.desk')).resolves.toBe(false);

    expect(manager.get('media_player.desk')).toBeUndefined();
    expect(removed).toHaveBeenCalledWith('media_player.desk');
    expect(Array.from(transport.handlers.keys())).toEqual([
      'hass.agent/media_player/TV/state',
      'hass.agent/media_player/TV/thumbnail',
    ]);
  });

  it('tears everything down on shutdown', async () => {
    const players = await manager.setup(['desk-pc', 'tv-pc']);

    await manager.shutdown();

    expect(manager.list()).toHaveLength(0);
    expect(transport.handlers.size).toBe(0);
    expect(players.every((player) => player.destroyed)).toBe(true);
  });
});
