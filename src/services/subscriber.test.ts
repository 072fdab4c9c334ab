import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Subscriber } from './subscriber.js';
import { ThumbnailStore } from './thumbnail-store.js';
import { emptyTrack } from './state-reconciler.js';
import { FakeTransport } from '../test/fake-transport.js';
import type { DeviceMirror, QoS } from '../types/media-player.js';
import type { MessageHandler } from '../types/transport.js';

const T0 = new Date('2026-01-01T00:00:00Z').getTime();
const STATE_TOPIC = 'hass.agent/media_player/Desk/state';
const THUMBNAIL_TOPIC = 'hass.agent/media_player/Desk/thumbnail';

function createMirror(): DeviceMirror {
  return {
    deviceId: 'desk-pc',
    deviceName: 'Desk',
    entityId: 'media_player.desk',
    commandTopic: 'hass.agent/media_player/Desk/cmd',
    playback: 'idle',
    volume: 0,
    muted: false,
    track: emptyTrack(),
    lastUpdated: 0,
    destroyed: false,
  };
}

const statePayload = JSON.stringify({
  state: 'Playing',
  volume: 65,
  muted: false,
  title: 'Song A',
  artist: 'Artist A',
  albumtitle: 'Album A',
  albumartist: 'Album Artist A',
  duration: 180,
  currentposition: 12,
});

// Holds every subscribe call until the test releases it
class GatedTransport extends FakeTransport {
  private gates: Array<() => void> = [];

  get waiting(): number {
    return this.gates.length;
  }

  async subscribe(topic: string, handler: MessageHandler, qos: QoS): Promise<void> {
    await new Promise<void>((resolve) => this.gates.push(resolve));
    return super.subscribe(topic, handler, qos);
  }

  release(): void {
    const gates = this.gates;
    this.gates = [];
    for (const open of gates) open();
  }
}

const settle = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('Subscriber', () => {
  let mirror: DeviceMirror;
  let transport: FakeTransport;
  let thumbnails: ThumbnailStore;
  let onChange: ReturnType<typeof vi.fn>;
  let subscriber: Subscriber;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);

    mirror = createMirror();
    transport = new FakeTransport();
    thumbnails = new ThumbnailStore();
    onChange = vi.fn();
    subscriber = new Subscriber(mirror, transport, thumbnails, onChange);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('subscribes to the state and thumbnail topics at QoS 0', async () => {
    await subscriber.subscribe();

    expect(transport.subscriptions).toEqual([
      { topic: STATE_TOPIC, qos: 0 },
      { topic: THUMBNAIL_TOPIC, qos: 0 },
    ]);
    expect(subscriber.active).toBe(true);
  });

  it('does not subscribe twice', async () => {
    await subscriber.subscribe();
    await subscriber.subscribe();

    expect(transport.subscriptions).toHaveLength(2);
  });

  it('shares one attempt between overlapping subscribe calls', async () => {
    await Promise.all([subscriber.subscribe(), subscriber.subscribe()]);
    transport.deliver(STATE_TOPIC, statePayload);

    expect(transport.subscriptions).toHaveLength(2);
    expect(transport.handlers.get(STATE_TOPIC)?.size).toBe(1);
    expect(onChange).toHaveBeenCalledTimes(1);
  });

  it('applies state messages and notifies once', async () => {
    await subscriber.subscribe();

    transport.deliver(STATE_TOPIC, statePayload);

    expect(mirror.playback).toBe('playing');
    expect(mirror.volume).toBe(65);
    expect(mirror.track.title).toBe('Song A');
    expect(mirror.lastUpdated).toBe(T0);
    expect(onChange).toHaveBeenCalledTimes(1);
  });

  it('drops malformed state messages without touching the mirror', async () => {
    await subscriber.subscribe();

    transport.deliver(STATE_TOPIC, '{"state": "playing", "volume": 10');
    transport.deliver(STATE_TOPIC, '{"state": "playing", "muted": true}');

    expect(mirror).toEqual(createMirror());
    expect(onChange).not.toHaveBeenCalled();
  });

  it('stores thumbnails and points the image URL at them', async () => {
    await subscriber.subscribe();
    const image = Buffer.from([0x89, 0x50, 0x4e, 0x47]);

    transport.deliver(THUMBNAIL_TOPIC, image);

    expect(thumbnails.get('media_player.desk')).toEqual(image);
    expect(mirror.track.imageUrl).toBe('/api/hass_agent/media_player.desk/thumbnail.png?time=1767225600');
  });

  it('changes the image URL on every thumbnail', async () => {
    await subscriber.subscribe();

    transport.deliver(THUMBNAIL_TOPIC, Buffer.from([1]));
    vi.setSystemTime(T0 + 1500);
    transport.deliver(THUMBNAIL_TOPIC, Buffer.from([2]));

    expect(mirror.track.imageUrl).toBe('/api/hass_agent/media_player.desk/thumbnail.png?time=1767225601.5');
    expect(thumbnails.get('media_player.desk')).toEqual(Buffer.from([2]));
  });

  it('ignores messages for a destroyed mirror', async () => {
    await subscriber.subscribe();
    mirror.destroyed = true;

    transport.deliver(STATE_TOPIC, statePayload);
    transport.deliver(THUMBNAIL_TOPIC, Buffer.from([1]));

    expect(mirror.playback).toBe('idle');
    expect(thumbnails.get('media_player.desk')).toBeUndefined();
    expect(onChange).not.toHaveBeenCalled();
  });

  it('unsubscribes both topics and tolerates a second teardown', async () => {
    await subscriber.subscribe();

    await subscriber.unsubscribe();
    await subscriber.unsubscribe();

    expect(transport.handlers.size).toBe(0);
    expect(subscriber.active).toBe(false);
  });

  it('can be torn down without ever subscribing', async () => {
    await expect(subscriber.unsubscribe()).resolves.toBeUndefined();
  });

  it('rolls back the state subscription when the thumbnail subscription fails', async () => {
    transport.failSubscribeOn = THUMBNAIL_TOPIC;

    await expect(subscriber.subscribe()).rejects.toThrow('rejected by the broker');

    expect(transport.handlers.size).toBe(0);
    expect(subscriber.active).toBe(false);
  });

  it('still unsubscribes the other topic when one unsubscribe fails', async () => {
    await subscriber.subscribe();
    transport.failUnsubscribeOn = STATE_TOPIC;

    await expect(subscriber.unsubscribe()).rejects.toThrow(`Unsubscribe from ${STATE_TOPIC} failed`);

    expect(Array.from(transport.handlers.keys())).toEqual([STATE_TOPIC]);
    expect(subscriber.active).toBe(false);
  });
});

describe('Subscriber teardown while subscribing', () => {
  let mirror: DeviceMirror;
  let transport: GatedTransport;
  let subscriber: Subscriber;

  beforeEach(() => {
    mirror = createMirror();
    transport = new GatedTransport();
    subscriber = new Subscriber(mirror, transport, new ThumbnailStore(), vi.fn());
  });

  it('drops the state subscription that completes after teardown', async () => {
    const subscribing = subscriber.subscribe();
    expect(transport.waiting).toBe(1);

    mirror.destroyed = true;
    await subscriber.unsubscribe();
    transport.release();
    await subscribing;

    expect(transport.handlers.size).toBe(0);
    expect(transport.waiting).toBe(0);
    expect(subscriber.active).toBe(false);
  });

  it('drops both subscriptions when teardown lands between them', async () => {
    const subscribing = subscriber.subscribe();
    transport.release();
    await settle();
    expect(Array.from(transport.handlers.keys())).toEqual([STATE_TOPIC]);
    expect(transport.waiting).toBe(1);

    mirror.destroyed = true;
    await subscriber.unsubscribe();
    transport.release();
    await subscribing;

    expect(transport.handlers.size).toBe(0);
    expect(subscriber.active).toBe(false);
  });
});
