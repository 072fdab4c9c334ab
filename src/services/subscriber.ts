import logger from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { applySnapshot, decodeSnapshot, type StateSnapshot } from './state-reconciler.js';
import { stateTopic, thumbnailTopic } from './topics.js';
import type { ThumbnailStore } from './thumbnail-store.js';
import type { DeviceMirror } from '../types/media-player.js';
import type { MessageHandler, PubSubTransport } from '../types/transport.js';

interface ActiveSubscription {
  topic: string;
  handler: MessageHandler;
}

/**
 * Holds the state and thumbnail subscriptions of one mirror and feeds
 * inbound messages into it.
 */
export class Subscriber {
  private subscriptions: ActiveSubscription[] = [];
  private pending: Promise<void> | null = null;

  constructor(
    private readonly mirror: DeviceMirror,
    private readonly transport: PubSubTransport,
    private readonly thumbnails: ThumbnailStore,
    private readonly onChange: () => void
  ) {}

  get active(): boolean {
    return this.subscriptions.length > 0;
  }

  /** Overlapping calls share one in-flight subscription attempt. */
  async subscribe(): Promise<void> {
    if (this.active) return;
    if (!this.pending) {
      this.pending = this.subscribeAll().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  /**
   * Removes every active subscription. All topics are attempted even when one
   * of them fails; the first failure is rethrown afterwards.
   */
  async unsubscribe(): Promise<void> {
    const subscriptions = this.subscriptions;
    this.subscriptions = [];
    const results = await Promise.allSettled(
      subscriptions.map(({ topic, handler }) => this.transport.unsubscribe(topic, handler))
    );
    const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failure) {
      throw failure.reason;
    }
  }

  private async subscribeAll(): Promise<void> {
    const wanted: ActiveSubscription[] = [
      { topic: stateTopic(this.mirror.deviceName), handler: (topic, payload) => this.handleState(topic, payload) },
      { topic: thumbnailTopic(this.mirror.deviceName), handler: (topic, payload) => this.handleThumbnail(topic, payload) },
    ];

    for (const subscription of wanted) {
      if (this.mirror.destroyed) return;
      try {
        await this.transport.subscribe(subscription.topic, subscription.handler, 0);
      } catch (error) {
        // Leave nothing half-subscribed
        await this.unsubscribe();
        throw error;
      }
      if (this.mirror.destroyed) {
        // Torn down while the broker was answering
        await this.transport.unsubscribe(subscription.topic, subscription.handler);
        return;
      }
      this.subscriptions.push(subscription);
    }
  }

  private handleState(topic: string, payload: Buffer): void {
    if (this.mirror.destroyed) return;

    let snapshot: StateSnapshot;
    try {
      snapshot = decodeSnapshot(payload, topic);
    } catch (error) {
      logger.warn(`Dropping state message for ${this.mirror.entityId}: ${errorMessage(error)}`, { topic });
      return;
    }

    applySnapshot(this.mirror, snapshot);
    this.onChange();
  }

  private handleThumbnail(_topic: string, payload: Buffer): void {
    if (this.mirror.destroyed) return;

    this.thumbnails.put(this.mirror.entityId, payload);
    this.mirror.track.imageUrl = this.thumbnails.imageUrl(this.mirror.entityId);
  }
}
