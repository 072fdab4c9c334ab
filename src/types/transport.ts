import type { QoS } from './media-player.js';

export type MessageHandler = (topic: string, payload: Buffer) => void;

export interface PublishOptions {
  qos?: QoS;
  retain?: boolean;
}

/**
 * Publish/subscribe transport the mirrors run on. The MQTT client is the
 * production implementation; tests use an in-process fake.
 */
export interface PubSubTransport {
  subscribe(topic: string, handler: MessageHandler, qos: QoS): Promise<void>;
  unsubscribe(topic: string, handler: MessageHandler): Promise<void>;
  publish(topic: string, payload: string | Buffer, options?: PublishOptions): Promise<void>;
}
