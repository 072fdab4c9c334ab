import mqtt, { MqttClient } from 'mqtt';
import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import config from '../config/index.js';
import logger from '../utils/logger.js';
import type { QoS } from '../types/media-player.js';
import type { MessageHandler, PublishOptions, PubSubTransport } from '../types/transport.js';

export interface MqttTransportEvents {
  connected: () => void;
  disconnected: () => void;
}

export declare interface MqttTransport {
  on<U extends keyof MqttTransportEvents>(
    event: U, listener: MqttTransportEvents[U]
  ): this;
  once<U extends keyof MqttTransportEvents>(
    event: U, listener: MqttTransportEvents[U]
  ): this;
  emit<U extends keyof MqttTransportEvents>(
    event: U, ...args: Parameters<MqttTransportEvents[U]>
  ): boolean;
}

export class MqttTransport extends EventEmitter implements PubSubTransport {
  private client: MqttClient;
  // topic -> handlers; the broker subscription lives as long as the set is non-empty
  private handlers: Map<string, Set<MessageHandler>> = new Map();

  constructor() {
    super();

    const brokerUrl = `mqtt://${config.mqtt.brokerHost}:${config.mqtt.brokerPort}`;
    logger.info(`Connecting to MQTT broker at ${brokerUrl}`);

    this.client = mqtt.connect(brokerUrl, {
      clientId: `${config.mqtt.clientIdPrefix}-${uuidv4()}`,
      username: config.mqtt.username,
      password: config.mqtt.password,
      connectTimeout: config.mqtt.connectTimeout,
      reconnectPeriod: config.mqtt.reconnectPeriod,
    });

    this.setupEventHandlers();
  }

  private setupEventHandlers(): void {
    this.client.on('connect', () => {
      logger.info('Connected to MQTT broker');
      this.emit('connected');
    });

    this.client.on('close', () => {
      logger.warn('Disconnected from MQTT broker');
      this.emit('disconnected');
    });

    this.client.on('error', (error) => {
      logger.error('MQTT client error:', error);
    });

    this.client.on('message', (topic, payload) => {
      this.handleMessage(topic, payload);
    });
  }

  private handleMessage(topic: string, payload: Buffer): void {
    const handlers = this.handlers.get(topic);
    if (!handlers) return;

    // Copy: a handler may unsubscribe itself while we iterate
    for (const handler of [...handlers]) {
      try {
        handler(topic, payload);
      } catch (error) {
        logger.error(`Handler for ${topic} failed:`, error);
      }
    }
  }

  public isConnected(): boolean {
    return this.client.connected;
  }

  public async subscribe(topic: string, handler: MessageHandler, qos: QoS): Promise<void> {
    const existing = this.handlers.get(topic);
    if (existing) {
      existing.add(handler);
      return;
    }

    await new Promise<void>((resolve, reject) => {
      this.client.subscribe(topic, { qos }, (err, granted) => {
        if (err) {
          logger.error(`Failed to subscribe to ${topic}:`, err);
          reject(err);
          return;
        }
        if (!granted || granted.length === 0 || granted[0].qos === 128) {
          logger.warn(`Subscription to ${topic} was rejected (QoS 128 or empty grant)`);
          reject(new Error(`Subscription to ${topic} was rejected by the broker`));
          return;
        }
        logger.info(`Subscribed to ${topic} with QoS ${granted[0].qos}`);
        resolve();
      });
    });

    // Another caller may have subscribed the same topic while we waited on the broker
    const handlers = this.handlers.get(topic) ?? new Set<MessageHandler>();
    handlers.add(handler);
    this.handlers.set(topic, handlers);
  }

  public async unsubscribe(topic: string, handler: MessageHandler): Promise<void> {
    const handlers = this.handlers.get(topic);
    if (!handlers || !handlers.delete(handler)) return;
    if (handlers.size > 0) return;

    this.handlers.delete(topic);
    await new Promise<void>((resolve, reject) => {
      this.client.unsubscribe(topic, (err) => {
        if (err) {
          logger.error(`Failed to unsubscribe from ${topic}:`, err);
          reject(err);
        } else {
          logger.info(`Unsubscribed from ${topic}`);
          resolve();
        }
      });
    });
  }

  public async publish(topic: string, payload: string | Buffer, options?: PublishOptions): Promise<void> {
    return new Promise((resolve, reject) => {
      this.client.publish(topic, payload, { qos: options?.qos ?? 0, retain: options?.retain ?? false }, (error) => {
        if (error) {
          logger.error(`Failed to publish to ${topic}:`, error);
          reject(error);
        } else {
          logger.debug(`Published to ${topic}, size: ${payload.length}`);
          resolve();
        }
      });
    });
  }

  public async disconnect(): Promise<void> {
    this.handlers.clear();
    return new Promise((resolve) => {
      this.client.end(false, {}, () => {
        logger.info('MQTT client disconnected');
        resolve();
      });
    });
  }
}
