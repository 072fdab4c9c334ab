import { promises as fs } from 'fs';
import { z } from 'zod';
import logger from '../utils/logger.js';

const deviceEntrySchema = z.object({
  uniqueId: z.string().min(1),
  name: z.string().min(1),
  manufacturer: z.string().optional(),
  model: z.string().optional(),
  swVersion: z.string().optional(),
});

const registryFileSchema = z.object({
  devices: z.array(deviceEntrySchema),
});

export type DeviceEntry = z.infer<typeof deviceEntrySchema>;

export interface DeviceRegistry {
  getDevice(uniqueId: string): Promise<DeviceEntry | undefined>;
  listDevices(): Promise<DeviceEntry[]>;
}

export class InMemoryDeviceRegistry implements DeviceRegistry {
  private devices: Map<string, DeviceEntry>;

  constructor(devices: DeviceEntry[] = []) {
    this.devices = new Map(devices.map((device) => [device.uniqueId, device]));
  }

  add(device: DeviceEntry): void {
    this.devices.set(device.uniqueId, device);
  }

  async getDevice(uniqueId: string): Promise<DeviceEntry | undefined> {
    return this.devices.get(uniqueId);
  }

  async listDevices(): Promise<DeviceEntry[]> {
    return Array.from(this.devices.values());
  }
}

/**
 * Registry backed by a JSON file of the form { "devices": [...] }. The file
 * is read on every lookup so edits are picked up by the next setup.
 */
export class FileDeviceRegistry implements DeviceRegistry {
  constructor(private readonly filePath: string) {}

  async getDevice(uniqueId: string): Promise<DeviceEntry | undefined> {
    const devices = await this.listDevices();
    return devices.find((device) => device.uniqueId === uniqueId);
  }

  async listDevices(): Promise<DeviceEntry[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      logger.error(`Failed to read device registry ${this.filePath}:`, error);
      throw error;
    }

    const parsed = registryFileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      logger.error(`Device registry ${this.filePath} is invalid`, { issues: parsed.error.errors });
      throw new Error(`Invalid device registry file: ${this.filePath}`);
    }
    return parsed.data.devices;
  }
}
