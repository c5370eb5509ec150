import type Database from "better-sqlite3";
import { z } from "zod";
import { DEVICE_PLATFORMS, type Device, type DevicePlatform } from "../domain/catalog";

interface DeviceRow {
  device_id: string;
  platform: string;
  push_token: string | null;
  shopping_list: string;
  created_at: number;
  updated_at: number;
}

export interface DeviceRegistration {
  deviceId: string;
  platform: DevicePlatform;
  pushToken: string | null;
}

const StoredListSchema = z.array(z.unknown());

const now = () => Date.now();

export const toPlatform = (value: string | null | undefined): DevicePlatform => {
  const normalized = value?.trim().toLowerCase();
  return DEVICE_PLATFORMS.find((platform) => platform === normalized) ?? "unknown";
};

export class DeviceRepository {
  constructor(private readonly db: Database.Database) {}

  findById(deviceId: string): Device | undefined {
    const row = this.db.prepare(`SELECT * FROM devices WHERE device_id = ?`).get(deviceId) as DeviceRow | undefined;
    return row ? this.mapRow(row) : undefined;
  }

  /**
   * Create the device, or refresh platform and push token of a known one.
   * The shopping list of a known device is left as it is.
   */
  register(device: DeviceRegistration): Device {
    const timestamp = now();
    const row = this.db
      .prepare(
        `INSERT INTO devices (device_id, platform, push_token, shopping_list, created_at, updated_at)
         VALUES (@device_id, @platform, @push_token, '[]', @created_at, @updated_at)
         ON CONFLICT(device_id) DO UPDATE
         SET platform = excluded.platform,
             push_token = excluded.push_token,
             updated_at = excluded.updated_at
         RETURNING *`
      )
      .get({
        device_id: device.deviceId,
        platform: device.platform,
        push_token: device.pushToken,
        created_at: timestamp,
        updated_at: timestamp,
      }) as DeviceRow;
    return this.mapRow(row);
  }

  /** Overwrite the shopping list; an unknown device is created on the way. */
  saveShoppingList(deviceId: string, items: unknown[]): Device {
    const timestamp = now();
    const row = this.db
      .prepare(
        `INSERT INTO devices (device_id, platform, push_token, shopping_list, created_at, updated_at)
         VALUES (@device_id, 'unknown', NULL, @shopping_list, @created_at, @updated_at)
         ON CONFLICT(device_id) DO UPDATE
         SET shopping_list = excluded.shopping_list,
             updated_at = excluded.updated_at
         RETURNING *`
      )
      .get({
        device_id: deviceId,
        shopping_list: JSON.stringify(items),
        created_at: timestamp,
        updated_at: timestamp,
      }) as DeviceRow;
    return this.mapRow(row);
  }

  private mapRow(row: DeviceRow): Device {
    const stored: unknown = JSON.parse(row.shopping_list);
    const list = StoredListSchema.safeParse(stored);
    return {
      deviceId: row.device_id,
      platform: toPlatform(row.platform),
      pushToken: row.push_token,
      shoppingList: list.success ? list.data : [],
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
