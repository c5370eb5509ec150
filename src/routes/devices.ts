/**
 * Device Routes
 *
 * Device registration and per-device shopping list sync. The list is an
 * opaque array owned by the client; a PUT replaces it wholesale.
 */

import type { Express, Request, Response } from "express";
import type { AppContext } from "../app/context";
import type { Device } from "../domain/catalog";
import { ValidationError } from "../domain/errors";
import { asyncHandler } from "../middleware/errorHandler";
import { toPlatform } from "../repositories/deviceRepository";
import { DeviceRegistrationSchema, ShoppingListSchema, asRecord, firstIssueMessage } from "../schemas/catalog";

const serializeDevice = (device: Device) => ({
  device_id: device.deviceId,
  platform: device.platform,
  created_at: new Date(device.createdAt).toISOString(),
});

export function registerDeviceRoutes(app: Express, ctx: AppContext): void {
  const { deviceRepo, logger } = ctx;
  const log = logger.child({ module: "device-routes" });

  /**
   * POST /devices  { device_id, platform?, push_token? }
   * Unrecognised platforms are stored as "unknown".
   */
  app.post(
    "/devices",
    asyncHandler(async (req: Request, res: Response) => {
      const body = DeviceRegistrationSchema.safeParse(asRecord(req.body));
      if (!body.success) {
        throw new ValidationError(firstIssueMessage(body.error));
      }

      const device = deviceRepo.register({
        deviceId: body.data.device_id,
        platform: toPlatform(body.data.platform),
        pushToken: body.data.push_token?.trim() || null,
      });
      log.info({ deviceId: device.deviceId, platform: device.platform }, "device.registered");

      res.json(serializeDevice(device));
    }),
  );

  app.get(
    "/devices/:deviceId/shopping-list",
    asyncHandler(async (req: Request, res: Response) => {
      const device = deviceRepo.findById(req.params.deviceId);
      res.json({ shopping_list: device?.shoppingList ?? [] });
    }),
  );

  app.put(
    "/devices/:deviceId/shopping-list",
    asyncHandler(async (req: Request, res: Response) => {
      const body = ShoppingListSchema.safeParse(asRecord(req.body));
      if (!body.success) {
        throw new ValidationError(firstIssueMessage(body.error));
      }

      const device = deviceRepo.saveShoppingList(req.params.deviceId, body.data.shopping_list);
      log.debug({ deviceId: device.deviceId, count: device.shoppingList.length }, "device.shopping_list_synced");

      res.json({ message: "Shopping list synced", count: device.shoppingList.length });
    }),
  );
}
