import { z } from "zod";
import { PRODUCT_NAME_REQUIRED } from "../services/catalog/productCatalog";
import { PRICE_REQUIRED } from "../services/catalog/priceLedger";
import { STORE_PLACE_ID_REQUIRED } from "../services/catalog/storeDirectory";

/**
 * Request body schemas. Key order matters: the first failing key decides
 * which message the client gets.
 */

export const STORE_INFO_REQUIRED = "Store info is required";

const requiredMessage = (message: string) => ({ required_error: message, invalid_type_error: message });

const optionalText = z.string().nullish();
const optionalCoordinate = z.number().nullish();

export const ProductDataSchema = z.object(
  {
    name: z.string(requiredMessage(PRODUCT_NAME_REQUIRED)).trim().min(1, PRODUCT_NAME_REQUIRED),
    description: optionalText,
    brand: optionalText,
    category: optionalText,
    match_key: optionalText,
  },
  requiredMessage(PRODUCT_NAME_REQUIRED),
);

const storeFields = {
  place_id: z.string(requiredMessage(STORE_PLACE_ID_REQUIRED)).trim().min(1, STORE_PLACE_ID_REQUIRED),
  store: optionalText,
  name: optionalText,
  address: optionalText,
  latitude: optionalCoordinate,
  longitude: optionalCoordinate,
  is_online: z.boolean().nullish(),
};

export const StoreInfoSchema = z.object(storeFields, requiredMessage(STORE_INFO_REQUIRED));
export type StoreInfo = z.infer<typeof StoreInfoSchema>;

// Amount positivity and currency format are checked by the price ledger
export const ProductCreationSchema = z.object({
  product_data: ProductDataSchema,
  store_info: StoreInfoSchema,
  price: z.number(requiredMessage(PRICE_REQUIRED)),
  currency: z.unknown(),
});

export const PriceSubmissionSchema = z.object({
  ...storeFields,
  price: z.number(requiredMessage(PRICE_REQUIRED)),
  currency: z.unknown(),
});

export const StoreVisibilitySchema = z.object({
  visible: z.boolean(requiredMessage("visible must be a boolean")),
});

export const BarcodeLinkSchema = z.object({
  product_id: z.string(requiredMessage("product_id is required")).trim().min(1, "product_id is required"),
});

export const DEVICE_ID_REQUIRED = "device_id is required";
export const SHOPPING_LIST_NOT_ARRAY = "shopping_list must be an array";

export const DeviceRegistrationSchema = z.object({
  device_id: z.string(requiredMessage(DEVICE_ID_REQUIRED)).trim().min(1, DEVICE_ID_REQUIRED),
  platform: optionalText,
  push_token: optionalText,
});

export const ShoppingListSchema = z.object({
  shopping_list: z.array(z.unknown(), requiredMessage(SHOPPING_LIST_NOT_ARRAY)),
});

export const ProductListQuerySchema = z.object({
  name: z.string().optional(),
  limit: z.coerce.number().int("limit must be an integer").positive("limit must be positive").optional(),
});

/** Plain JSON object bodies only; anything else is treated as empty. */
export const asRecord = (body: unknown): Record<string, unknown> =>
  typeof body === "object" && body !== null && !Array.isArray(body) ? { ...body } : {};

/** Message of the first issue, in schema key order. */
export const firstIssueMessage = (error: z.ZodError): string => error.issues[0]?.message ?? "Invalid request";
