export { classifyResponse } from "./adapter.js";
export type { DeliveryOutcome, DestinationAdapter } from "./adapter.js";
export { RecordStoreAdapter, statementsUrl, XAPI_VERSION } from "./record-store-adapter.js";
export { WebhookAdapter, buildWebhookPayload } from "./webhook-adapter.js";
export type { WebhookPayload } from "./webhook-adapter.js";
export { createAdapterRegistry, resolveAdapter } from "./registry.js";
export type { AdapterRegistry } from "./registry.js";
export { convertDriveLink, DrivePlatform, DrivePushRequest, toPushRequest } from "./drive-links.js";
export { DEFAULT_REQUEST_TIMEOUT_MS } from "./http-delivery.js";
export type { HttpDeliveryOptions } from "./http-delivery.js";
export { MockDestinationAdapter } from "./mock-adapter.js";
export type { MockDestinationAdapterOptions, MockDelivery } from "./mock-adapter.js";
