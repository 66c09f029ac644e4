export type { IPushStore, PushListFilter } from "./interfaces.js";
export { MemoryPushStore } from "./memory-push-store.js";
export { FilesystemPushStore } from "./filesystem-push-store.js";
