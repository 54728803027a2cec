import { FileSessionStore, MemorySessionStore } from "./sessionStore";
import type { SessionStore, FileSessionStoreConfig } from "./sessionStore";
export { FileSessionStore, MemorySessionStore };
export type { SessionStore, FileSessionStoreConfig };
