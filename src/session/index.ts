export type { SessionEvent, SessionListener, SessionResult } from "./types.js";
export { ConnectionSession } from "./session.js";
