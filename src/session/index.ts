export * from "./browser";
export * from "./operator";
export { MANUAL_LOGIN_PROMPT, SessionManager } from "./sessionManager";
export type { SessionManagerDeps } from "./sessionManager";
export { withBrowserSession } from "./scope";
