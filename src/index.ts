export { AccountStorage } from "./account-storage.js";
export { OAuthFlow } from "./oauth-flow.js";
export type { OAuthFlowOptions, OAuthResult } from "./oauth-flow.js";
export { AuthService, resolveAccount } from "./auth-service.js";
export type { AuthState, LoginOptions, LoginResult } from "./auth-service.js";
export { renderDocument, renderMarkdown, renderPlainText } from "./content-renderer.js";
export * from "./errors.js";
export * from "./request-builder.js";
export { run } from "./app.js";
export * from "./services/index.js";
export * from "./types.js";
