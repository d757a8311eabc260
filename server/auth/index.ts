export { AuthManager, toSafeUser, type AuthSession } from "./manager";
export { setupAuth, isAuthenticated, getSession, getCurrentUser, type Authenticator } from "./session";
export { registerAuthRoutes } from "./routes";
