/**
 * Context variables shared by the host's middleware and routes.
 */
export interface AppEnv {
  Variables: {
    /** Set by requestIdMiddleware before any route runs */
    requestId: string;
  };
}
