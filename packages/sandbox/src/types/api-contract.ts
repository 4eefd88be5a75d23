/**
 * Hono application environment type.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface SandboxEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Account address of the calling consumer (set by consumer middleware) */
    account: string;
  };
}
