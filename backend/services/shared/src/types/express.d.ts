// backend/services/shared/src/types/express.d.ts

/**
 * Global Express request augmentation used by all services.
 * - abortSignal: set by requestAbortSignal; fires when the client disconnects
 */
declare global {
  namespace Express {
    interface Request {
      abortSignal?: AbortSignal;
    }
  }
}

export {};
