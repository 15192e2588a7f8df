/**
 * Express request augmentation
 */

declare global {
  namespace Express {
    interface Request {
      /** Per-request id, echoed in `X-Request-Id` and error bodies */
      requestId: string;
    }
  }
}

export {};
