import type { User } from '../models/User';

declare global {
  namespace Express {
    interface Request {
      /** Set by tracingMiddleware */
      traceId: string;
      startTime: number;
      /** Set by the authentication middleware */
      user?: User;
    }
  }
}

export {};
