/**
 * Properties the middleware attaches to every Express request.
 * Imported for its side effect by each module that reads them.
 */

import type { Logger } from '../utils/logger';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      correlationId: string;
      log: Logger;
      startTime: number;
      /** Aborted when the request outlives RequestConfig.timeoutMs. */
      timeoutSignal?: AbortSignal;
    }
  }
}

export {};
