import { Response } from 'express';

/**
 * Signal that fires when the client goes away before the response is sent.
 * Long-running tool invocations for the request are killed through it.
 */
export function clientAbortSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}
