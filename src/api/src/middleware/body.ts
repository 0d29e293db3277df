import express, { Response } from "express";

declare module "http" {
  interface IncomingMessage {
    /** Size in bytes of the request body as received, before JSON decoding. */
    rawBodyLength?: number;
  }
}

export const jsonBody = express.json({
  limit: "1mb",
  verify: (req, _res, buf) => {
    req.rawBodyLength = buf.length;
  },
});

/**
 * Signal that fires when the client goes away before a response is sent, so
 * a request still queued on the store lock can give up its place.
 */
export function abortOnClose(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}
