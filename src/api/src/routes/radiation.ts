import { Router, Request, Response, RequestHandler } from "express";
import type { AppContext } from "../context";
import { abortOnClose } from "../middleware/body";
import { buildRegionFeed } from "../services/json-feed";
import { LockAbortedError } from "../services/mutex";
import { summarizeRegion } from "../services/region-aggregator";
import { parseLocationQuery } from "./location-query";
import { sendDeviceListing } from "./listing";

export function createRegionFeedHandler({ store, config, logger }: AppContext): RequestHandler {
  return async (req: Request, res: Response) => {
    try {
      const query = parseLocationQuery(req.query);
      if (query.kind === "invalid") {
        res.status(400).json({ error: "Validation failed", details: query.error.flatten() });
        return;
      }

      const signal = abortOnClose(res);
      if (query.kind === "listing") {
        await sendDeviceListing(store, res, signal);
        return;
      }

      const aggregate = await summarizeRegion(
        store,
        query,
        config.defaultQueryRadiusMeters,
        logger,
        signal
      );
      res.json(buildRegionFeed(aggregate, config.feedBaseUrl));
    } catch (err) {
      if (err instanceof LockAbortedError) {
        return;
      }
      logger.error({ err }, "Region feed failed");
      res.status(500).json({ error: "Internal server error" });
    }
  };
}

export default function radiationRoutes(context: AppContext): Router {
  const router = Router();
  router.get("/radiation", createRegionFeedHandler(context));
  return router;
}
