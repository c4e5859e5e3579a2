import type { NextFunction, Request, Response } from "express";
import type { LinkStatisticsStore } from "src/services/link-statistics/link-statistics-service";

/**
 * Records a statistic for the visited link, then hands over to the next
 * handler (usually the redirect). A failed recording is logged and never
 * fails the visit.
 */
export const recordLinkVisit = (store: LinkStatisticsStore) =>
  async (req: Request, res: Response, next: NextFunction) => {
    const linkId = req.params.id;
    if (!linkId) return next();

    const referer = req.header("referer") ?? null;
    const userAgent = req.header("user-agent") ?? null;

    try {
      await store.record(linkId, referer, userAgent);
    } catch (error) {
      console.error(
        "Saving a new link click failed with the following error:",
        error instanceof Error ? error.message : error
      );
    }

    return next();
  };
