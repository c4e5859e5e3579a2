import { type RequestHandler, Router } from "express";
import { createLinkStatisticsController } from "src/controllers/link-statistics/link-statistics-controller";
import type { LinkStatisticsStore } from "src/services/link-statistics/link-statistics-service";

export const createLinkStatisticsRouter = (store: LinkStatisticsStore, checkApiKey: RequestHandler) => {
  const router = Router();
  const {
    recordLinkStatistic,
    getLinkStatistics,
    listLinkStatisticRecords,
  } = createLinkStatisticsController(store);

  // Record one visit of a link
  router.post("/:id/statistics", checkApiKey, recordLinkStatistic);

  // Visits grouped by referer and user agent
  router.get("/:id/statistics", checkApiKey, getLinkStatistics);

  // Every recorded visit, oldest first
  router.get("/:id/statistics/records", checkApiKey, listLinkStatisticRecords);

  return router;
};
