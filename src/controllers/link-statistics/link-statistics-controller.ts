import type { Request, Response } from "express";
import { httpStatusCode } from "src/lib/constant";
import { ValidationError } from "src/lib/errors/app-errors";
import { formatErrorResponse } from "src/lib/errors/error-response-handler";
import type { LinkStatisticsStore } from "src/services/link-statistics/link-statistics-service";
import { recordLinkStatisticSchema } from "src/validation/link-statistic";

export const createLinkStatisticsController = (store: LinkStatisticsStore) => {
  const recordLinkStatistic = async (req: Request, res: Response) => {
    try {
      const parsed = recordLinkStatisticSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw new ValidationError(parsed.error.issues[0]?.message ?? "Invalid payload");
      }

      const { referer, userAgent } = parsed.data;
      const id = await store.record(req.params.id, referer, userAgent);

      return res.status(httpStatusCode.CREATED).json({
        success: true,
        message: "Link statistic recorded successfully",
        data: { id },
      });
    } catch (error) {
      return formatErrorResponse(res, error);
    }
  };

  const getLinkStatistics = async (req: Request, res: Response) => {
    try {
      const statistics = await store.countByLink(req.params.id);
      console.debug(`Statistics for link with id ${req.params.id} requested`);

      return res.status(httpStatusCode.OK).json({
        success: true,
        message: "Link statistics retrieved successfully",
        data: statistics,
      });
    } catch (error) {
      return formatErrorResponse(res, error);
    }
  };

  const listLinkStatisticRecords = async (req: Request, res: Response) => {
    try {
      const records = await store.listByLink(req.params.id);

      return res.status(httpStatusCode.OK).json({
        success: true,
        message: "Link statistic records retrieved successfully",
        data: records,
      });
    } catch (error) {
      return formatErrorResponse(res, error);
    }
  };

  return { recordLinkStatistic, getLinkStatistics, listLinkStatisticRecords };
};
