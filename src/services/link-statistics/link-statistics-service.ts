import { IntegrityError, ValidationError, toStoreError } from "src/lib/errors/app-errors";
import type {
  CountedLinkStatistic,
  LinkStatisticRecord,
  LinkStatisticsRepository,
} from "src/services/link-statistics/link-statistics-types";

export interface LinkStatisticsStoreOptions {
  maxTextLength: number;
}

/**
 * Access statistics of shortened links: one immutable record per observed
 * visit, read back per link.
 *
 * Integrity and availability failures reach the caller as `IntegrityError`
 * and `UnavailableError`; nothing is retried here.
 */
export class LinkStatisticsStore {
  constructor(
    private readonly repository: LinkStatisticsRepository,
    private readonly options: LinkStatisticsStoreOptions
  ) {}

  /** Appends one statistic for an existing link and returns its id. */
  async record(linkId: string, referer?: string | null, userAgent?: string | null): Promise<number> {
    this.assertTextLength("referer", referer);
    this.assertTextLength("userAgent", userAgent);

    try {
      if (!(await this.repository.linkExists(linkId))) {
        throw new IntegrityError(`Link ${linkId} does not exist`);
      }

      const statistic = await this.repository.insert({
        linkId,
        referer: referer ?? null,
        userAgent: userAgent ?? null,
      });

      console.debug(
        `Persisted new link click ${statistic.id} for link with id ${linkId}, referer ${statistic.referer ?? ""}, and user_agent ${statistic.userAgent ?? ""}`
      );

      return statistic.id;
    } catch (error) {
      throw toStoreError(error);
    }
  }

  async listByLink(linkId: string): Promise<LinkStatisticRecord[]> {
    try {
      return await this.repository.findByLink(linkId);
    } catch (error) {
      throw toStoreError(error);
    }
  }

  async countByLink(linkId: string): Promise<CountedLinkStatistic[]> {
    try {
      return await this.repository.countByLink(linkId);
    } catch (error) {
      throw toStoreError(error);
    }
  }

  private assertTextLength(field: string, value: string | null | undefined) {
    // code points, so a character outside the BMP counts once
    if (value != null && [...value].length > this.options.maxTextLength) {
      throw new ValidationError(`${field} must be at most ${this.options.maxTextLength} characters`);
    }
  }
}
