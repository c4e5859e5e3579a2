export interface LinkStatisticRecord {
  id: number;
  linkId: string;
  referer: string | null;
  userAgent: string | null;
}

export type NewLinkStatistic = Omit<LinkStatisticRecord, "id">;

/** Records of one link that share a referer and user agent. */
export interface CountedLinkStatistic {
  amount: number;
  referer: string | null;
  userAgent: string | null;
}

export interface LinkStatisticsRepository {
  linkExists(linkId: string): Promise<boolean>;
  insert(statistic: NewLinkStatistic): Promise<LinkStatisticRecord>;
  /** Ascending by id. */
  findByLink(linkId: string): Promise<LinkStatisticRecord[]>;
  /** Highest amount first, ties by referer then user agent with null first. */
  countByLink(linkId: string): Promise<CountedLinkStatistic[]>;
}
