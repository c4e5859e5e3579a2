import { LINK_STATISTICS_SEQUENCE } from "src/lib/constant";
import { LinkModel } from "src/models/link/link-schema";
import { type ILinkStatistic, LinkStatisticModel } from "src/models/link-statistic/link-statistic-schema";
import { nextSequenceService } from "src/services/counter/counter-service";
import type {
  CountedLinkStatistic,
  LinkStatisticRecord,
  LinkStatisticsRepository,
  NewLinkStatistic,
} from "src/services/link-statistics/link-statistics-types";

interface CountedGroup {
  _id: { referer?: string | null; user_agent?: string | null };
  amount: number;
}

const toRecord = (statistic: ILinkStatistic): LinkStatisticRecord => ({
  id: statistic._id,
  linkId: statistic.link_id,
  referer: statistic.referer ?? null,
  userAgent: statistic.user_agent ?? null,
});

export class MongoLinkStatisticsRepository implements LinkStatisticsRepository {
  constructor(private readonly queryTimeoutMs: number) {}

  async linkExists(linkId: string): Promise<boolean> {
    const link = await LinkModel.exists({ _id: linkId }).maxTimeMS(this.queryTimeoutMs).exec();
    return link !== null;
  }

  async insert(statistic: NewLinkStatistic): Promise<LinkStatisticRecord> {
    const id = await nextSequenceService(LINK_STATISTICS_SEQUENCE, this.queryTimeoutMs);

    const created = await LinkStatisticModel.create({
      _id: id,
      link_id: statistic.linkId,
      referer: statistic.referer,
      user_agent: statistic.userAgent,
    });

    return toRecord(created);
  }

  async findByLink(linkId: string): Promise<LinkStatisticRecord[]> {
    const statistics = await LinkStatisticModel.find({ link_id: linkId })
      .sort({ _id: 1 })
      .maxTimeMS(this.queryTimeoutMs)
      .exec();

    return statistics.map(toRecord);
  }

  async countByLink(linkId: string): Promise<CountedLinkStatistic[]> {
    const groups = await LinkStatisticModel.aggregate<CountedGroup>([
      { $match: { link_id: linkId } },
      {
        $group: {
          _id: { referer: "$referer", user_agent: "$user_agent" },
          amount: { $sum: 1 },
        },
      },
      { $sort: { amount: -1, "_id.referer": 1, "_id.user_agent": 1 } },
    ])
      .option({ maxTimeMS: this.queryTimeoutMs })
      .exec();

    return groups.map((group) => ({
      amount: group.amount,
      referer: group._id.referer ?? null,
      userAgent: group._id.user_agent ?? null,
    }));
  }
}
