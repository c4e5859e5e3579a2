import mongoose, { Schema } from "mongoose";

export interface ILinkStatistic {
  _id: number;
  link_id: string;
  referer: string | null;
  user_agent: string | null;
}

export const LinkStatisticSchema = new Schema<ILinkStatistic>(
  {
    _id: { type: Number, required: true },
    link_id: {
      type: String,
      ref: "Link",
      required: true,
    },
    referer: { type: String, default: null },
    user_agent: { type: String, default: null },
  },
  { collection: "link_statistics", versionKey: false }
);

// "all statistics for link X" is the dominant read
LinkStatisticSchema.index({ link_id: 1 }, { name: "idx_link_statistics_link_id" });

export const LinkStatisticModel = mongoose.model<ILinkStatistic>("LinkStatistic", LinkStatisticSchema);
