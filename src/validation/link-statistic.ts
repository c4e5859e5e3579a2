import { z } from "zod";

export const recordLinkStatisticSchema = z.object({
    referer: z.string().nullable().optional(),
    userAgent: z.string().nullable().optional(),
}).strict({
    message: "Bad payload present in the link statistic data"
});

export type RecordLinkStatisticPayload = z.infer<typeof recordLinkStatisticSchema>;
