import { CounterModel } from "src/models/counter/counter-schema";

/**
 * Atomically advances the named sequence and returns its new value. The first
 * call for a name creates the counter and returns 1.
 */
export const nextSequenceService = async (name: string, timeoutMs: number): Promise<number> => {
  const counter = await CounterModel.findOneAndUpdate(
    { _id: name },
    { $inc: { seq: 1 } },
    { new: true, upsert: true, maxTimeMS: timeoutMs }
  ).exec();

  if (!counter) {
    throw new Error(`Sequence ${name} could not be advanced`);
  }

  return counter.seq;
};
