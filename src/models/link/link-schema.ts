import mongoose, { Schema } from "mongoose";

// Links are created and resolved by the shortener itself; this service only
// reads their ids to keep statistics pointing at real links.
export interface ILink {
  _id: string;
  target_url: string;
}

export const LinkSchema = new Schema<ILink>(
  {
    _id: { type: String, required: true },
    target_url: { type: String, required: true },
  },
  { collection: "links", versionKey: false }
);

export const LinkModel = mongoose.model<ILink>("Link", LinkSchema);
