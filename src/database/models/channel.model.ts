import mongoose, { Schema, Document } from 'mongoose';

export type ChannelKind = 'source' | 'target';

export interface IChannel extends Document {
  userId: number;
  channelId: number;
  channelName: string;
  addedAt: Date;
}

function createChannelSchema(): Schema<IChannel> {
  const schema = new Schema<IChannel>({
    userId: {
      type: Number,
      required: true,
      index: true,
    },
    channelId: {
      type: Number,
      required: true,
    },
    channelName: {
      type: String,
      default: '',
    },
    addedAt: {
      type: Date,
      default: Date.now,
    },
  });

  // A chat appears at most once per user in each list
  schema.index({ userId: 1, channelId: 1 }, { unique: true });

  return schema;
}

export const SourceChannel = mongoose.model<IChannel>(
  'SourceChannel',
  createChannelSchema(),
  'source_channels'
);

export const TargetChannel = mongoose.model<IChannel>(
  'TargetChannel',
  createChannelSchema(),
  'target_channels'
);
