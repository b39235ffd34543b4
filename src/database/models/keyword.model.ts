import mongoose, { Schema, Document } from 'mongoose';

export interface IKeyword extends Document {
  userId: number;
  keyword: string;
  addedAt: Date;
}

function createKeywordSchema(): Schema<IKeyword> {
  const schema = new Schema<IKeyword>({
    userId: {
      type: Number,
      required: true,
      index: true,
    },
    keyword: {
      type: String,
      required: true,
    },
    addedAt: {
      type: Date,
      default: Date.now,
    },
  });

  schema.index({ userId: 1, keyword: 1 }, { unique: true });

  return schema;
}

export const BlacklistKeyword = mongoose.model<IKeyword>(
  'BlacklistKeyword',
  createKeywordSchema(),
  'blacklist'
);

export const WhitelistKeyword = mongoose.model<IKeyword>(
  'WhitelistKeyword',
  createKeywordSchema(),
  'whitelist'
);
