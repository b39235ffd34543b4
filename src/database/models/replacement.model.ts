import mongoose, { Schema, Document } from 'mongoose';

export interface IReplacement extends Document {
  userId: number;
  original: string;
  replacement: string;
  createdAt: Date;
  updatedAt: Date;
}

function createReplacementSchema(): Schema<IReplacement> {
  const schema = new Schema<IReplacement>({
    userId: {
      type: Number,
      required: true,
      index: true,
    },
    original: {
      type: String,
      required: true,
    },
    replacement: {
      type: String,
      default: '',
    },
    // Registration order; kept when the replacement is edited
    createdAt: {
      type: Date,
      default: Date.now,
    },
    updatedAt: {
      type: Date,
      default: Date.now,
    },
  });

  schema.index({ userId: 1, original: 1 }, { unique: true });

  return schema;
}

export const UsernameReplacement = mongoose.model<IReplacement>(
  'UsernameReplacement',
  createReplacementSchema(),
  'username_replacements'
);

export const LinkReplacement = mongoose.model<IReplacement>(
  'LinkReplacement',
  createReplacementSchema(),
  'link_replacements'
);
