import mongoose, { Schema, Document } from 'mongoose';

/**
 * Flags are optional: documents written by older versions may lack some of them,
 * and the loader fills the gaps with the default settings.
 */
export interface IUserSettings extends Document {
  userId: number;
  hideHeader?: boolean;
  forwardMedia?: boolean;
  urlPreviews?: boolean;
  removeUsernames?: boolean;
  removeLinks?: boolean;
  captionForward?: boolean;
  delaySeconds?: number;
  maxMessageLength?: number;
  updatedAt: Date;
}

const userSettingsSchema = new Schema<IUserSettings>({
  userId: {
    type: Number,
    required: true,
    unique: true,
    index: true,
  },
  hideHeader: Boolean,
  forwardMedia: Boolean,
  urlPreviews: Boolean,
  removeUsernames: Boolean,
  removeLinks: Boolean,
  captionForward: Boolean,
  delaySeconds: Number,
  maxMessageLength: Number,
  updatedAt: {
    type: Date,
    default: Date.now,
  },
});

export const UserSettings = mongoose.model<IUserSettings>(
  'UserSettings',
  userSettingsSchema,
  'user_settings'
);
