import mongoose, { Schema, Document } from 'mongoose';

export interface IUser extends Document {
  userId: number;
  firstName?: string;
  username?: string;
  createdAt: Date;
  lastActiveAt: Date;
}

const userSchema = new Schema<IUser>({
  userId: {
    type: Number,
    required: true,
    unique: true,
    index: true,
  },
  firstName: String,
  username: String,
  createdAt: {
    type: Date,
    default: Date.now,
  },
  lastActiveAt: {
    type: Date,
    default: Date.now,
  },
});

export const User = mongoose.model<IUser>('User', userSchema, 'users');
