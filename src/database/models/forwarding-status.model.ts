import mongoose, { Schema, Document } from 'mongoose';

export interface IForwardingStatus extends Document {
  userId: number;
  isActive: boolean;
  totalForwarded: number;
  lastForwardedAt?: Date;
  updatedAt: Date;
}

const forwardingStatusSchema = new Schema<IForwardingStatus>({
  userId: {
    type: Number,
    required: true,
    unique: true,
    index: true,
  },
  isActive: {
    type: Boolean,
    default: false,
  },
  totalForwarded: {
    type: Number,
    default: 0,
  },
  lastForwardedAt: Date,
  updatedAt: {
    type: Date,
    default: Date.now,
  },
});

export const ForwardingStatus = mongoose.model<IForwardingStatus>(
  'ForwardingStatus',
  forwardingStatusSchema,
  'forwarding_status'
);
