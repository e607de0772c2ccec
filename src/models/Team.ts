import mongoose, { Schema, Types } from 'mongoose';

export interface TeamDoc {
  _id: Types.ObjectId;
  name: string;
  ownerId?: string;
  members: string[];
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

const TeamSchema = new Schema<TeamDoc>({
  name: { type: String, required: true, unique: true, index: true },
  ownerId: { type: String, index: true },
  members: { type: [String], default: [] },
  version: { type: Number, default: 0 },
}, { timestamps: true });

export const TeamModel = mongoose.model<TeamDoc>('Team', TeamSchema);
