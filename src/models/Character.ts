import mongoose, { Schema } from 'mongoose';

export interface CharacterDoc {
  _id: string;
  name: string;
  affiliations: string[];
  masters: string[];
  biography?: string;
  height?: number;
  mass?: number;
  gender?: string;
  homeworld?: string;
  species?: string;
  imageUrl?: string;
  createdAt: Date;
  updatedAt: Date;
}

const CharacterSchema = new Schema<CharacterDoc>({
  _id: { type: String, required: true },
  name: { type: String, required: true, unique: true, index: true },
  affiliations: { type: [String], default: [] },
  // Weak references: ids of other characters, not enforced.
  masters: { type: [String], default: [] },
  biography: { type: String },
  height: { type: Number },
  mass: { type: Number },
  gender: { type: String },
  homeworld: { type: String },
  species: { type: String },
  imageUrl: { type: String },
}, { timestamps: true });

export const CharacterModel = mongoose.model<CharacterDoc>('Character', CharacterSchema);
