import mongoose, { Schema } from 'mongoose';

export interface SearchIndexEntryDoc {
  _id: string;
  vector: number[];
  textHash: string;
  model: string;
  updatedAt: Date;
}

// Keyed by character id.
const SearchIndexEntrySchema = new Schema<SearchIndexEntryDoc>({
  _id: { type: String, required: true },
  vector: { type: [Number], required: true },
  textHash: { type: String, required: true },
  model: { type: String, required: true },
  updatedAt: { type: Date, required: true },
});

export const SearchIndexEntryModel = mongoose.model<SearchIndexEntryDoc>('SearchIndexEntry', SearchIndexEntrySchema);
