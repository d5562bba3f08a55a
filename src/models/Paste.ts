// src/models/Paste.ts
import mongoose, { Schema, HydratedDocument } from 'mongoose';
import { TOKEN_LENGTH } from '../utils/base62';

export interface IPaste {
  token: string;
  /** Decimal form of the 64-bit ordinal id. */
  ordinalId: string;
  content: Buffer;
  contentType: string;
  sizeBytes: number;
  contentHash: string;
  createdAt: Date;
  expiresAt: Date;
}

export type PasteDocument = HydratedDocument<IPaste>;

const PasteSchema = new Schema<IPaste>(
  {
    token: {
      type: String,
      required: true,
      unique: true,
      minlength: TOKEN_LENGTH,
      maxlength: TOKEN_LENGTH
    },
    ordinalId: {
      type: String,
      required: true,
      unique: true
    },
    content: {
      type: Buffer,
      required: true
    },
    contentType: {
      type: String,
      required: true,
      maxlength: 255
    },
    sizeBytes: {
      type: Number,
      required: true,
      min: 1
    },
    contentHash: {
      type: String,
      required: true
    },
    createdAt: {
      type: Date,
      required: true
    },
    // MongoDB's TTL monitor removes expired documents in the background; reads still filter.
    expiresAt: {
      type: Date,
      required: true,
      index: { expireAfterSeconds: 0 }
    }
  },
  {
    versionKey: false
  }
);

const Paste = mongoose.model<IPaste>('Paste', PasteSchema);

export default Paste;
