// src/models/Release.ts
import mongoose, { Model, Schema, Types } from 'mongoose';
import { CHANNELS, PRODUCTS, type Channel, type Product, type ReleaseRecord } from '@/lib/schemas';
import { majorVersion, releaseLabel } from '@/lib/release-notes';
import { getBugSearchUrl } from '@/lib/release-urls';

// The data we store for each shipped version of a product on a channel
export interface IRelease {
  product: Product;
  channel: Channel;
  version: string;             // e.g., "42.0.1"
  releaseDate: Date;
  text: string;
  isPublic: boolean;
  bugList: string;
  bugSearchUrl: string;        // overrides the generated Bugzilla query when set
  systemRequirements: string;
  created: Date;
  modified: Date;
}

export interface IReleaseMethods {
  majorVersion(): string;
  getBugSearchUrl(): string;
  label(): string;
}

export type ReleaseModel = Model<IRelease, {}, IReleaseMethods>;

const ReleaseSchema = new Schema<IRelease, ReleaseModel, IReleaseMethods>({
  product: { type: String, enum: [...PRODUCTS], required: true },
  channel: { type: String, enum: [...CHANNELS], required: true },
  version: { type: String, required: [true, 'Version is required.'], trim: true },
  releaseDate: { type: Date, required: true },
  text: { type: String, default: '' },
  isPublic: { type: Boolean, default: false },
  bugList: { type: String, default: '' },
  bugSearchUrl: { type: String, default: '', maxlength: 2000 },
  systemRequirements: { type: String, default: '' },
  created: { type: Date },
  modified: { type: Date, index: true },
}, {
  timestamps: { createdAt: 'created', updatedAt: 'modified' },
  methods: {
    majorVersion() {
      return majorVersion(this.version);
    },
    getBugSearchUrl() {
      return getBugSearchUrl(this);
    },
    label() {
      return releaseLabel(this);
    },
  },
});

ReleaseSchema.index({ product: 1, version: 1 }, { unique: true });
ReleaseSchema.index({ product: 1, version: -1, channel: 1 });

export type ReleaseLean = IRelease & { _id: Types.ObjectId };

export function toReleaseRecord(doc: ReleaseLean): ReleaseRecord {
  return {
    id: doc._id.toString(),
    product: doc.product,
    channel: doc.channel,
    version: doc.version,
    releaseDate: doc.releaseDate,
    text: doc.text,
    isPublic: doc.isPublic,
    bugList: doc.bugList,
    bugSearchUrl: doc.bugSearchUrl,
    systemRequirements: doc.systemRequirements,
    created: doc.created,
    modified: doc.modified,
  };
}

const Release = mongoose.model<IRelease, ReleaseModel>('Release', ReleaseSchema);

export default Release;
