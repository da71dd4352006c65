import { Schema, model } from "mongoose";

export interface IUuidMapping {
  table: string;
  data: string;
  uuid: string;
}

const uuidMappingSchema = new Schema<IUuidMapping>(
  {
    table: { type: String, required: true },
    data: { type: String, required: true },
    uuid: { type: String, required: true },
  },
  { timestamps: true }
);
uuidMappingSchema.index({ table: 1, data: 1 }, { unique: true });
uuidMappingSchema.index({ table: 1, uuid: 1 }, { unique: true });

export const UuidMapping = model<IUuidMapping>(
  "UuidMapping",
  uuidMappingSchema,
  "uuid_mappings"
);
