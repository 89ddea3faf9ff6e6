/**
 * High-risk definition audit record (Mongo)
 */

import mongoose, { Schema, type Model } from 'mongoose';

export interface IInspectionDefinition {
  runId: string;
  method: string;
  quantile: number;
  n: number;
  k: number;
  actualRate: number;
  thresholdYieldAtK: number | null;
  thresholdYieldNext: number | null;
  tieBreaker: string;
  sourceHash: string;
  createdAt: Date;
}

const InspectionDefinitionSchema = new Schema<IInspectionDefinition>(
  {
    runId: { type: String, required: true, unique: true, index: true },
    method: { type: String, required: true },
    quantile: { type: Number, required: true },
    n: { type: Number, required: true },
    k: { type: Number, required: true },
    actualRate: { type: Number, required: true },
    thresholdYieldAtK: { type: Number, default: null },
    thresholdYieldNext: { type: Number, default: null },
    tieBreaker: { type: String, required: true },
    sourceHash: { type: String, required: true, index: true },
    createdAt: { type: Date, required: true },
  },
  { collection: 'inspection_definitions', versionKey: false }
);

InspectionDefinitionSchema.index({ createdAt: -1 });

export const InspectionDefinitionModel: Model<IInspectionDefinition> =
  mongoose.models.InspectionDefinition ||
  mongoose.model<IInspectionDefinition>('InspectionDefinition', InspectionDefinitionSchema);
