import { Schema, model, Document } from 'mongoose';
import { IReportRequest } from '@/types/report-request.types';
import { LEDGER_CONFIG } from '@/config/constants';

const reportRequestSchema = new Schema<IReportRequest & Document>({
  interval_start: {
    type: Date,
    required: true,
    unique: true,
    index: true
  },
  interval_end: {
    type: Date,
    required: true
  },
  energy_value: {
    type: Number,
    default: null,
    min: 0
  },
  status: {
    type: String,
    enum: ['PENDING', 'COMPUTED', 'SENT', 'FAILED'],
    default: 'PENDING',
    required: true
  },
  attempts: {
    type: Number,
    default: 0,
    min: 0
  },
  last_attempt_at: {
    type: Date,
    default: null
  },
  last_error: {
    type: String,
    default: null
  }
}, {
  collection: LEDGER_CONFIG.COLLECTION,
  timestamps: { createdAt: 'created_at', updatedAt: 'updated_at' },
  // Acknowledged only once journaled, so a returned write survives a crash
  writeConcern: { w: 'majority', j: true }
});

reportRequestSchema.index({ status: 1, interval_start: -1 });

const ReportRequest = model<IReportRequest & Document>('ReportRequest', reportRequestSchema);

export default ReportRequest;
