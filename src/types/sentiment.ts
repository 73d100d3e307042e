import type { JsonObject } from './json.js';

export type SentimentLabel = 'POSITIVE' | 'NEGATIVE' | 'NEUTRAL';

export const SENTIMENT_LABELS: readonly SentimentLabel[] = ['POSITIVE', 'NEGATIVE', 'NEUTRAL'];

/**
 * Shape conventionally produced by the acquisition and analysis stages.
 * Upstream records usually also carry date, username, source and asset.
 * Never enforced: validateRecord() reports deviations as warnings only.
 */
export interface SentimentRecord extends JsonObject {
  id: string;
  text: string;
  label: string;
  score: number;
}
