/**
 * Types for document segmentation
 */

export type SegmentKind = 'text' | 'code' | 'front_matter';

export interface SegmentInit {
  index: number;
  content: string;
  translate?: boolean;
  kind?: SegmentKind;
  metadata?: Record<string, unknown>;
}

export interface SegmentOptions {
  strategy?: string;
  maxChars?: number;
  preserveCode?: boolean;
  preserveFrontmatter?: boolean;
  // Documents at or below this length are never split, whatever maxChars says
  splitThreshold?: number;
}
