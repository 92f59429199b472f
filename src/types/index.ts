export const ABUNDANCE_LABELS = ['none', 'few', 'moderate', 'many', 'veryMany', 'unknown'] as const;

export type AbundanceLabel = (typeof ABUNDANCE_LABELS)[number];

export type ClassificationSource = 'local' | 'remote' | 'reconciled';

export type ScoringMode = 'priority' | 'score';

export interface ForumComment {
  text: string;
  /** Forum timestamp as rendered, e.g. `2025年04月01日 23:15`. */
  postedAt: string;
  sourceUrl: string;
  pageIndex: number;
}

export interface DetectorSignals {
  negation: boolean;
  small: boolean;
  normal: boolean;
  large: boolean;
  veryLarge: boolean;
  unrelated: boolean;
}

export interface LocalClassification {
  label: AbundanceLabel;
  reason: string;
  quantity: number | undefined;
  signals: DetectorSignals;
}

export interface RemoteClassification {
  label: AbundanceLabel;
  reason: string;
}

export interface ClassificationResult {
  comment: ForumComment;
  label: AbundanceLabel;
  source: ClassificationSource;
  reason: string;
}

export type Batch = ClassificationResult[];
