export interface FeedbackRecord {
  id: string;
  modelId: string;
  runId?: string;
  taskId?: string;
  /** 1 (useless) to 5 (excellent). */
  rating: number;
  correction?: string;
  submittedAt: Date;
}

export interface FeedbackQuery {
  modelId?: string;
  since?: Date;
}

export interface RetrainingDecision {
  modelId: string;
  trigger: boolean;
  negativeRatio: number;
  feedbackCount: number;
  criticalAlerts: number;
}
