/**
 * Plan records written by the planning flow outside this service.
 * Collections: pending_plans, approved_plans
 */

export type PlanStatus = 'pending' | 'completed' | (string & {});

export interface PendingPlan {
  id: string;
  chatId: string;
  goal: string; // 'N/A' when the document has none
  status: PlanStatus;
}

export interface ApprovedPlan {
  id: string;
  chatId: string;
  goal: string;
  status: PlanStatus; // 'pending' when the document has none
  createdAt: Date | null; // null when created_at is not a timestamp
}
