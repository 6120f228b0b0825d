/** Mutable columns of a plan; every slot is optional so "nothing set" is checkable. */
export interface PlanPatch {
  title?: string
  description?: string
  dayOfWeek?: number
  startTime?: string
  endTime?: string
  isCompleted?: boolean
}

/** Input of createOrUpdatePlan: with an id it updates, without one it creates. */
export interface PlanFields extends PlanPatch {
  id?: string
}

/** A plan that passed the create-time checks. */
export interface NewPlan {
  userId: string
  title: string
  description: string
  dayOfWeek: number
  startTime: string
  endTime: string
  isCompleted: boolean
}

export interface PlanView {
  id: string
  title: string
  description: string
  dayOfWeek: number
  startTime: string
  endTime: string
  isCompleted: boolean
}

export interface RecentPlanView {
  id: string
  title: string
  description: string
  startTime: string
  isCompleted: boolean
  updatedAt: string
  displayDate: string
}

export interface PlanCreatedPayload {
  created: number
  id: string
}

export interface PlanUpdatedPayload {
  updated: number
}

export type PlanSavedPayload = PlanCreatedPayload | PlanUpdatedPayload

export interface PlanListPayload {
  plans: PlanView[]
  count: number
}

export interface PlansDeletedPayload {
  deleted: number
}

export interface PlansCreatedPayload {
  created: number
}

export interface RecentPlansPayload {
  recentPlans: RecentPlanView[]
}

export interface CompletedCountPayload {
  completedCount: number
}

export interface CompletedByWeekdayPayload {
  completedByWeekday: number[]
}
