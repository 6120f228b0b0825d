import type { PlanRow } from "../../../database/schema"
import type { NewPlan, PlanPatch } from "./plan.types"

/**
 * Write side of the plan store. An instance is only ever handed out inside
 * PlansRepository.transaction, bound to that transaction.
 */
export interface PlanWriter {
  insert(plan: NewPlan): Promise<string>
  insertMany(plans: NewPlan[]): Promise<number>
  /** Returns the number of rows matched by (id, userId). */
  updateOwned(id: string, userId: string, patch: PlanPatch): Promise<number>
  findOwned(id: string, userId: string): Promise<PlanRow | null>
  deleteOwned(id: string, userId: string): Promise<number>
  deleteForUser(userId: string, dayOfWeek?: number): Promise<number>
}

export interface WeekdayCount {
  dayOfWeek: number
  count: number
}
