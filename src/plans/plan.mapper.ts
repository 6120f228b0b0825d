import type { PlanRow } from "../../database/schema"
import type { PlanView, RecentPlanView } from "./types/plan.types"
import { formatClock, formatDisplayDate } from "./utils/plan-time"

export class PlanMapper {
  static toView(plan: PlanRow): PlanView {
    return {
      id: plan.id,
      title: plan.title,
      description: plan.description,
      dayOfWeek: plan.dayOfWeek,
      startTime: formatClock(plan.startTime),
      endTime: formatClock(plan.endTime),
      isCompleted: plan.isCompleted,
    }
  }

  static toRecentView(plan: PlanRow): RecentPlanView {
    return {
      id: plan.id,
      title: plan.title,
      description: plan.description,
      startTime: formatClock(plan.startTime),
      isCompleted: plan.isCompleted,
      updatedAt: plan.updatedAt.toISOString(),
      displayDate: formatDisplayDate(plan.updatedAt),
    }
  }
}
