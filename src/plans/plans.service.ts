import { Inject, Injectable, Logger } from "@nestjs/common"
import { isUUID } from "class-validator"
import {
  created,
  fail,
  succeed,
  type ServiceResult,
} from "../common/types/service-result"
import {
  USER_DIRECTORY,
  type UserDirectory,
} from "../users/types/user-directory"
import { PlanMapper } from "./plan.mapper"
import { PlanMessages } from "./plan.messages"
import { PlansRepository } from "./plans.repository"
import type {
  CompletedByWeekdayPayload,
  CompletedCountPayload,
  NewPlan,
  PlanCreatedPayload,
  PlanFields,
  PlanListPayload,
  PlanPatch,
  PlanSavedPayload,
  PlanUpdatedPayload,
  PlansCreatedPayload,
  PlansDeletedPayload,
  RecentPlansPayload,
} from "./types/plan.types"
import { isDayOfWeek } from "./utils/plan-time"

export const DEFAULT_RECENT_LIMIT = 5

const PATCH_KEYS = [
  "title",
  "description",
  "dayOfWeek",
  "startTime",
  "endTime",
  "isCompleted",
] as const satisfies ReadonlyArray<keyof PlanPatch>

/** Keeps only the slots the caller actually set. */
function compactPatch(patch: PlanPatch): PlanPatch {
  const changes: PlanPatch = {}
  const copy = <K extends keyof PlanPatch>(key: K) => {
    const value = patch[key]
    if (value !== undefined) {
      changes[key] = value
    }
  }
  PATCH_KEYS.forEach(copy)
  return changes
}

/** Null when any of title, day, start or end is missing or empty. */
function toNewPlan(userId: string, fields: PlanPatch): NewPlan | null {
  const { title, dayOfWeek, startTime, endTime } = fields
  if (!title || !dayOfWeek || !startTime || !endTime) {
    return null
  }

  return {
    userId,
    title,
    description: fields.description ?? "",
    dayOfWeek,
    startTime,
    endTime,
    isCompleted: fields.isCompleted ?? false,
  }
}

@Injectable()
export class PlansService {
  private readonly logger = new Logger(PlansService.name)

  constructor(
    private readonly plans: PlansRepository,
    @Inject(USER_DIRECTORY) private readonly users: UserDirectory,
  ) {}

  /**
   * With `fields.id` set, writes exactly the other provided fields to that
   * plan; without it, creates a new plan from the full field set.
   */
  createOrUpdatePlan(
    userId: string,
    fields: PlanFields,
  ): Promise<ServiceResult<PlanSavedPayload>> {
    const { id, ...patch } = fields
    return id
      ? this.updatePlan(userId, id, patch)
      : this.createPlan(userId, patch)
  }

  async listPlans(
    userId: string,
    dayOfWeek?: number,
  ): Promise<ServiceResult<PlanListPayload>> {
    return this.run("list plans", async () => {
      const rows = await this.plans.listForUser(userId, dayOfWeek)
      const views = rows.map((row) => PlanMapper.toView(row))

      return succeed(views.length ? PlanMessages.listed : PlanMessages.noPlans, {
        plans: views,
        count: views.length,
      })
    })
  }

  async deletePlan(
    userId: string,
    planId: string,
  ): Promise<ServiceResult<PlansDeletedPayload>> {
    if (!planId) {
      return fail("VALIDATION", PlanMessages.planIdRequired)
    }
    if (!isUUID(planId)) {
      return fail("NOT_FOUND", PlanMessages.notDeletable(planId))
    }

    return this.run("delete plan", () =>
      this.plans.transaction(async (writer) => {
        const plan = await writer.findOwned(planId, userId)
        if (!plan) {
          return fail("NOT_FOUND", PlanMessages.notDeletable(planId))
        }

        await writer.deleteOwned(plan.id, userId)
        return succeed(PlanMessages.deleted(planId), { deleted: 1 })
      }),
    )
  }

  async deleteAllPlans(
    userId: string,
    dayOfWeek?: number,
  ): Promise<ServiceResult<PlansDeletedPayload>> {
    return this.run("clear plans", async () => {
      const deleted = await this.plans.transaction((writer) =>
        writer.deleteForUser(userId, dayOfWeek),
      )

      return succeed(this.clearedMessage(deleted, dayOfWeek), { deleted })
    })
  }

  /**
   * Items missing a required field (or with a day outside 1-7) are dropped
   * from the batch without being reported.
   */
  async createBulkPlans(
    userId: string,
    items: PlanPatch[],
  ): Promise<ServiceResult<PlansCreatedPayload>> {
    return this.run("create plans", async () => {
      if (!(await this.users.exists(userId))) {
        return fail("NOT_FOUND", PlanMessages.userNotFound(userId))
      }

      const batch = items
        .map((item) => toNewPlan(userId, item))
        .filter(
          (plan): plan is NewPlan =>
            plan !== null && isDayOfWeek(plan.dayOfWeek),
        )

      const skipped = items.length - batch.length
      if (skipped > 0) {
        this.logger.debug(
          `Skipped ${skipped} invalid plan(s) in bulk create for user ${userId}`,
        )
      }

      if (!batch.length) {
        return fail("VALIDATION", PlanMessages.noValidPlans)
      }

      const createdCount = await this.plans.transaction((writer) =>
        writer.insertMany(batch),
      )
      return created(PlanMessages.bulkCreated(createdCount), {
        created: createdCount,
      })
    })
  }

  async getRecentPlans(
    userId: string,
    limit = DEFAULT_RECENT_LIMIT,
  ): Promise<ServiceResult<RecentPlansPayload>> {
    const take = Math.max(0, Math.trunc(limit))

    return this.run("load recent plans", async () => {
      const rows =
        take > 0 ? await this.plans.listRecentCompleted(userId, take) : []

      return succeed(PlanMessages.recentListed, {
        recentPlans: rows.map((row) => PlanMapper.toRecentView(row)),
      })
    })
  }

  async getCompletedCount(
    userId: string,
  ): Promise<ServiceResult<CompletedCountPayload>> {
    return this.run("count completed plans", async () => {
      const completedCount = await this.plans.countCompleted(userId)
      return succeed(PlanMessages.completedCounted, { completedCount })
    })
  }

  async getCompletedByWeekday(
    userId: string,
  ): Promise<ServiceResult<CompletedByWeekdayPayload>> {
    return this.run("count completed plans by weekday", async () => {
      const rows = await this.plans.countCompletedByWeekday(userId)

      // index 0 holds Monday (day 1)
      const completedByWeekday: number[] = Array(7).fill(0)
      for (const row of rows) {
        if (isDayOfWeek(row.dayOfWeek)) {
          completedByWeekday[row.dayOfWeek - 1] = row.count
        }
      }

      return succeed(PlanMessages.completedByWeekday, { completedByWeekday })
    })
  }

  private async updatePlan(
    userId: string,
    planId: string,
    patch: PlanPatch,
  ): Promise<ServiceResult<PlanUpdatedPayload>> {
    const changes = compactPatch(patch)
    if (Object.keys(changes).length === 0) {
      return fail("VALIDATION", PlanMessages.nothingToUpdate)
    }
    if (changes.dayOfWeek !== undefined && !isDayOfWeek(changes.dayOfWeek)) {
      return fail("VALIDATION", PlanMessages.invalidDayOfWeek)
    }
    if (!isUUID(planId)) {
      return fail("NOT_FOUND", PlanMessages.notModifiable(planId))
    }

    return this.run("update plan", async () => {
      const updated = await this.plans.transaction((writer) =>
        writer.updateOwned(planId, userId, changes),
      )
      if (updated === 0) {
        return fail("NOT_FOUND", PlanMessages.notModifiable(planId))
      }

      return succeed(PlanMessages.updated, { updated: 1 })
    })
  }

  private async createPlan(
    userId: string,
    fields: PlanPatch,
  ): Promise<ServiceResult<PlanCreatedPayload>> {
    const plan = toNewPlan(userId, fields)
    if (!plan) {
      return fail("VALIDATION", PlanMessages.missingRequiredFields)
    }
    if (!isDayOfWeek(plan.dayOfWeek)) {
      return fail("VALIDATION", PlanMessages.invalidDayOfWeek)
    }

    return this.run("create plan", async () => {
      if (!(await this.users.exists(userId))) {
        return fail("NOT_FOUND", PlanMessages.userNotFound(userId))
      }

      const id = await this.plans.transaction((writer) => writer.insert(plan))
      return created(PlanMessages.created(plan.title), { created: 1, id })
    })
  }

  private clearedMessage(deleted: number, dayOfWeek?: number): string {
    if (dayOfWeek === undefined) {
      return deleted > 0
        ? PlanMessages.cleared(deleted)
        : PlanMessages.nothingToClear
    }
    return deleted > 0
      ? PlanMessages.clearedForDay(deleted, dayOfWeek)
      : PlanMessages.nothingToClearForDay(dayOfWeek)
  }

  /**
   * Operation boundary: anything thrown by the store or the user directory
   * becomes an INTERNAL failure carrying the error text.
   */
  private async run<T>(
    action: string,
    work: () => Promise<ServiceResult<T>>,
  ): Promise<ServiceResult<T>> {
    try {
      return await work()
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error)
      this.logger.error(
        `Failed to ${action}: ${detail}`,
        error instanceof Error ? error.stack : undefined,
      )
      return fail("INTERNAL", PlanMessages.storeFailure(action, detail), detail)
    }
  }
}
