import { Injectable } from "@nestjs/common"
import { and, asc, count, desc, eq, type SQL } from "drizzle-orm"
import {
  DatabaseService,
  type DbExecutor,
} from "../../database/database.service"
import { plans, type PlanRow } from "../../database/schema"
import type { PlanWriter, WeekdayCount } from "./types/plan-store.types"

@Injectable()
export class PlansRepository {
  constructor(private readonly database: DatabaseService) {}

  /**
   * Runs `work` inside one database transaction; anything it throws rolls
   * the whole call back.
   */
  transaction<T>(work: (writer: PlanWriter) => Promise<T>): Promise<T> {
    return this.database.db.transaction((tx) => work(this.writerFor(tx)))
  }

  listForUser(userId: string, dayOfWeek?: number): Promise<PlanRow[]> {
    return this.database.db
      .select()
      .from(plans)
      .where(this.ownedBy(userId, dayOfWeek))
      .orderBy(asc(plans.startTime), asc(plans.createdAt))
  }

  listRecentCompleted(userId: string, limit: number): Promise<PlanRow[]> {
    return this.database.db
      .select()
      .from(plans)
      .where(and(eq(plans.userId, userId), eq(plans.isCompleted, true)))
      .orderBy(desc(plans.updatedAt))
      .limit(limit)
  }

  async countCompleted(userId: string): Promise<number> {
    const [row] = await this.database.db
      .select({ value: count() })
      .from(plans)
      .where(and(eq(plans.userId, userId), eq(plans.isCompleted, true)))

    return row?.value ?? 0
  }

  countCompletedByWeekday(userId: string): Promise<WeekdayCount[]> {
    return this.database.db
      .select({ dayOfWeek: plans.dayOfWeek, count: count() })
      .from(plans)
      .where(and(eq(plans.userId, userId), eq(plans.isCompleted, true)))
      .groupBy(plans.dayOfWeek)
  }

  private ownedBy(userId: string, dayOfWeek?: number): SQL | undefined {
    return dayOfWeek === undefined
      ? eq(plans.userId, userId)
      : and(eq(plans.userId, userId), eq(plans.dayOfWeek, dayOfWeek))
  }

  private writerFor(tx: DbExecutor): PlanWriter {
    const owned = (id: string, userId: string) =>
      and(eq(plans.id, id), eq(plans.userId, userId))

    return {
      insert: async (plan) => {
        const [row] = await tx
          .insert(plans)
          .values(plan)
          .returning({ id: plans.id })
        return row.id
      },
      insertMany: async (batch) => {
        const rows = await tx
          .insert(plans)
          .values(batch)
          .returning({ id: plans.id })
        return rows.length
      },
      updateOwned: async (id, userId, patch) => {
        const rows = await tx
          .update(plans)
          .set(patch)
          .where(owned(id, userId))
          .returning({ id: plans.id })
        return rows.length
      },
      findOwned: async (id, userId) => {
        const [row] = await tx
          .select()
          .from(plans)
          .where(owned(id, userId))
          .limit(1)
        return row ?? null
      },
      deleteOwned: async (id, userId) => {
        const rows = await tx
          .delete(plans)
          .where(owned(id, userId))
          .returning({ id: plans.id })
        return rows.length
      },
      deleteForUser: async (userId, dayOfWeek) => {
        const rows = await tx
          .delete(plans)
          .where(this.ownedBy(userId, dayOfWeek))
          .returning({ id: plans.id })
        return rows.length
      },
    }
  }
}
