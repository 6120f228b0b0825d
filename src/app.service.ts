import { Injectable } from "@nestjs/common"
import { sql } from "drizzle-orm"
import { DatabaseService } from "../database/database.service"

@Injectable()
export class AppService {
  constructor(private readonly database: DatabaseService) {}

  getStatus(): string {
    return "Weekly planner API is running"
  }

  async testConnection() {
    try {
      await this.database.db.execute(sql`SELECT 1`)
      return {
        connected: true,
        message: "Successfully connected to PostgreSQL",
      }
    } catch (error) {
      const message =
        error instanceof Error ? error.message : "Unable to connect to PostgreSQL"
      return { connected: false, error: message }
    }
  }
}
