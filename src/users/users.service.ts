import { Injectable } from "@nestjs/common"
import { isUUID } from "class-validator"
import { eq } from "drizzle-orm"
import { DatabaseService } from "../../database/database.service"
import { users, type UserRow } from "../../database/schema"
import type { UserDirectory } from "./types/user-directory"

@Injectable()
export class UsersService implements UserDirectory {
  constructor(private readonly database: DatabaseService) {}

  async findById(userId: string): Promise<UserRow | null> {
    if (!isUUID(userId)) {
      return null
    }

    const [user] = await this.database.db
      .select()
      .from(users)
      .where(eq(users.id, userId))
      .limit(1)

    return user ?? null
  }

  async exists(userId: string): Promise<boolean> {
    return (await this.findById(userId)) !== null
  }
}
