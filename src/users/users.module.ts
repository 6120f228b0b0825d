import { Module } from "@nestjs/common"
import { UsersService } from "./users.service"
import { USER_DIRECTORY } from "./types/user-directory"

@Module({
  providers: [
    UsersService,
    {
      provide: USER_DIRECTORY,
      useExisting: UsersService,
    },
  ],
  exports: [UsersService, USER_DIRECTORY],
})
export class UsersModule {}
