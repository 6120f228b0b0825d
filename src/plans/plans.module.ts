import { Module } from "@nestjs/common"
import { UsersModule } from "../users/users.module"
import { PlansController } from "./plans.controller"
import { PlansRepository } from "./plans.repository"
import { PlansService } from "./plans.service"

@Module({
  imports: [UsersModule],
  controllers: [PlansController],
  providers: [PlansService, PlansRepository],
  exports: [PlansService],
})
export class PlansModule {}
