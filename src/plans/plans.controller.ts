import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  Post,
  Query,
  UseInterceptors,
} from "@nestjs/common"
import { ApiOperation, ApiSecurity, ApiTags } from "@nestjs/swagger"
import { CurrentUserId } from "../common/decorators/current-user-id.decorator"
import { ServiceResultInterceptor } from "../common/interceptors/service-result.interceptor"
import { PlansService } from "./plans.service"
import { SavePlanDto } from "./dto/save-plan.dto"
import { CreateBulkPlansDto } from "./dto/create-bulk-plans.dto"
import { DayOfWeekQueryDto, RecentPlansQueryDto } from "./dto/plan-query.dto"

@ApiTags("Plans")
@ApiSecurity("user-id")
@UseInterceptors(ServiceResultInterceptor)
@Controller("plans")
export class PlansController {
  constructor(private readonly plansService: PlansService) {}

  @Post()
  @ApiOperation({
    summary: "Create or partially update a plan",
    description:
      "With an id, writes only the provided fields. Without one, title, dayOfWeek, startTime and endTime are required.",
  })
  save(@CurrentUserId() userId: string, @Body() dto: SavePlanDto) {
    return this.plansService.createOrUpdatePlan(userId, dto)
  }

  @Get()
  @ApiOperation({ summary: "List plans ordered by start time" })
  list(@CurrentUserId() userId: string, @Query() query: DayOfWeekQueryDto) {
    return this.plansService.listPlans(userId, query.dayOfWeek)
  }

  @Post("bulk")
  @ApiOperation({
    summary: "Create several plans at once",
    description: "Incomplete items are skipped; the response reports how many were created.",
  })
  createBulk(
    @CurrentUserId() userId: string,
    @Body() dto: CreateBulkPlansDto,
  ) {
    return this.plansService.createBulkPlans(userId, dto.plans)
  }

  @Get("recent")
  @ApiOperation({ summary: "Most recently updated completed plans" })
  recent(
    @CurrentUserId() userId: string,
    @Query() query: RecentPlansQueryDto,
  ) {
    return this.plansService.getRecentPlans(userId, query.limit)
  }

  @Get("stats/completed")
  @ApiOperation({ summary: "Number of completed plans" })
  completedCount(@CurrentUserId() userId: string) {
    return this.plansService.getCompletedCount(userId)
  }

  @Get("stats/weekday")
  @ApiOperation({
    summary: "Completed plans per day of week",
    description: "Seven counters, index 0 = Monday.",
  })
  completedByWeekday(@CurrentUserId() userId: string) {
    return this.plansService.getCompletedByWeekday(userId)
  }

  @Delete()
  @ApiOperation({ summary: "Delete all plans, optionally for one day" })
  removeAll(
    @CurrentUserId() userId: string,
    @Query() query: DayOfWeekQueryDto,
  ) {
    return this.plansService.deleteAllPlans(userId, query.dayOfWeek)
  }

  @Delete(":id")
  @ApiOperation({ summary: "Delete one plan" })
  remove(@CurrentUserId() userId: string, @Param("id") id: string) {
    return this.plansService.deletePlan(userId, id)
  }
}
