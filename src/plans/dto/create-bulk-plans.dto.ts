import { ApiProperty, OmitType } from "@nestjs/swagger"
import { Type } from "class-transformer"
import { IsArray, ValidateNested } from "class-validator"
import { SavePlanDto } from "./save-plan.dto"

export class BulkPlanItemDto extends OmitType(SavePlanDto, ["id"] as const) {}

export class CreateBulkPlansDto {
  @ApiProperty({
    type: [BulkPlanItemDto],
    description:
      "Items missing title, day of week, start or end time are skipped",
  })
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => BulkPlanItemDto)
  plans!: BulkPlanItemDto[]
}
