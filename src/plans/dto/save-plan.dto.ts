import { ApiPropertyOptional } from "@nestjs/swagger"
import {
  IsBoolean,
  IsInt,
  IsString,
  IsUUID,
  Matches,
  Max,
  MaxLength,
  Min,
  ValidateIf,
} from "class-validator"

export const CLOCK_PATTERN = /^([01]\d|2[0-3]):[0-5]\d(:[0-5]\d)?$/

/** Like IsOptional, but an explicit null is still validated (and rejected). */
const IfPresent = () =>
  ValidateIf((_dto: object, value: unknown) => value !== undefined)

/**
 * Every field is optional here: which ones are required depends on whether
 * `id` is present, and that rule lives in PlansService.
 */
export class SavePlanDto {
  @ApiPropertyOptional({
    example: "8f14e45f-ceea-467f-a8f5-2c1a3d9e2b10",
    description: "Plan to update. Omit to create a new plan.",
  })
  @IfPresent()
  @IsUUID()
  id?: string

  @ApiPropertyOptional({ example: "Morning run", maxLength: 100 })
  @IfPresent()
  @IsString()
  @MaxLength(100)
  title?: string

  @ApiPropertyOptional({ example: "5 km around the park" })
  @IfPresent()
  @IsString()
  description?: string

  @ApiPropertyOptional({
    example: 1,
    minimum: 1,
    maximum: 7,
    description: "1 = Monday ... 7 = Sunday",
  })
  @IfPresent()
  @IsInt()
  @Min(1)
  @Max(7)
  dayOfWeek?: number

  @ApiPropertyOptional({ example: "07:00", description: "HH:MM" })
  @IfPresent()
  @Matches(CLOCK_PATTERN)
  startTime?: string

  @ApiPropertyOptional({ example: "07:45", description: "HH:MM" })
  @IfPresent()
  @Matches(CLOCK_PATTERN)
  endTime?: string

  @ApiPropertyOptional({ example: false })
  @IfPresent()
  @IsBoolean()
  isCompleted?: boolean
}
