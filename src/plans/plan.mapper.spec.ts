import { PlanMapper } from "./plan.mapper"
import { formatClock, isDayOfWeek } from "./utils/plan-time"
import { buildPlanRow } from "../../test/helpers/mocks.helper"

describe("PlanMapper", () => {
  it("should trim stored times to HH:MM", () => {
    const view = PlanMapper.toView(
      buildPlanRow({ startTime: "09:05:00", endTime: "23:59:59" }),
    )

    expect(view.startTime).toBe("09:05")
    expect(view.endTime).toBe("23:59")
  })

  it("should not leak owner or timestamps into the list view", () => {
    const view = PlanMapper.toView(buildPlanRow())

    expect(Object.keys(view).sort()).toEqual([
      "dayOfWeek",
      "description",
      "endTime",
      "id",
      "isCompleted",
      "startTime",
      "title",
    ])
  })

  it("should add ISO and display dates to the recent view", () => {
    const updatedAt = new Date(2025, 2, 14, 8, 5)
    const view = PlanMapper.toRecentView(
      buildPlanRow({ isCompleted: true, updatedAt }),
    )

    expect(view).toEqual({
      id: "5b0f7c1e-2d4a-4c8e-9f13-7a6b2c9d0e11",
      title: "Morning run",
      description: "",
      startTime: "07:00",
      isCompleted: true,
      updatedAt: updatedAt.toISOString(),
      displayDate: "2025-03-14 08:05",
    })
  })
})

describe("plan time helpers", () => {
  it("should pad single-digit hours", () => {
    expect(formatClock("9:05")).toBe("09:05")
  })

  it.each([
    [1, true],
    [7, true],
    [0, false],
    [8, false],
    [2.5, false],
    ["3", false],
  ])("isDayOfWeek(%p) is %p", (value, expected) => {
    expect(isDayOfWeek(value)).toBe(expected)
  })
})
