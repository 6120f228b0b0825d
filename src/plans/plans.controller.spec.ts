import { Test, TestingModule } from "@nestjs/testing"
import { PlansController } from "./plans.controller"
import { PlansService } from "./plans.service"
import { succeed } from "../common/types/service-result"

describe("PlansController", () => {
  let controller: PlansController

  const mockPlansService = {
    createOrUpdatePlan: jest.fn(),
    listPlans: jest.fn(),
    deletePlan: jest.fn(),
    deleteAllPlans: jest.fn(),
    createBulkPlans: jest.fn(),
    getRecentPlans: jest.fn(),
    getCompletedCount: jest.fn(),
    getCompletedByWeekday: jest.fn(),
  }

  const userId = "0c6a2f9e-1b3d-4e5f-8a7b-9c0d1e2f3a4b"
  const planId = "5b0f7c1e-2d4a-4c8e-9f13-7a6b2c9d0e11"

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [PlansController],
      providers: [
        {
          provide: PlansService,
          useValue: mockPlansService,
        },
      ],
    }).compile()

    controller = module.get<PlansController>(PlansController)

    jest.clearAllMocks()
  })

  describe("save", () => {
    it("should pass the body through to createOrUpdatePlan", async () => {
      const outcome = succeed("Plan updated.", { updated: 1 })
      mockPlansService.createOrUpdatePlan.mockResolvedValue(outcome)

      const dto = { id: planId, isCompleted: true }
      const result = await controller.save(userId, dto)

      expect(result).toBe(outcome)
      expect(mockPlansService.createOrUpdatePlan).toHaveBeenCalledWith(
        userId,
        dto,
      )
    })
  })

  describe("list", () => {
    it("should forward the optional day filter", async () => {
      await controller.list(userId, { dayOfWeek: 4 })
      await controller.list(userId, {})

      expect(mockPlansService.listPlans).toHaveBeenNthCalledWith(1, userId, 4)
      expect(mockPlansService.listPlans).toHaveBeenNthCalledWith(
        2,
        userId,
        undefined,
      )
    })
  })

  describe("createBulk", () => {
    it("should hand the item list to createBulkPlans", async () => {
      const plans = [
        { title: "Run", dayOfWeek: 1, startTime: "07:00", endTime: "07:30" },
      ]

      await controller.createBulk(userId, { plans })

      expect(mockPlansService.createBulkPlans).toHaveBeenCalledWith(
        userId,
        plans,
      )
    })
  })

  describe("recent", () => {
    it("should forward the limit", async () => {
      await controller.recent(userId, { limit: 3 })

      expect(mockPlansService.getRecentPlans).toHaveBeenCalledWith(userId, 3)
    })
  })

  describe("statistics", () => {
    it("should delegate both counters", async () => {
      await controller.completedCount(userId)
      await controller.completedByWeekday(userId)

      expect(mockPlansService.getCompletedCount).toHaveBeenCalledWith(userId)
      expect(mockPlansService.getCompletedByWeekday).toHaveBeenCalledWith(
        userId,
      )
    })
  })

  describe("remove / removeAll", () => {
    it("should delete one plan by path id", async () => {
      await controller.remove(userId, planId)

      expect(mockPlansService.deletePlan).toHaveBeenCalledWith(userId, planId)
    })

    it("should clear plans for the requested day", async () => {
      await controller.removeAll(userId, { dayOfWeek: 2 })

      expect(mockPlansService.deleteAllPlans).toHaveBeenCalledWith(userId, 2)
    })
  })
})
