export const PlanMessages = {
  nothingToUpdate: "No fields were provided to update.",
  updated: "Plan updated.",
  notModifiable: (planId: string) =>
    `Plan ${planId} does not exist or you are not allowed to modify it.`,
  missingRequiredFields:
    "Title, day of week, start time and end time are required to create a plan.",
  invalidDayOfWeek: "Day of week must be an integer between 1 and 7.",
  userNotFound: (userId: string) => `User ${userId} does not exist.`,
  created: (title: string) => `Created plan "${title}".`,
  listed: "Plans retrieved.",
  noPlans: "You have no plans yet.",
  planIdRequired: "A plan id is required to delete a plan.",
  deleted: (planId: string) => `Plan ${planId} was deleted.`,
  notDeletable: (planId: string) =>
    `Plan ${planId} does not exist or you are not allowed to delete it.`,
  cleared: (deleted: number) => `Cleared ${deleted} plans.`,
  clearedForDay: (deleted: number, dayOfWeek: number) =>
    `Cleared ${deleted} plans for day ${dayOfWeek}.`,
  nothingToClear: "You have no plans to clear.",
  nothingToClearForDay: (dayOfWeek: number) =>
    `You have no plans to clear for day ${dayOfWeek}.`,
  noValidPlans: "No valid plans were provided.",
  bulkCreated: (createdCount: number) => `Created ${createdCount} plans.`,
  recentListed: "Recent plans retrieved.",
  completedCounted: "Completed plan count retrieved.",
  completedByWeekday: "Completed plans by weekday retrieved.",
  storeFailure: (action: string, detail: string) =>
    `Failed to ${action}: ${detail}`,
} as const
