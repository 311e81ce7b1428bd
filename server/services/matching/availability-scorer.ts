import { DAYS_OF_WEEK, type DayOfWeek, type Urgency } from "@shared/schema";

/**
 * Days a provider may be booked on. Urgent work has to start on the posting
 * day (UTC); anything less urgent can take any day of the week.
 */
export function qualifyingDays(urgency: Urgency, postedAt: Date): DayOfWeek[] {
  if (urgency === "urgent") {
    return [DAYS_OF_WEEK[postedAt.getUTCDay()]];
  }
  return [...DAYS_OF_WEEK];
}

// Hard signal: 1 or 0, never a partial score.
export function scoreAvailability(
  availability: Readonly<Record<DayOfWeek, boolean>>,
  urgency: Urgency,
  postedAt: Date,
): number {
  return qualifyingDays(urgency, postedAt).some((day) => availability[day]) ? 1 : 0;
}
