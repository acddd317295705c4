export { QuotaTracker, toCalendarDate } from "./quota-tracker.js";
export type { QuotaTrackerOptions } from "./quota-tracker.js";
