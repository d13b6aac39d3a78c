import type { DayFlag } from "@townsim/schemas";

/**
 * Compares the local calendar day of the previously stored time with the
 * new one. No previous time means the simulation has just started.
 */
export function computeDayFlag(previous: Date | null, next: Date): DayFlag {
  if (!previous) return "first_day";
  const sameDay =
    previous.getFullYear() === next.getFullYear() &&
    previous.getMonth() === next.getMonth() &&
    previous.getDate() === next.getDate();
  return sameDay ? "no_signal" : "new_day";
}
