import { type Facility, WINDOW_MINUTES } from "../constants";
import { addMinutes } from "../availability/time";

/**
 * Generate the booking calendar URL for a facility
 * @param activityDate - Start of the slot to open the calendar at; omit for the plain calendar
 * @returns The booking URL, with `activityDate` and `previousActivityDate`
 *   (one window earlier) as UTC timestamps when a date is given
 */
export function getBookingUrl(facility: Facility, activityDate?: Date): string {
  if (!activityDate) {
    return facility.bookingUrl;
  }

  const previous = addMinutes(activityDate, -WINDOW_MINUTES);
  return `${facility.bookingUrl}?activityDate=${activityDate.toISOString()}&previousActivityDate=${previous.toISOString()}`;
}
