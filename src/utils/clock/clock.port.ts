/**
 * Source of "now" for expiry and decision timestamps.
 */
export abstract class ClockPort {
  abstract now(): Date;
}
