// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * Calendar date string in YYYY-MM-DD form (UTC)
 */
export type CalendarDate = string;

/**
 * Tag naming the source batch a record came from (e.g. "maharashtra")
 */
export type SourceTag = string;

/**
 * Inclusive date range used in summaries
 */
export type DateRange = {
  earliest?: string;
  latest?: string;
};
