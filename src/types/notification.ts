/**
 * Notification (customs / PPR) requirement records from ga_notifications.db
 */

export const NOTIFICATION_TYPES = [
  "h24",
  "hours",
  "on_request",
  "business_day",
  "as_ad_hours",
  "not_available",
  "unknown",
] as const;

export type NotificationType = (typeof NOTIFICATION_TYPES)[number];

export type NotificationRuleType =
  | "customs"
  | "immigration"
  | "ppr"
  | "pn"
  | "handling";

export interface NotificationRecord {
  icao: string;
  type: NotificationType;
  isH24: boolean;
  isOnRequest: boolean;
  /** Advance notice in hours, when published */
  hoursNotice?: number;
  summary?: string;
  /** Operating hours window (e.g., "0800" / "1800") */
  operatingHoursStart?: string;
  operatingHoursEnd?: string;
  ruleType?: NotificationRuleType;
  confidence?: number;
}

/**
 * Difficulty bucket used for legend coloring.
 * Shared with every map and list renderer.
 */
export type NotificationBucket =
  | "h24"
  | "easy"
  | "moderate"
  | "hassle"
  | "difficult"
  | "unknown";
