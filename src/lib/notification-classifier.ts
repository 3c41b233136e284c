/**
 * Notification difficulty classification.
 *
 * An ordered rule table evaluated top to bottom; the first matching rule
 * decides the bucket. The order and the bucket colors are shared with the
 * web and mobile map legends and must stay in step with them.
 */

import type {
  NotificationBucket,
  NotificationRecord,
} from "@/types/notification";

export interface ClassificationRule {
  /** Short description shown in legend documentation */
  description: string;
  matches: (record: NotificationRecord) => boolean;
  bucket: NotificationBucket;
}

export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    description: "available 24/7",
    matches: (r) => r.isH24,
    bucket: "h24",
  },
  {
    description: "not available",
    matches: (r) => r.type === "not_available",
    bucket: "difficult",
  },
  {
    description: "on request",
    matches: (r) => r.isOnRequest,
    bucket: "moderate",
  },
  {
    description: "business day notice",
    matches: (r) => r.type === "business_day",
    bucket: "hassle",
  },
  {
    description: "during AD hours",
    matches: (r) => r.type === "as_ad_hours",
    bucket: "easy",
  },
  {
    description: "operating hours without notice",
    matches: (r) => r.type === "hours" && r.hoursNotice === undefined,
    bucket: "easy",
  },
  {
    description: "notice unknown",
    matches: (r) => r.hoursNotice === undefined,
    bucket: "unknown",
  },
  {
    description: "12h notice or less",
    matches: (r) => r.hoursNotice !== undefined && r.hoursNotice <= 12,
    bucket: "easy",
  },
  {
    description: "13-24h notice",
    matches: (r) => r.hoursNotice !== undefined && r.hoursNotice <= 24,
    bucket: "moderate",
  },
  {
    description: "25-48h notice",
    matches: (r) => r.hoursNotice !== undefined && r.hoursNotice <= 48,
    bucket: "hassle",
  },
  {
    description: "more than 48h notice",
    matches: () => true,
    bucket: "difficult",
  },
];

export function classifyNotification(
  record: NotificationRecord
): NotificationBucket {
  for (const rule of CLASSIFICATION_RULES) {
    if (rule.matches(record)) {
      return rule.bucket;
    }
  }
  // The last rule matches everything
  return "unknown";
}

export const BUCKET_COLORS: Readonly<Record<NotificationBucket, string>> = {
  h24: "#28a745",
  easy: "#28a745",
  moderate: "#ffc107",
  hassle: "#007bff",
  difficult: "#dc3545",
  unknown: "#95a5a6",
};

const BUCKET_LABELS: Readonly<Record<NotificationBucket, string>> = {
  h24: "24/7",
  easy: "Easy (≤12h)",
  moderate: "Moderate (13-24h)",
  hassle: "Hassle (25-48h)",
  difficult: "Difficult (>48h)",
  unknown: "Unknown",
};

const BUCKET_ORDER: Readonly<Record<NotificationBucket, number>> = {
  h24: 0,
  easy: 1,
  moderate: 2,
  hassle: 3,
  difficult: 4,
  unknown: 5,
};

export function bucketColor(bucket: NotificationBucket): string {
  return BUCKET_COLORS[bucket];
}

export function bucketLabel(bucket: NotificationBucket): string {
  return BUCKET_LABELS[bucket];
}

/** Lower = easier access */
export function bucketSortOrder(bucket: NotificationBucket): number {
  return BUCKET_ORDER[bucket];
}

/**
 * The bucket a plain notice period of the given length falls into.
 */
export function bucketForHours(hours: number): NotificationBucket {
  return classifyNotification({
    icao: "",
    type: "hours",
    isH24: false,
    isOnRequest: false,
    hoursNotice: hours,
  });
}
