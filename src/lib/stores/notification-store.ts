/**
 * Customs / PPR notification requirements (ga_notifications.db).
 */

import Database from "better-sqlite3";
import { z } from "zod";

import {
  NOTIFICATION_TYPES,
  type NotificationRecord,
  type NotificationRuleType,
  type NotificationType,
} from "@/types/notification";

export interface NotificationStore {
  /**
   * Records with a positive notice period, optionally capped at maxHours,
   * shortest notice first.
   */
  queryByMaxHours(maxHours?: number, limit?: number): NotificationRecord[];
  /** One record per airport */
  groupByIcao(): ReadonlyMap<string, NotificationRecord>;
  get(icao: string): NotificationRecord | undefined;
  close(): void;
}

const RULE_TYPES: readonly NotificationRuleType[] = [
  "customs",
  "immigration",
  "ppr",
  "pn",
  "handling",
];

const notificationRowSchema = z.object({
  icao: z.string(),
  rule_type: z.string().nullable(),
  notification_type: z.string().nullable(),
  hours_notice: z.number().nullable(),
  operating_hours_start: z.string().nullable(),
  operating_hours_end: z.string().nullable(),
  summary: z.string().nullable(),
  confidence: z.number().nullable(),
});

const notificationRowsSchema = z.array(notificationRowSchema);

type NotificationRow = z.infer<typeof notificationRowSchema>;

const COLUMNS =
  "icao, rule_type, notification_type, hours_notice, operating_hours_start, operating_hours_end, summary, confidence";

function parseType(value: string | null): NotificationType {
  return NOTIFICATION_TYPES.find((t) => t === value) ?? "unknown";
}

function parseRuleType(value: string | null): NotificationRuleType | undefined {
  return RULE_TYPES.find((t) => t === value);
}

export function toNotificationRecord(row: NotificationRow): NotificationRecord {
  const type = parseType(row.notification_type);
  const record: NotificationRecord = {
    icao: row.icao.toUpperCase(),
    type,
    isH24: type === "h24",
    isOnRequest: type === "on_request",
  };

  if (row.hours_notice !== null) record.hoursNotice = row.hours_notice;
  if (row.summary !== null && row.summary !== "") record.summary = row.summary;
  if (row.operating_hours_start !== null) {
    record.operatingHoursStart = row.operating_hours_start;
  }
  if (row.operating_hours_end !== null) {
    record.operatingHoursEnd = row.operating_hours_end;
  }
  const ruleType = parseRuleType(row.rule_type);
  if (ruleType) record.ruleType = ruleType;
  if (row.confidence !== null) record.confidence = row.confidence;

  return record;
}

export class SqliteNotificationStore implements NotificationStore {
  private readonly db: Database.Database;
  private grouped: Map<string, NotificationRecord> | null = null;

  constructor(db: Database.Database) {
    this.db = db;
  }

  static open(path: string): SqliteNotificationStore {
    return new SqliteNotificationStore(
      new Database(path, { readonly: true, fileMustExist: true })
    );
  }

  queryByMaxHours(maxHours?: number, limit?: number): NotificationRecord[] {
    const params: number[] = [];
    let sql = `SELECT ${COLUMNS} FROM ga_notification_requirements WHERE hours_notice IS NOT NULL AND hours_notice > 0`;
    if (maxHours !== undefined) {
      sql += " AND hours_notice <= ?";
      params.push(maxHours);
    }
    sql += " ORDER BY hours_notice ASC, rowid ASC";
    if (limit !== undefined) {
      sql += " LIMIT ?";
      params.push(limit);
    }

    const rows = notificationRowsSchema.parse(this.db.prepare(sql).all(...params));
    return this.firstPerIcao(rows.map(toNotificationRecord));
  }

  groupByIcao(): ReadonlyMap<string, NotificationRecord> {
    if (!this.grouped) {
      const rows = notificationRowsSchema.parse(
        this.db
          .prepare(
            `SELECT ${COLUMNS} FROM ga_notification_requirements ORDER BY rowid ASC`
          )
          .all()
      );
      const grouped = new Map<string, NotificationRecord>();
      for (const record of rows.map(toNotificationRecord)) {
        if (!grouped.has(record.icao)) {
          grouped.set(record.icao, record);
        }
      }
      this.grouped = grouped;
    }
    return this.grouped;
  }

  get(icao: string): NotificationRecord | undefined {
    return this.groupByIcao().get(icao.toUpperCase());
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private firstPerIcao(records: NotificationRecord[]): NotificationRecord[] {
    const seen = new Set<string>();
    return records.filter((r) => {
      if (seen.has(r.icao)) return false;
      seen.add(r.icao);
      return true;
    });
  }
}
