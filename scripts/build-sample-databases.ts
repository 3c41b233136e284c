/**
 * Build the SQLite gazetteer and notification databases from the JSON
 * seed files in data/sample/.
 *
 * Run with: npm run build:sample-db
 * Output paths follow GAZETTEER_DB and NOTIFICATIONS_DB.
 */

import { existsSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";

import { loadConfig } from "@/lib/config";

const SAMPLE_DIR = join(process.cwd(), "data/sample");

const citySeedSchema = z.array(
  z.object({
    name: z.string(),
    latitude: z.number(),
    longitude: z.number(),
    country_code: z.string().length(2),
    population: z.number().int().nonnegative().nullable().default(null),
    alternate_names: z.array(z.string()).default([]),
  })
);

const notificationSeedSchema = z.array(
  z.object({
    icao: z.string().length(4),
    rule_type: z.string().nullable().default(null),
    notification_type: z.string().nullable().default(null),
    hours_notice: z.number().int().nullable().default(null),
    operating_hours_start: z.string().nullable().default(null),
    operating_hours_end: z.string().nullable().default(null),
    summary: z.string().nullable().default(null),
    confidence: z.number().nullable().default(null),
  })
);

function readSeed<S extends z.ZodTypeAny>(file: string, schema: S): z.output<S> {
  const parsed = schema.safeParse(
    JSON.parse(readFileSync(join(SAMPLE_DIR, file), "utf8"))
  );
  if (!parsed.success) {
    const firstError = parsed.error.issues[0];
    throw new Error(`${file}: ${firstError.path.join(".")}: ${firstError.message}`);
  }
  return parsed.data;
}

function freshDatabase(path: string): Database.Database {
  if (existsSync(path)) {
    rmSync(path);
  }
  return new Database(path);
}

function buildGazetteer(path: string) {
  const cities = readSeed("cities.json", citySeedSchema);
  const db = freshDatabase(path);
  try {
    db.exec(`
      CREATE TABLE cities (
        name TEXT NOT NULL,
        latitude REAL NOT NULL,
        longitude REAL NOT NULL,
        country_code TEXT NOT NULL,
        population INTEGER,
        alternate_names TEXT
      );
      CREATE INDEX idx_cities_name ON cities(name COLLATE NOCASE);
    `);
    const insert = db.prepare(
      "INSERT INTO cities (name, latitude, longitude, country_code, population, alternate_names) VALUES (?, ?, ?, ?, ?, ?)"
    );
    db.transaction(() => {
      for (const city of cities) {
        insert.run(
          city.name,
          city.latitude,
          city.longitude,
          city.country_code.toUpperCase(),
          city.population,
          city.alternate_names.join(",")
        );
      }
    })();
  } finally {
    db.close();
  }
  console.log(`Wrote ${cities.length} cities to ${path}`);
}

function buildNotifications(path: string) {
  const records = readSeed("notifications.json", notificationSeedSchema);
  const db = freshDatabase(path);
  try {
    db.exec(`
      CREATE TABLE ga_notification_requirements (
        icao TEXT NOT NULL,
        rule_type TEXT,
        notification_type TEXT,
        hours_notice INTEGER,
        operating_hours_start TEXT,
        operating_hours_end TEXT,
        summary TEXT,
        confidence REAL
      );
      CREATE INDEX idx_notifications_icao ON ga_notification_requirements(icao);
    `);
    const insert = db.prepare(
      "INSERT INTO ga_notification_requirements (icao, rule_type, notification_type, hours_notice, operating_hours_start, operating_hours_end, summary, confidence) VALUES (?, ?, ?, ?, ?, ?, ?, ?)"
    );
    db.transaction(() => {
      for (const r of records) {
        insert.run(
          r.icao.toUpperCase(),
          r.rule_type,
          r.notification_type,
          r.hours_notice,
          r.operating_hours_start,
          r.operating_hours_end,
          r.summary,
          r.confidence
        );
      }
    })();
  } finally {
    db.close();
  }
  console.log(`Wrote ${records.length} notification records to ${path}`);
}

function main() {
  const config = loadConfig();
  buildGazetteer(config.gazetteerPath);
  buildNotifications(config.notificationsPath);
}

main();
