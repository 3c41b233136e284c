/**
 * Offline gazetteer over a GeoNames cities extract (european_cities.db).
 *
 * Table: cities(name, latitude, longitude, country_code, population, alternate_names)
 */

import Database from "better-sqlite3";
import { z } from "zod";

import type { GeocodeEntry } from "@/types/gazetteer";

export interface GazetteerStore {
  /** Case-insensitive name equality, most populous first */
  exactMatch(name: string, limit: number): GeocodeEntry[];
  /** Names starting with the prefix, most populous first */
  prefixMatch(prefix: string, limit: number): GeocodeEntry[];
  /** Alternate names containing the text, most populous first */
  substringMatch(text: string, limit: number): GeocodeEntry[];
  close(): void;
}

const cityRowSchema = z.object({
  name: z.string(),
  latitude: z.number(),
  longitude: z.number(),
  country_code: z.string(),
  population: z.number().nullable(),
  alternate_names: z.string().nullable(),
});

const cityRowsSchema = z.array(cityRowSchema);

type CityRow = z.infer<typeof cityRowSchema>;

const COLUMNS =
  "name, latitude, longitude, country_code, population, alternate_names";

/**
 * Escape LIKE wildcards so user text matches literally.
 */
export function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, (c) => `\\${c}`);
}

function toEntry(row: CityRow): GeocodeEntry {
  return {
    name: row.name,
    coordinate: { latitude: row.latitude, longitude: row.longitude },
    countryCode: row.country_code,
    population: row.population ?? 0,
    alternateNames: row.alternate_names
      ? row.alternate_names
          .split(",")
          .map((n) => n.trim())
          .filter((n) => n.length > 0)
      : [],
  };
}

export class SqliteGazetteerStore implements GazetteerStore {
  private readonly db: Database.Database;
  private readonly exactStmt: Database.Statement;
  private readonly prefixStmt: Database.Statement;
  private readonly alternateStmt: Database.Statement;

  constructor(db: Database.Database) {
    this.db = db;
    this.exactStmt = db.prepare(
      `SELECT ${COLUMNS} FROM cities WHERE name = ? COLLATE NOCASE ORDER BY population DESC LIMIT ?`
    );
    this.prefixStmt = db.prepare(
      `SELECT ${COLUMNS} FROM cities WHERE name LIKE ? ESCAPE '\\' ORDER BY population DESC LIMIT ?`
    );
    this.alternateStmt = db.prepare(
      `SELECT ${COLUMNS} FROM cities WHERE alternate_names LIKE ? ESCAPE '\\' ORDER BY population DESC LIMIT ?`
    );
  }

  /**
   * Open a gazetteer database file read-only.
   */
  static open(path: string): SqliteGazetteerStore {
    return new SqliteGazetteerStore(
      new Database(path, { readonly: true, fileMustExist: true })
    );
  }

  exactMatch(name: string, limit: number): GeocodeEntry[] {
    return this.run(this.exactStmt, name.trim(), limit);
  }

  prefixMatch(prefix: string, limit: number): GeocodeEntry[] {
    return this.run(this.prefixStmt, `${escapeLike(prefix.trim())}%`, limit);
  }

  substringMatch(text: string, limit: number): GeocodeEntry[] {
    return this.run(this.alternateStmt, `%${escapeLike(text.trim())}%`, limit);
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private run(
    stmt: Database.Statement,
    param: string,
    limit: number
  ): GeocodeEntry[] {
    return cityRowsSchema.parse(stmt.all(param, limit)).map(toEntry);
  }
}
