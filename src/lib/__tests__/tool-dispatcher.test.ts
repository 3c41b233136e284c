import { describe, it, expect, vi } from "vitest";
import Database from "better-sqlite3";
import { AirportQueryEngine } from "../airport-query";
import { ToolDispatcher } from "../tool-dispatcher";
import { classifyNotification } from "../notification-classifier";
import { toolResultText, type ToolResult } from "../mcp/types";
import type { DataSources } from "../stores/data-sources";
import {
  SqliteNotificationStore,
  type NotificationStore,
} from "../stores/notification-store";
import type { RulesDocument } from "@/types/rules";
import {
  InMemoryGazetteer,
  InMemoryNotificationStore,
  makeAirport,
  makeAirportStore,
  makeCity,
  makeNotification,
  makeRunway,
} from "@/test/fixtures";

const airports = [
  makeAirport("LFPO", 48.7233, 2.3794, {
    name: "Paris Orly",
    city: "Paris",
    type: "large_airport",
    pointOfEntry: true,
    runways: [makeRunway({ lengthFt: 11975, surface: "ASP", lighted: true })],
  }),
  makeAirport("LFPG", 49.0097, 2.5479, {
    name: "Paris Charles de Gaulle",
    city: "Paris",
    type: "large_airport",
    pointOfEntry: true,
  }),
  makeAirport("LFPN", 48.7519, 2.1061, {
    name: "Toussus-le-Noble",
    city: "Toussus-le-Noble",
    pointOfEntry: true,
    aipEntries: [{ section: "AD 2.6", field: "Fuel types", value: "100LL, JET A-1" }],
  }),
  makeAirport("LFOB", 49.4544, 2.1128, { name: "Beauvais-Tille", city: "Beauvais" }),
  makeAirport("LFAT", 50.5174, 1.6206, {
    name: "Le Touquet",
    city: "Le Touquet",
    pointOfEntry: true,
  }),
  makeAirport("EGKB", 51.3308, 0.0325, {
    name: "London Biggin Hill",
    city: "Bromley",
    country: "GB",
    pointOfEntry: true,
  }),
  makeAirport("EGTF", 51.3481, -0.5589, { name: "Fairoaks", city: "Chobham", country: "GB" }),
  makeAirport("EDDM", 48.3538, 11.7861, { name: "Munich", city: "Munich", country: "DE" }),
];

const cities = [
  makeCity("Paris", 48.8534, 2.3488, "FR", 2138551),
  makeCity("Bromley", 51.4057, 0.0143, "GB", 309392),
];

const notifications = [
  makeNotification("LFPN", "hours", 2, { summary: "PN 2 HR" }),
  makeNotification("LFOB", "business_day", 12, { summary: "PN previous working day" }),
  makeNotification("LFAT", "on_request", 24),
  makeNotification("EGKB", "hours", 4, { summary: "PNR 4 HR" }),
  makeNotification("LFPG", "h24"),
  makeNotification("EDDM", "hours", 72),
];

const rules: RulesDocument = {
  questions: [
    {
      id: "flight-plan",
      question: "Is a flight plan required?",
      answers_by_country: { FR: "Yes", GB: "Yes, with a GAR" },
    },
    {
      id: "transponder",
      question: "Is a transponder required?",
      answers_by_country: { DE: "Above 5000 ft" },
    },
  ],
};

function sources(overrides: Partial<DataSources> = {}): DataSources {
  return {
    airports: makeAirportStore(airports),
    gazetteer: new InMemoryGazetteer(cities),
    notifications: new InMemoryNotificationStore(notifications),
    rules,
    ...overrides,
  };
}

function ready(overrides: Partial<DataSources> = {}) {
  const dispatcher = new ToolDispatcher();
  dispatcher.initialize(sources(overrides));
  return dispatcher;
}

function call(
  dispatcher: ToolDispatcher,
  name: string,
  args: Record<string, unknown> = {}
): ToolResult {
  return dispatcher.dispatch({ name, arguments: args });
}

function text(result: ToolResult): string {
  if (!result.ok) {
    throw new Error(`expected success, got: ${result.message}`);
  }
  return result.text;
}

describe("ToolDispatcher lifecycle", () => {
  it("fails fast before initialization", () => {
    const dispatcher = new ToolDispatcher();
    expect(dispatcher.state).toBe("uninitialized");
    expect(call(dispatcher, "search_airports", { query: "Paris" })).toEqual({
      ok: false,
      message: "Tool dispatcher not initialized",
    });
  });

  it("releases its data sources once on close", () => {
    const release = vi.fn();
    const dispatcher = new ToolDispatcher();
    dispatcher.initialize(sources(), release);
    expect(dispatcher.state).toBe("ready");

    dispatcher.close();
    dispatcher.close();

    expect(release).toHaveBeenCalledTimes(1);
    expect(dispatcher.state).toBe("closed");
    expect(call(dispatcher, "search_airports", { query: "Paris" })).toEqual({
      ok: false,
      message: "Tool dispatcher not initialized",
    });
  });

  it("cannot be reinitialized after close", () => {
    const dispatcher = ready();
    dispatcher.close();
    expect(() => dispatcher.initialize(sources())).toThrow("Tool dispatcher has been closed");
  });

  it("rejects unknown tools", () => {
    expect(call(ready(), "fly_me")).toEqual({ ok: false, message: "Unknown tool: fly_me" });
  });

  it("reports unexpected failures as tool execution failures", () => {
    vi.spyOn(AirportQueryEngine.prototype, "searchByText").mockImplementation(() => {
      throw new Error("boom");
    });
    expect(call(ready(), "search_airports", { query: "Paris" })).toEqual({
      ok: false,
      message: "Tool execution failed: boom",
    });
  });

  it("reports a failing notifications database as unavailable", () => {
    const broken: NotificationStore = {
      queryByMaxHours: () => {
        throw new Error("database is locked");
      },
      groupByIcao: () => new Map(),
      get: () => undefined,
      close: () => {},
    };
    expect(call(ready({ notifications: broken }), "find_airports_by_notification")).toEqual({
      ok: false,
      message: "Notifications database not available: database is locked",
    });
  });
});

describe("search_airports", () => {
  it("lists matches", () => {
    expect(text(call(ready(), "search_airports", { query: "Paris" }))).toBe(
      "- LFPO: Paris Orly (Paris, FR)\n- LFPG: Paris Charles de Gaulle (Paris, FR)\n"
    );
  });

  it("accepts aliases and a limit", () => {
    expect(text(call(ready(), "search_airports", { city: "Paris", limit: "1" }))).toBe(
      "- LFPO: Paris Orly (Paris, FR)\n"
    );
  });

  it("scans every airport when only filters are given", () => {
    expect(text(call(ready(), "search_airports", { filters: { country: "gb" } }))).toBe(
      "- EGKB: London Biggin Hill (Bromley, GB)\n- EGTF: Fairoaks (Chobham, GB)\n"
    );
  });

  it("applies filters to text matches", () => {
    expect(
      text(
        call(ready(), "search_airports", {
          query: "Paris",
          filters: { exclude_large_airports: true },
        })
      )
    ).toBe("No airports found.");
  });

  it("filters by trip distance from an origin airport", () => {
    expect(
      text(
        call(ready(), "search_airports", {
          filters: { trip_distance: { from: "lfpo", max: 15 } },
        })
      )
    ).toBe("- LFPO: Paris Orly (Paris, FR)\n- LFPN: Toussus-le-Noble (Toussus-le-Noble, FR)\n");
  });

  it("rejects a non-numeric limit", () => {
    expect(call(ready(), "search_airports", { query: "Paris", limit: "ten" })).toEqual({
      ok: false,
      message: "Invalid 'limit' argument: expected a number",
    });
  });
});

describe("get_airport_details", () => {
  it("includes the notification requirement", () => {
    const details = text(call(ready(), "get_airport_details", { icao: "lfpn" }));
    expect(details.startsWith("LFPN - Toussus-le-Noble\n")).toBe(true);
    expect(details).toContain("Notification: 2h notice, PN 2 HR [Easy (≤12h)]\n");
  });

  it("requires an ICAO code", () => {
    expect(call(ready(), "get_airport_details")).toEqual({
      ok: false,
      message: "Missing 'icao' argument",
    });
  });

  it("leaves out the notification when its database fails", () => {
    const dispatcher = ready({
      notifications: new SqliteNotificationStore(new Database(":memory:")),
    });

    const result = call(dispatcher, "get_airport_details", { icao: "LFPN" });
    expect(result.ok).toBe(true);
    expect(text(result)).not.toContain("Notification:");

    expect(call(dispatcher, "find_airports_by_notification")).toEqual({
      ok: false,
      message:
        "Notifications database not available: no such table: ga_notification_requirements",
    });
  });

  it("reports unknown airports", () => {
    expect(call(ready(), "get_airport_details", { icao: "ZZZZ" })).toEqual({
      ok: false,
      message: "Airport not found: ZZZZ",
    });
  });
});

describe("find_airports_near_route", () => {
  it("lists airports along the route in order", () => {
    expect(
      text(
        call(ready(), "find_airports_near_route", {
          from: "LFPO",
          to: "lfat",
          max_distance_nm: 30,
        })
      )
    ).toBe(
      "Airports along route LFPO → LFAT (within 30 nm):\n" +
        "- LFPN (Toussus-le-Noble) - 48.7519°, 2.1061°\n" +
        "- LFPG (Paris Charles de Gaulle) - 49.0097°, 2.5479°\n" +
        "- LFOB (Beauvais-Tille) - 49.4544°, 2.1128°\n"
    );
  });

  it("applies filters without reordering", () => {
    expect(
      text(
        call(ready(), "find_airports_near_route", {
          from: "LFPO",
          to: "LFAT",
          max_distance_nm: 30,
          filters: { point_of_entry: true },
        })
      )
    ).toBe(
      "Airports along route LFPO → LFAT (within 30 nm):\n" +
        "- LFPN (Toussus-le-Noble) - 48.7519°, 2.1061°\n" +
        "- LFPG (Paris Charles de Gaulle) - 49.0097°, 2.5479°\n"
    );
  });

  it("anchors a place name on the nearest airport and says so", () => {
    const output = text(
      call(ready(), "find_airports_near_route", {
        from: "Bromley",
        to: "LFAT",
        max_distance_nm: 10,
      })
    );
    expect(output.startsWith("Airports along route Bromley → LFAT (within 10 nm):\n")).toBe(
      true
    );
    expect(output).toMatch(
      /^Note: Bromley resolved to Bromley; using nearest airport EGKB \(London Biggin Hill\), \d+\.\d nm away$/m
    );
  });

  it("reports an unknown airport code", () => {
    expect(call(ready(), "find_airports_near_route", { from: "LFPO", to: "ZZZZ" })).toEqual({
      ok: false,
      message: "Airport not found: ZZZZ",
    });
  });

  it("requires both endpoints", () => {
    expect(call(ready(), "find_airports_near_route", { from: "LFPO" })).toEqual({
      ok: false,
      message: "Missing 'to' argument",
    });
  });
});

describe("find_airports_near_location", () => {
  it("lists nearby airports with their notice", () => {
    expect(
      text(
        call(ready(), "find_airports_near_location", {
          location_query: "LFPO",
          max_distance_nm: 20,
        })
      )
    ).toBe(
      "Airports near LFPO (within 20 nm):\n" +
        "- LFPO (Paris Orly) - 48.7233°, 2.3794°\n" +
        "- LFPN (Toussus-le-Noble) - 48.7519°, 2.1061° - 2h notice, PN 2 HR\n" +
        "- LFPG (Paris Charles de Gaulle) - 49.0097°, 2.5479°\n"
    );
  });

  it("keeps only airports within the maximum notice", () => {
    expect(
      text(
        call(ready(), "find_airports_near_location", {
          location: "Paris",
          max_distance_nm: 30,
          max_hours: 12,
        })
      )
    ).toBe(
      "Airports near Paris (within 30 nm) with max 12h notice:\n" +
        "- LFPN (Toussus-le-Noble) - 48.7519°, 2.1061° - 2h notice, PN 2 HR\n"
    );
  });

  it("resolves the place the same way whatever the country filter", () => {
    const dispatcher = ready({
      airports: makeAirportStore([
        ...airports,
        makeAirport("CYXU", 43.0356, -81.1539, { name: "London Intl", country: "CA" }),
      ]),
      gazetteer: new InMemoryGazetteer([
        ...cities,
        makeCity("London", 51.5085, -0.1257, "GB", 8961989),
        makeCity("London", 42.9834, -81.233, "CA", 346765),
      ]),
    });

    expect(
      text(
        call(dispatcher, "find_airports_near_location", {
          location_query: "London",
          max_distance_nm: 15,
        })
      )
    ).toBe(
      "Airports near London (within 15 nm):\n" +
        "- EGKB (London Biggin Hill) - 51.3308°, 0.0325° - 4h notice, PNR 4 HR\n"
    );
    expect(
      text(
        call(dispatcher, "find_airports_near_location", {
          location_query: "London",
          max_distance_nm: 15,
          filters: { country: "CA" },
        })
      )
    ).toBe("Airports near London (within 15 nm):\nNo airports found matching the criteria.\n");
  });

  it("reports when nothing matches", () => {
    expect(
      text(
        call(ready(), "find_airports_near_location", {
          query: "48.0, -5.0",
          max_distance_nm: 10,
        })
      )
    ).toBe("Airports near 48.0, -5.0 (within 10 nm):\nNo airports found matching the criteria.\n");
  });

  it("reports an unknown location", () => {
    expect(call(ready(), "find_airports_near_location", { location_query: "Atlantis" })).toEqual({
      ok: false,
      message: "Could not find location: Atlantis",
    });
  });

  it("needs the notifications database for a notice limit", () => {
    expect(
      call(ready({ notifications: undefined }), "find_airports_near_location", {
        location_query: "LFPO",
        max_hours_notice: 12,
      })
    ).toEqual({ ok: false, message: "Notifications database not available" });
  });
});

describe("get_border_crossing_airports", () => {
  it("lists border crossing airports in a country", () => {
    expect(text(call(ready(), "get_border_crossing_airports", { country: "gb" }))).toBe(
      "Border Crossing Airports in GB:\n- EGKB: London Biggin Hill (Bromley, GB)\n"
    );
  });

  it("lists all border crossing airports", () => {
    expect(text(call(ready(), "get_border_crossing_airports"))).toBe(
      "Border Crossing Airports:\n" +
        "- LFPO: Paris Orly (Paris, FR)\n" +
        "- LFPG: Paris Charles de Gaulle (Paris, FR)\n" +
        "- LFPN: Toussus-le-Noble (Toussus-le-Noble, FR)\n" +
        "- LFAT: Le Touquet (Le Touquet, FR)\n" +
        "- EGKB: London Biggin Hill (Bromley, GB)\n"
    );
  });
});

describe("rules tools", () => {
  it("lists a country's rules", () => {
    expect(text(call(ready(), "list_rules_for_country", { country_code: "fr" }))).toBe(
      "Aviation Rules for FR:\n- Is a flight plan required?: Yes\n"
    );
  });

  it("fails for a country without rules", () => {
    expect(call(ready(), "list_rules_for_country", { country: "XX" })).toEqual({
      ok: false,
      message: "No rules found for country: XX",
    });
  });

  it("compares two countries", () => {
    expect(
      text(
        call(ready(), "compare_rules_between_countries", { country1: "FR", country2: "DE" })
      )
    ).toBe(
      "Rule Comparison: FR vs DE\n\n" +
        "**Is a flight plan required?**\n- FR: Yes\n- DE: N/A\n\n" +
        "**Is a transponder required?**\n- FR: N/A\n- DE: Above 5000 ft\n\n"
    );
  });

  it("requires both countries", () => {
    expect(call(ready(), "compare_rules_between_countries", { country1: "FR" })).toEqual({
      ok: false,
      message: "Missing 'country2' argument",
    });
  });

  it("needs the rules document", () => {
    expect(call(ready({ rules: undefined }), "list_rules_for_country", { country: "FR" })).toEqual(
      { ok: false, message: "Rules data not available" }
    );
  });
});

describe("find_airports_by_notification", () => {
  it("returns only easy airports for a 12 hour limit", () => {
    const dispatcher = ready();
    const output = text(call(dispatcher, "find_airports_by_notification", { max_hours: 12 }));
    expect(output).toBe(
      "Airports with notification requirements (max 12h notice):\n\n" +
        "• LFPN - 2h notice, PN 2 HR\n" +
        "• EGKB - 4h notice, PNR 4 HR\n"
    );

    const listed = [...output.matchAll(/^• (\w{4})/gm)].map((m) => m[1]);
    for (const icao of listed) {
      const record = notifications.find((n) => n.icao === icao);
      expect(record && classifyNotification(record)).toBe("easy");
    }
  });

  it("keeps 24/7 airports once the limit goes past easy", () => {
    const dispatcher = ready({
      notifications: new InMemoryNotificationStore([
        makeNotification("LFPG", "h24", 6, { summary: "H24" }),
        makeNotification("EDDM", "hours", 72),
      ]),
    });

    expect(text(call(dispatcher, "find_airports_by_notification", { max_hours: 100 }))).toBe(
      "Airports with notification requirements (max 100h notice):\n\n" +
        "• LFPG - 6h notice, H24\n" +
        "• EDDM - 72h notice\n"
    );
    expect(call(dispatcher, "find_airports_by_notification", { max_hours: 12 })).toEqual({
      ok: false,
      message: "No airports found with notification requirements under 12 hours",
    });
  });

  it("fills the limit past records outside the notice bucket", () => {
    const dispatcher = ready({
      notifications: new InMemoryNotificationStore([
        makeNotification("LFOB", "business_day", 1),
        makeNotification("LFAT", "on_request", 2),
        makeNotification("LFQQ", "business_day", 3),
        makeNotification("EGKB", "hours", 4),
      ]),
    });

    expect(
      text(call(dispatcher, "find_airports_by_notification", { max_hours: 12, limit: 1 }))
    ).toBe("Airports with notification requirements (max 12h notice):\n\n• EGKB - 4h notice\n");
  });

  it("orders by notice and honours the limit", () => {
    expect(text(call(ready(), "find_airports_by_notification", { limit: 1 }))).toBe(
      "Airports with notification requirements:\n\n• LFPN - 2h notice, PN 2 HR\n"
    );
  });

  it("filters by country", () => {
    expect(text(call(ready(), "find_airports_by_notification", { country: "gb" }))).toBe(
      "Airports with notification requirements in GB:\n\n• EGKB - 4h notice, PNR 4 HR\n"
    );
  });

  it("fails when nothing qualifies", () => {
    expect(call(ready(), "find_airports_by_notification", { max_hours_notice: 1 })).toEqual({
      ok: false,
      message: "No airports found with notification requirements under 1 hours",
    });
  });

  it("needs the notifications database", () => {
    expect(
      call(ready({ notifications: undefined }), "find_airports_by_notification")
    ).toEqual({ ok: false, message: "Notifications database not available" });
  });
});

describe("dispatchText", () => {
  it("runs a tool call embedded in text", () => {
    const result = ready().dispatchText(
      'Checking. {"name": "get_border_crossing_airports", "arguments": {"country": "GB"}}'
    );
    expect(toolResultText(result)).toBe(
      "Border Crossing Airports in GB:\n- EGKB: London Biggin Hill (Bromley, GB)\n"
    );
  });

  it("reports text without a tool call", () => {
    expect(toolResultText(ready().dispatchText("Biggin Hill is nice."))).toBe(
      "Error: No well-formed tool call found"
    );
  });
});
