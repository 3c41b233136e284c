import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import { loadConfig, type EngineConfig } from "@/lib/config";
import { DataSourceUnavailableError } from "@/lib/errors";
import { ToolDispatcher } from "@/lib/tool-dispatcher";
import { openDataSources, withDataSources } from "../data-sources";

const dataFile = (name: string) =>
  fileURLToPath(new URL(`../../../../data/${name}`, import.meta.url));

function config(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return {
    ...loadConfig({}),
    airportsPath: dataFile("airports.json"),
    rulesPath: dataFile("rules.json"),
    gazetteerPath: dataFile("missing-cities.db"),
    notificationsPath: dataFile("missing-notifications.db"),
    ...overrides,
  };
}

describe("openDataSources", () => {
  it("opens the snapshot and leaves missing optional stores unset", () => {
    const sources = openDataSources(config());
    expect(sources.airports.all()).toHaveLength(18);
    expect(sources.rules?.questions).toHaveLength(4);
    expect(sources.gazetteer).toBeUndefined();
    expect(sources.notifications).toBeUndefined();
    sources.close();
  });

  it("fails when the airport snapshot is missing", () => {
    expect(() => openDataSources(config({ airportsPath: dataFile("nope.json") }))).toThrow(
      DataSourceUnavailableError
    );
  });

  it("passes the sources to a callback", async () => {
    const count = await withDataSources(config(), (sources) => sources.airports.all().length);
    expect(count).toBe(18);
  });
});

describe("ToolDispatcher.fromConfig", () => {
  it("serves airport tools and reports the missing databases", () => {
    const dispatcher = ToolDispatcher.fromConfig(config({ searchLimit: 1 }));

    expect(dispatcher.dispatch({ name: "search_airports", arguments: { query: "Paris" } })).toEqual({
      ok: true,
      text: "- LFPG: Paris Charles de Gaulle (Paris, FR)\n",
    });
    expect(dispatcher.dispatch({ name: "find_airports_by_notification", arguments: {} })).toEqual({
      ok: false,
      message: "Notifications database not available",
    });

    dispatcher.close();
    expect(dispatcher.state).toBe("closed");
  });
});
