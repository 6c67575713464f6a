import { describe, expect, it } from "vitest";
import { PreconditionError } from "./errors.js";
import { parseStoreOptions } from "./config.js";

describe("parseStoreOptions", () => {
  it("trims the uri and defaults driver settings", () => {
    expect(parseStoreOptions({ uri: "  bolt://localhost:7687 " })).toEqual({
      uri: "bolt://localhost:7687",
      driver: {},
    });
  });

  it("keeps credentials, database and pool settings", () => {
    const options = parseStoreOptions({
      uri: "neo4j://graph:7687",
      auth: { username: "neo4j", password: "test-secret" },
      database: "identity",
      driver: { maxConnectionPoolSize: 10, connectionAcquisitionTimeout: 5000 },
    });
    expect(options.auth).toEqual({ username: "neo4j", password: "test-secret" });
    expect(options.database).toBe("identity");
    expect(options.driver.maxConnectionPoolSize).toBe(10);
  });

  it("reports a missing uri", () => {
    expect(() => parseStoreOptions({ uri: "   " })).toThrow(
      "Invalid store options: uri: uri is required",
    );
  });

  it("lists every problem in the error details", () => {
    try {
      parseStoreOptions({ uri: "", driver: { maxConnectionPoolSize: -1 } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(PreconditionError);
      if (error instanceof PreconditionError) {
        expect(error.details.problems).toEqual([
          "uri: uri is required",
          "driver.maxConnectionPoolSize: Number must be greater than 0",
        ]);
      }
    }
  });

  it("rejects a non-object", () => {
    expect(() => parseStoreOptions("bolt://localhost")).toThrow(
      "Invalid store options: options: Expected object, received string",
    );
  });
});
