import { describe, expect, test } from "vitest";
import { formatBytes, formatDuration, formatLogTimestamp } from "../../src/utils/format";
import {
  DEFAULT_ARTIFACT_EXTENSION,
  formatArtifactTimestamp,
  generateArtifactName,
  isArtifactName,
  parseArtifactName,
} from "../../src/utils/naming";

// Local time: 5 March 2024, 07:08:09
const SAMPLE_DATE = new Date(2024, 2, 5, 7, 8, 9);

describe("naming utilities", () => {
  describe("formatArtifactTimestamp", () => {
    test("zero-pads every component to second precision", () => {
      expect(formatArtifactTimestamp(SAMPLE_DATE)).toBe("2024-03-05-07-08-09");
    });

    test("uses two-digit month and day for late dates", () => {
      expect(formatArtifactTimestamp(new Date(2023, 11, 31, 23, 59, 58))).toBe("2023-12-31-23-59-58");
    });
  });

  describe("formatLogTimestamp", () => {
    test("formats as YYYY-MM-DD HH:MM:SS", () => {
      expect(formatLogTimestamp(SAMPLE_DATE)).toBe("2024-03-05 07:08:09");
    });
  });

  describe("generateArtifactName", () => {
    test("follows database_timestamp.sql.gz by default", () => {
      expect(generateArtifactName("shop", SAMPLE_DATE)).toBe("shop_2024-03-05-07-08-09.sql.gz");
    });

    test("uses a custom extension", () => {
      expect(generateArtifactName("shop", SAMPLE_DATE, ".sql.zst")).toBe("shop_2024-03-05-07-08-09.sql.zst");
    });

    test("appends the collision sequence before the extension", () => {
      expect(generateArtifactName("shop", SAMPLE_DATE, DEFAULT_ARTIFACT_EXTENSION, 2)).toBe(
        "shop_2024-03-05-07-08-09-2.sql.gz",
      );
    });
  });

  describe("parseArtifactName", () => {
    test("parses a generated name", () => {
      expect(parseArtifactName("shop_2024-03-05-07-08-09.sql.gz")).toEqual({
        databaseName: "shop",
        timestamp: "2024-03-05-07-08-09",
        sequence: 0,
      });
    });

    test("keeps underscores in the database name", () => {
      expect(parseArtifactName("my_shop_db_2024-03-05-07-08-09-3.sql.gz")).toEqual({
        databaseName: "my_shop_db",
        timestamp: "2024-03-05-07-08-09",
        sequence: 3,
      });
    });

    test("rejects other extensions", () => {
      expect(parseArtifactName("shop_2024-03-05-07-08-09.sql")).toBeNull();
    });

    test("treats the extension literally", () => {
      expect(parseArtifactName("shop_2024-03-05-07-08-09xsqlxgz")).toBeNull();
    });

    test("rejects names without a timestamp", () => {
      expect(isArtifactName("notes.sql.gz")).toBe(false);
      expect(isArtifactName("shop_2024-03-05.sql.gz")).toBe(false);
    });
  });

  describe("formatBytes", () => {
    test("formats bytes", () => {
      expect(formatBytes(0)).toBe("0 B");
      expect(formatBytes(512)).toBe("512 B");
      expect(formatBytes(1536)).toBe("1.5 KB");
      expect(formatBytes(5 * 1024 * 1024)).toBe("5 MB");
    });
  });

  describe("formatDuration", () => {
    test("formats durations", () => {
      expect(formatDuration(250)).toBe("250ms");
      expect(formatDuration(1500)).toBe("1.5s");
      expect(formatDuration(125000)).toBe("2m 5s");
    });
  });
});
