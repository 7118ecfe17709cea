/**
 * Unit tests for CLI settings resolution
 */

import { describe, it, expect } from "vitest";
import { homedir } from "node:os";
import * as path from "node:path";
import { expandTilde, isVerbose, resolveCliSettings } from "../src/lib/env.js";

describe("CLI settings", () => {
  describe("resolveCliSettings", () => {
    it("should prefer options over the environment", () => {
      const settings = resolveCliSettings(
        { root: "/cli/path", user: "ada" },
        { ANNOSTORE_ROOT: "/env/path", ANNOSTORE_USER: "ed" }
      );

      expect(settings).toEqual({
        root: path.resolve("/cli/path"),
        user: "ada",
        baseUrl: undefined,
        verbose: false,
      });
    });

    it("should fall back to the environment", () => {
      const settings = resolveCliSettings(
        {},
        {
          ANNOSTORE_ROOT: "~/annotations",
          ANNOSTORE_USER: "ed",
          ANNOSTORE_BASE_URL: "https://annotations.example.org",
          ANNOSTORE_CLI_DEBUG: "true",
        }
      );

      expect(settings).toEqual({
        root: path.join(homedir(), "annotations"),
        user: "ed",
        baseUrl: "https://annotations.example.org",
        verbose: true,
      });
    });

    it("should default to ./data as the superuser", () => {
      const settings = resolveCliSettings({}, { ANNOSTORE_USER: "  ", ANNOSTORE_ROOT: "" });

      expect(settings.root).toBe(path.join(process.cwd(), "data"));
      expect(settings.user).toBeUndefined();
      expect(settings.verbose).toBe(false);
    });

    it("should turn on verbose output from the flag alone", () => {
      expect(resolveCliSettings({ verbose: true }, {}).verbose).toBe(true);
    });
  });

  describe("expandTilde", () => {
    it("should expand ~ alone and leave ~user untouched", () => {
      expect(expandTilde("~")).toBe(homedir());
      expect(expandTilde("~someone/data")).toBe("~someone/data");
      expect(expandTilde("/abs/~/x")).toBe("/abs/~/x");
    });
  });

  describe("isVerbose", () => {
    it("should follow ANNOSTORE_CLI_DEBUG", () => {
      expect(isVerbose({ ANNOSTORE_CLI_DEBUG: "1" })).toBe(true);
      expect(isVerbose({ ANNOSTORE_CLI_DEBUG: "TRUE" })).toBe(true);
      expect(isVerbose({ ANNOSTORE_CLI_DEBUG: "0" })).toBe(false);
      expect(isVerbose({})).toBe(false);
    });
  });
});
