import { describe, it, expect } from "vitest";

import {
  TypefmtError,
  FormatError,
  ArgumentError,
  SessionError,
  ConfigError,
} from "@/lib/errors.js";

describe("Error Classes", () => {
  describe("TypefmtError", () => {
    it("carries message and code", () => {
      const error = new TypefmtError("Something broke", "BROKEN");
      expect(error.message).toBe("Something broke");
      expect(error.name).toBe("TypefmtError");
      expect(error.code).toBe("BROKEN");
      expect(error).toBeInstanceOf(Error);
    });

    it("keeps the context object", () => {
      const context = { position: 3 };
      const error = new TypefmtError("Something broke", "BROKEN", context);
      expect(error.context).toBe(context);
    });

    it("has a stack trace", () => {
      const error = new TypefmtError("Something broke", "BROKEN");
      expect(error.stack).toContain("Something broke");
    });

    it("serializes to JSON", () => {
      const error = new TypefmtError("Something broke", "BROKEN", { position: 3 });
      expect(error.toJSON()).toEqual({
        name: "TypefmtError",
        code: "BROKEN",
        message: "Something broke",
        context: { position: 3 },
      });
    });
  });

  describe("subclasses", () => {
    it.each([
      [new FormatError("bad template"), "FormatError", "FORMAT_ERROR"],
      [new ArgumentError("bad value"), "ArgumentError", "ARGUMENT_ERROR"],
      [new SessionError("bad session"), "SessionError", "SESSION_ERROR"],
      [new ConfigError("bad config"), "ConfigError", "CONFIG_ERROR"],
    ])("%s has name and code", (error, name, code) => {
      expect(error.name).toBe(name);
      expect(error.code).toBe(code);
      expect(error).toBeInstanceOf(TypefmtError);
    });

    it("passes context through", () => {
      const error = new FormatError("unmatched '}' in format", { position: 4 });
      expect(error.context).toEqual({ position: 4 });
    });
  });
});
