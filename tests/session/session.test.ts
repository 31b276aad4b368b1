import { describe, it, expect, vi } from "vitest";

import { char, custom, double, str, uint } from "@/args/capture.js";
import { ArgumentError, ConfigError, FormatError, SessionError } from "@/lib/errors.js";
import { checkTemplate } from "@/session/check.js";
import { begin, format, print, tryFormat, type OutputStream } from "@/session/entry.js";
import { Formatter } from "@/session/formatter.js";

function recorder(): OutputStream & { chunks: string[] } {
  const chunks: string[] = [];
  return {
    chunks,
    write(chunk: Uint8Array) {
      chunks.push(new TextDecoder().decode(chunk));
      return true;
    },
  };
}

describe("FormatSession", () => {
  it("renders inserted arguments", () => {
    expect(begin("{0}, {1}!").insert("Hello").insert("world").text()).toBe("Hello, world!");
  });

  it("renders nothing until finalized", () => {
    const renderer = vi.fn(() => "value");
    const session = begin("{0}").insert(custom(null, renderer));
    expect(renderer).not.toHaveBeenCalled();
    expect(session.finished).toBe(false);
    expect(session.argumentCount).toBe(1);
    expect(session.text()).toBe("value");
    expect(session.finished).toBe(true);
  });

  it("renders exactly once", () => {
    const renderer = vi.fn(() => "once");
    const session = begin("{0}").insert(custom(null, renderer));
    session.finish();
    expect(session.text()).toBe("once");
    expect(session.text()).toBe("once");
    session.view();
    expect(renderer).toHaveBeenCalledTimes(1);
  });

  it("returns a terminated view", () => {
    expect([...begin("ab").view()]).toEqual([0x61, 0x62, 0]);
  });

  it("rejects insertion after finalization", () => {
    const session = begin("{0}").insert(1);
    session.finish();
    expect(() => session.insert(2)).toThrow(SessionError);
  });

  it("rethrows the first failure on every later call", () => {
    const session = begin("{0:.2}").insert(1);
    const failures: unknown[] = [];
    for (const read of [() => session.text(), () => session.view(), () => session.finish()]) {
      try {
        read();
      } catch (error) {
        failures.push(error);
      }
    }
    expect(failures).toHaveLength(3);
    expect(failures[0]).toBeInstanceOf(FormatError);
    expect(failures[1]).toBe(failures[0]);
    expect(failures[2]).toBe(failures[0]);
  });

  it("rejects values that cannot be captured at insertion", () => {
    expect(() => begin("{0}").insert(JSON.parse("{}"))).toThrow(ArgumentError);
  });

  it("inserts several arguments at once", () => {
    expect(begin("{0}{1}{2}").insertAll(["a", char("b"), uint(3)]).text()).toBe("ab3");
  });

  describe("transfer", () => {
    it("hands the call to a new owner and disarms the old one", () => {
      const first = begin("{0}-{1}").insert(1);
      const second = first.transfer();
      expect(first.transferred).toBe(true);
      expect(() => first.insert(2)).toThrow(SessionError);
      expect(() => first.text()).toThrow("Format session was transferred to another owner");
      expect(second.insert(2).text()).toBe("1-2");
    });

    it("runs the finalizer only through the last owner", () => {
      const stream = recorder();
      const owner = print("x={0}", { stream }).insert(5).transfer().transfer();
      owner.finish();
      owner.finish();
      expect(stream.chunks).toEqual(["x=5"]);
    });
  });
});

describe("print", () => {
  it("writes the output when finished", () => {
    const stream = recorder();
    const session = print("n={0}", { stream }).insert(5);
    expect(stream.chunks).toEqual([]);
    session.finish();
    expect(stream.chunks).toEqual(["n=5"]);
  });

  it("writes nothing when rendering fails", () => {
    const stream = recorder();
    expect(() => print("{1}", { stream }).insert(5).finish()).toThrow(FormatError);
    expect(stream.chunks).toEqual([]);
  });
});

describe("Formatter", () => {
  it("appends successive calls to one buffer", () => {
    const out = new Formatter();
    out.format("Current point:\n").finish();
    out.format("({0:+f}, {1:+f})").insert(-3.5).insert(3.5).finish();
    expect(out.text()).toBe("Current point:\n(-3.500000, +3.500000)");
  });

  it("session text covers the whole formatter output", () => {
    const out = new Formatter();
    expect(out.format("a{0}").insert(1).text()).toBe("a1");
    expect(out.format("b").text()).toBe("a1b");
    expect(out.size).toBe(3);
  });

  it("refuses a new call while one is open", () => {
    const out = new Formatter();
    out.format("{0}");
    expect(() => out.format("next")).toThrow("The previous format call has not been finished");
    expect(() => out.clear()).toThrow(SessionError);
  });

  it("accepts a new call after a failed one", () => {
    const out = new Formatter();
    expect(() => out.format("}").finish()).toThrow(FormatError);
    expect(out.format("ok").text()).toBe("ok");
  });

  it("drops the partial output of a failed call", () => {
    const out = new Formatter();
    out.format("kept ").finish();
    expect(() => out.format("garbage{0:+}").insert(uint(1)).finish()).toThrow(
      "format specifier '+' requires signed argument"
    );
    expect(out.size).toBe(5);
    out.format("clean").finish();
    expect(out.text()).toBe("kept clean");
  });

  it("validates options", () => {
    expect(() => new Formatter({ inlineCapacity: 0 })).toThrow(ConfigError);
  });

  it("renders output larger than its inline capacity", () => {
    const out = new Formatter({ inlineCapacity: 8 });
    const text = "y".repeat(40);
    expect(out.format("{0}|{0}").insert(text).text()).toBe(`${text}|${text}`);
  });
});

describe("format", () => {
  it("formats in one call", () => {
    expect(format("{0} has {1:#x} flags", "file", uint(255))).toBe("file has 0xff flags");
  });

  it("renders long text unchanged", () => {
    const long = "abcdefghij".repeat(100);
    expect(format("{0}", long)).toBe(long);
    expect(format(long)).toBe(long);
  });

  it("renders more arguments than are stored inline", () => {
    const values = Array.from({ length: 12 }, (_, i) => i * 10);
    const template = values.map((_, i) => `{${i}}`).join(",");
    expect(format(template, ...values)).toBe("0,10,20,30,40,50,60,70,80,90,100,110");
  });

  it("needs double() for whole numbers under a float directive", () => {
    expect(() => format("{0:.2f}", 2)).toThrow("precision specifier requires floating-point argument");
    expect(format("{0:.2f}", double(2))).toBe("2.00");
    expect(format("{0:.2f}", 2.5)).toBe("2.50");
  });

  it("rounds exact ties to even", () => {
    expect(format("{0:.0f} {1:.1f}", double(2.5), double(-7.25))).toBe("2 -7.2");
  });

  it("renders text byte arrays", () => {
    expect(format("<{0}>", str(new TextEncoder().encode("bytes")))).toBe("<bytes>");
  });
});

describe("tryFormat", () => {
  it("returns the text on success", () => {
    expect(tryFormat("{0:.2f}", 2.5)).toEqual({ success: true, data: "2.50" });
  });

  it("returns format errors", () => {
    const result = tryFormat("{5}", 1, 2);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe("FORMAT_ERROR");
      expect(result.error.message).toBe("argument index is out of range in format");
    }
  });

  it("returns capture errors", () => {
    const result = tryFormat("{0}", JSON.parse("null"));
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(ArgumentError);
    }
  });

  it("lets other errors through", () => {
    const failing = custom(1, () => {
      throw new RangeError("renderer broke");
    });
    expect(() => tryFormat("{0}", failing)).toThrow(RangeError);
  });
});

describe("checkTemplate", () => {
  it("accepts templates that suit the kinds", () => {
    expect(checkTemplate("{0:.2f} {1:5} {2:#x}", ["double", "string", "ulong"])).toEqual({
      success: true,
      data: undefined,
    });
  });

  it("reports the first mismatch", () => {
    const result = checkTemplate("{0:+d}", ["uint"]);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe("format specifier '+' requires signed argument");
    }
  });

  it("reports missing arguments", () => {
    const result = checkTemplate("{0} {1}", ["int"]);
    expect(result.success).toBe(false);
  });
});
