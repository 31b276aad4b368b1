import { describe, it, expect, vi } from "vitest";

import { char, custom, double, int, longDouble, pointer, str, uint, ulong } from "@/args/capture.js";
import type { Argument } from "@/args/types.js";
import { GrowableBuffer } from "@/buffer/growable-buffer.js";
import { FormatError } from "@/lib/errors.js";
import { formatDouble } from "@/render/float.js";
import { printfConverter } from "@/render/float-converter.js";
import { ArgumentRenderer, textLength } from "@/render/renderer.js";
import { EMPTY_SPEC, type FloatConverter, type FormatSpec } from "@/render/types.js";

function render(arg: Argument, spec: Partial<FormatSpec> = {}): string {
  const buffer = new GrowableBuffer();
  new ArgumentRenderer().render(buffer, arg, { ...EMPTY_SPEC, ...spec });
  return buffer.toString();
}

describe("ArgumentRenderer", () => {
  describe("char", () => {
    it("writes the character", () => {
      expect(render(char("a"))).toBe("a");
      expect(render(char("a"), { type: "c" })).toBe("a");
    });

    it("pads with trailing spaces", () => {
      expect(render(char("a"), { width: 3 })).toBe("a  ");
    });

    it("rejects other type codes", () => {
      expect(() => render(char("a"), { type: "s" })).toThrow("unknown format code 's' for char");
    });
  });

  describe("string", () => {
    it("left-aligns in the width", () => {
      expect(render(str("ab"), { width: 5 })).toBe("ab   ");
      expect(render(str("abc"), { width: 1, type: "s" })).toBe("abc");
    });

    it("counts the width in bytes", () => {
      expect(render(str("é"), { width: 4 })).toBe("é  ");
    });

    it("stops byte arrays at the first zero byte", () => {
      expect(render(str(Uint8Array.of(104, 105, 0, 120)))).toBe("hi");
    });

    it("uses an explicit size past zero bytes", () => {
      expect(render(str(Uint8Array.of(104, 105, 0, 120), 4))).toBe("hi\0x");
    });

    it("treats a leading zero byte as empty", () => {
      expect(textLength(str(Uint8Array.of(0, 65)))).toBe(0);
      expect(render(str(Uint8Array.of(0, 65)))).toBe("");
    });

    it("rejects other type codes", () => {
      expect(() => render(str("x"), { type: "d" })).toThrow("unknown format code 'd' for string");
    });
  });

  describe("pointer", () => {
    it("renders prefixed lowercase hex", () => {
      expect(render(pointer(255))).toBe("0xff");
      expect(render(pointer(0x1234), { type: "p" })).toBe("0x1234");
    });

    it("treats the width as a lower bound", () => {
      expect(render(pointer(255), { width: 10 })).toBe("      0xff");
      expect(render(pointer(0x1234), { width: 3 })).toBe("0x1234");
    });

    it("rejects other type codes", () => {
      expect(() => render(pointer(1), { type: "x" })).toThrow("unknown format code 'x' for pointer");
    });
  });

  describe("custom", () => {
    it("calls the renderer with the width and pads the result", () => {
      const renderer = vi.fn((value: number, width: number) => `<${value}:${width}>`);
      expect(render(custom(5, renderer), { width: 8 })).toBe("<5:8>   ");
      expect(renderer).toHaveBeenCalledWith(5, 8);
    });

    it("does not truncate longer output", () => {
      expect(render(custom({ x: 1 }), { width: 3 })).toBe('{"x":1}');
    });

    it("rejects any type code", () => {
      expect(() => render(custom(1), { type: "s" })).toThrow("unknown format code 's' for object");
    });
  });

  it("renders integers and doubles", () => {
    expect(render(int(-7), { width: 4 })).toBe("  -7");
    expect(render(double(0.5))).toBe("0.5");
    expect(render(longDouble(2.5), { precision: 2, type: "f" })).toBe("2.50");
    expect(() => render(double(1), { type: "d" })).toThrow("unknown format code 'd' for double");
  });

  it("names every integer and floating-point kind alike in type errors", () => {
    expect(() => render(uint(1), { type: "f" })).toThrow("unknown format code 'f' for integer");
    expect(() => render(ulong(1n), { type: "s" })).toThrow("unknown format code 's' for integer");
    expect(() => render(longDouble(1), { type: "x" })).toThrow("unknown format code 'x' for double");
  });
});

describe("formatDouble", () => {
  const spec: FormatSpec = { ...EMPTY_SPEC, precision: 10, type: "f" };

  it("converts once when the text fits", () => {
    const convert = vi.fn(printfConverter.convert);
    const buffer = new GrowableBuffer();
    formatDouble(buffer, 1 / 3, spec, false, { convert });
    expect(buffer.toString()).toBe("0.3333333333");
    expect(convert).toHaveBeenCalledTimes(1);
  });

  it("grows to the exact size and converts again when the text does not fit", () => {
    const convert = vi.fn(printfConverter.convert);
    const buffer = new GrowableBuffer(4);
    formatDouble(buffer, 1 / 3, spec, false, { convert });
    expect(buffer.toString()).toBe("0.3333333333");
    expect(buffer.capacity).toBe(12);
    expect(convert).toHaveBeenCalledTimes(2);
  });

  it("passes the extended marker to the converter", () => {
    const convert = vi.fn(printfConverter.convert);
    formatDouble(new GrowableBuffer(), 1, EMPTY_SPEC, true, { convert });
    expect(convert.mock.calls[0]?.[1]).toEqual({
      signPlus: false,
      zeroPad: false,
      width: 0,
      precision: undefined,
      type: "g",
      extended: true,
    });
  });

  it("fails when the converter never fits", () => {
    const greedy: FloatConverter = { convert: (_value, _directive, out) => out.length + 1 };
    expect(() => formatDouble(new GrowableBuffer(4), 1, EMPTY_SPEC, false, greedy)).toThrow(
      FormatError
    );
  });
});
