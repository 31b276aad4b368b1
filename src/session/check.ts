import { char, custom, double, int, long, longDouble, pointer, str, uint, ulong } from "../args/capture.js";
import type { Argument, ArgumentKind } from "../args/types.js";
import { FormatError } from "../lib/errors.js";
import { err, ok, type Result } from "../lib/result.js";

import { Formatter } from "./formatter.js";

function sampleArgument(kind: ArgumentKind): Argument {
  switch (kind) {
    case "int":
      return int(0);
    case "uint":
      return uint(0);
    case "long":
      return long(0n);
    case "ulong":
      return ulong(0n);
    case "double":
      return double(0);
    case "longDouble":
      return longDouble(0);
    case "char":
      return char("x");
    case "string":
      return str("");
    case "pointer":
      return pointer(0);
    case "custom":
      return custom(null);
  }
}

/**
 * Check a template against argument kinds without real values.
 * Renders once with a placeholder value of each kind.
 */
export function checkTemplate(template: string, kinds: readonly ArgumentKind[]): Result<void, FormatError> {
  const session = new Formatter().format(template).insertAll(kinds.map(sampleArgument));
  try {
    session.finish();
    return ok(undefined);
  } catch (error) {
    if (error instanceof FormatError) {
      return err(error);
    }
    throw error;
  }
}
