export {
  FormatterOptionsSchema,
  resolveOptions,
  type FormatterOptions,
  type ResolvedFormatterOptions,
} from "./options.js";
