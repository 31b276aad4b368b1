export {
  TemplateParser,
  ParseCursor,
  parseUInt,
  reportError,
  MAX_FORMAT_NUMBER,
} from "./parser.js";
