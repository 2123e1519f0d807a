/**
 * Parser exports
 */

export {
  FactParser,
  type ParsedFile,
  type ParseError,
  type ParseContext,
  type ParserOptions,
} from './base.js';
export { TypeScriptParser } from './typescript.js';
