/**
 * Symbol Table exports
 */

export { SymbolTable, type EnumTable } from './table.js';
export {
  DEFAULT_TABLE_PATH,
  MAX_PROTOCOL,
  MAX_ATOM,
  MAX_ENUM_CODE,
  parseArgParam,
  formatArgParam,
  checkSignature,
  buildSymbolTable,
  loadSymbolTable,
  getDefaultSymbolTable,
} from './loader.js';
