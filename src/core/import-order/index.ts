/**
 * @arch fmtkit.core.barrel
 */
export { resolveImportOrder, parseImportOrder, DEFAULT_IMPORT_ORDER } from './resolver.js';
export {
  sortImports,
  groupImports,
  findGroup,
  parseImportLine,
  type ImportSortOptions,
  type JavaImport,
} from './sorter.js';
