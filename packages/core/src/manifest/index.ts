export { loadSuites, type LoadSuitesOptions } from './load.js'
export { parseSuite, type ParseSuiteOptions } from './parse.js'
export {
  findSuiteFile,
  parseSuiteJson,
  parseSuiteToml,
  readSuiteFile,
  SUITE_FILENAMES,
} from './suite-file.js'
export {
  type ParseResult,
  parseDependencyRef,
  parseLayoutEntry,
  parseModuleExport,
} from './tokens.js'
