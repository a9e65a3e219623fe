// Record normalizer
export { ParseResult, parseOFXContent, parseOFXDate } from './parsers/ofx-parser';

// Statement import
export { FileImportResult, ImportOptions, ImportSummary, importStatementFiles } from './importer';
