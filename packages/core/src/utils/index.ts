export { stripBom, isBlank, decodeCsv, parseCsvRows, isSupportedEncoding } from './csv.js';
