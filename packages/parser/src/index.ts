export type { IParser } from "./parser.interface.js";
export { TextParser } from "./text-parser.js";
export { CsvParser, readCsvRows } from "./csv-parser.js";
export { DocxParser, extractDocxParagraphs } from "./docx-parser.js";
export { decodeText } from "./decode.js";
export { getParser, parseDocument, extensionOf, supportedExtensions } from "./factory.js";
