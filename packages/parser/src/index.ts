export type { IParser } from "./parser.interface.js";
export { PdfParser, hasPdfHeader, loadWithPdfParse } from "./pdf-parser.js";
export type { PdfTextLoader, RawPdfText } from "./pdf-parser.js";
export { cleanText } from "./clean-text.js";
export { joinPages, pageNumberAt } from "./pages.js";
export type { JoinedPages } from "./pages.js";
