export type { IPageSource } from "./page-source.interface.js";
export { clampRange, collectPages } from "./page-source.interface.js";
export { InMemoryPageSource } from "./memory-page-source.js";
export { PdfPageSource, joinTextItems } from "./pdf-page-source.js";
export type { TextRun, MarkedContent } from "./pdf-page-source.js";
