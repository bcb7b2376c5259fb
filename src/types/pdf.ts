export interface PDFTextContent {
  text: string;
  x: number;
  y: number;
  width: number;
  height: number;
  fontSize: number;
  rotation?: number;
  hasEOL?: boolean;
}

export interface PDFPageText {
  pageNumber: number;
  items: PDFTextContent[];
}
