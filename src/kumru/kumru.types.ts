export interface AskRequest {
  question: string;
}

export interface KumruResponse {
  kumru_response: string;
}

export interface HealthResponse {
  status: string;
}

export interface PdfPage {
  /** 1-based position in the document. */
  pageNumber: number;
  /** Trimmed plain text of the page; empty when the page has no text layer. */
  text: string;
}

export interface GenerateRequest {
  model: string;
  prompt: string;
  stream: false;
}

export interface GenerateResponse {
  response?: string;
}
