export type CrossSellErrorCode = "SOURCE_UNAVAILABLE" | "NO_DATA" | "SAME_PRODUCT" | "INVALID_REQUEST";

export const STATUS_BY_CODE: Record<CrossSellErrorCode, number> = {
  SOURCE_UNAVAILABLE: 503,
  NO_DATA: 404,
  SAME_PRODUCT: 422,
  INVALID_REQUEST: 400
};

export class CrossSellError extends Error {
  readonly code: CrossSellErrorCode;

  constructor(code: CrossSellErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CrossSellError";
    this.code = code;
  }

  get status(): number {
    return STATUS_BY_CODE[this.code];
  }
}
