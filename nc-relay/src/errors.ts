export type NcErrorCode = "ERR_NC_CONFIG" | "ERR_NC_DIAL" | "ERR_NC_HANDSHAKE" | "ERR_NC_LISTEN";

export class NcError extends Error {
  override name = "NcError";
  readonly code: NcErrorCode;

  constructor(code: NcErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
  }
}
