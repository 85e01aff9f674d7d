// =============================================================================
// SEALED RATINGS — Protocol Errors
//
// Permanent rejections carry a machine-readable reason. Anything that is
// not a ProtocolError is treated as fatal by the HTTP layer.
// =============================================================================

export type ProtocolFailure =
  | 'AlreadyRevealed'
  | 'SubjectNotFound'
  | 'RecordNotFound'
  | 'UnknownRequest'
  | 'RequestExpired'
  | 'InvalidProof'
  | 'MalformedPayload'
  | 'MalformedCiphertext'
  | 'SubjectAlreadyRegistered'
  | 'InvalidSubjectId';

/** HTTP status each rejection maps to */
export const FAILURE_STATUS: Record<ProtocolFailure, number> = {
  AlreadyRevealed: 409,
  SubjectNotFound: 404,
  RecordNotFound: 404,
  UnknownRequest: 404,
  RequestExpired: 410,
  InvalidProof: 403,
  MalformedPayload: 422,
  MalformedCiphertext: 400,
  SubjectAlreadyRegistered: 409,
  InvalidSubjectId: 400,
};

export class ProtocolError extends Error {
  readonly reason: ProtocolFailure;

  constructor(reason: ProtocolFailure, message: string) {
    super(message);
    this.name = 'ProtocolError';
    this.reason = reason;
  }

  get status(): number {
    return FAILURE_STATUS[this.reason];
  }
}

export function isProtocolError(err: unknown, reason?: ProtocolFailure): err is ProtocolError {
  return err instanceof ProtocolError && (reason === undefined || err.reason === reason);
}
