export type AnnotationErrorCode =
  | 'COLLABORATOR_UNAVAILABLE'
  | 'INVALID_CONFIGURATION'
  | 'MALFORMED_MARKUP'
  | 'STYLESHEET_ALREADY_ATTACHED';

export class AnnotationError extends Error {
  constructor(
    public readonly code: AnnotationErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AnnotationError';
  }
}
