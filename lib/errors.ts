export type ConfigurationErrorCode =
  | 'INVALID_LINK'
  | 'INVALID_PORT'
  | 'INVALID_TIMEOUT'
  | 'INVALID_CONCURRENCY'
  | 'INVALID_TOP'
  | 'INVALID_ADDRESS'
  | 'UNREADABLE_LIST'
  | 'REJECTED_LINES';

/**
 * Input or configuration problem detected before any probing starts.
 * Network failures during probing are never reported this way.
 */
export class ConfigurationError extends Error {
  readonly code: ConfigurationErrorCode;

  constructor(code: ConfigurationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
    this.code = code;
  }
}

export class NodeLinkError extends ConfigurationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_LINK', message, options);
    this.name = 'NodeLinkError';
  }
}
