export type BridgeErrorKind =
  | 'injection'
  | 'timeout'
  | 'process'
  | 'decode'
  | 'malformed_record'
  | 'date_format'
  | 'security'
  | 'request';

export class BridgeError extends Error {
  readonly kind: BridgeErrorKind;

  constructor(kind: BridgeErrorKind, message: string) {
    super(message);
    this.name = 'BridgeError';
    this.kind = kind;
  }
}

// Raised before any process is spawned when a parameter cannot be encoded.
export class InjectionError extends BridgeError {
  readonly parameter: string;

  constructor(parameter: string, message: string) {
    super('injection', `Cannot inject parameter "${parameter}": ${message}`);
    this.name = 'InjectionError';
    this.parameter = parameter;
  }
}

export class DateFormatError extends BridgeError {
  constructor(message: string) {
    super('date_format', message);
    this.name = 'DateFormatError';
  }
}

export class RequestError extends BridgeError {
  constructor(message: string) {
    super('request', message);
    this.name = 'RequestError';
  }
}

export class SecurityError extends BridgeError {
  readonly pattern: string;

  constructor(pattern: string) {
    super('security', `Potentially dangerous pattern detected: ${pattern}`);
    this.name = 'SecurityError';
    this.pattern = pattern;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
