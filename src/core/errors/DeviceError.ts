/**
 * Error kinds reported per device in a dispatch
 */
export enum ErrorKind {
  CONNECT_FAULT = 'CONNECT_FAULT',
  COMMS_FAULT = 'COMMS_FAULT',
  PROTOCOL_ERROR = 'PROTOCOL_ERROR',
  RESOLUTION_ERROR = 'RESOLUTION_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR'
}

/**
 * Error codes a PJLink device can answer with
 */
export enum PJLinkErrorCode {
  UNDEFINED_COMMAND = 'ERR1',
  OUT_OF_PARAMETER = 'ERR2',
  UNAVAILABLE_TIME = 'ERR3',
  PROJECTOR_FAILURE = 'ERR4',
  AUTHENTICATION = 'ERRA'
}

const PJLINK_ERROR_TEXT: Record<PJLinkErrorCode, string> = {
  [PJLinkErrorCode.UNDEFINED_COMMAND]: 'undefined command',
  [PJLinkErrorCode.OUT_OF_PARAMETER]: 'out of parameter',
  [PJLinkErrorCode.UNAVAILABLE_TIME]: 'unavailable at this time',
  [PJLinkErrorCode.PROJECTOR_FAILURE]: 'projector/display failure',
  [PJLinkErrorCode.AUTHENTICATION]: 'authentication required'
};

export function describePJLinkError(code: PJLinkErrorCode): string {
  return PJLINK_ERROR_TEXT[code];
}

/**
 * Base class for every error the fleet reports
 */
export class DeviceError extends Error {
  public readonly kind: ErrorKind;
  public readonly deviceId?: string;
  public readonly context: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    kind: ErrorKind,
    message: string,
    deviceId?: string,
    context: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'DeviceError';
    this.kind = kind;
    this.deviceId = deviceId;
    this.context = context;
    this.timestamp = new Date();

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Whether a fresh connection could plausibly change the outcome
   */
  get recoverable(): boolean {
    return false;
  }

  toJSON() {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      deviceId: this.deviceId,
      context: this.context,
      timestamp: this.timestamp.toISOString()
    };
  }
}

/**
 * TCP connect failed or timed out
 */
export class ConnectFault extends DeviceError {
  constructor(message: string, deviceId?: string, endpoint?: string) {
    super(ErrorKind.CONNECT_FAULT, message, deviceId, { endpoint });
    this.name = 'ConnectFault';
  }

  get recoverable(): boolean {
    return true;
  }
}

/**
 * Read timeout, peer close, write failure or an undecodable reply
 */
export class CommsFault extends DeviceError {
  constructor(message: string, deviceId?: string, context: Record<string, unknown> = {}) {
    super(ErrorKind.COMMS_FAULT, message, deviceId, context);
    this.name = 'CommsFault';
  }

  get recoverable(): boolean {
    return true;
  }
}

/**
 * Well-formed error reply from the device
 */
export class ProtocolError extends DeviceError {
  public readonly code: PJLinkErrorCode;

  constructor(code: PJLinkErrorCode, deviceId?: string, command?: string) {
    super(
      ErrorKind.PROTOCOL_ERROR,
      `Device rejected ${command ?? 'command'}: ${describePJLinkError(code)} (${code})`,
      deviceId,
      { code, command }
    );
    this.name = 'ProtocolError';
    this.code = code;
  }
}

/**
 * Unknown nickname, alias or group
 */
export class ResolutionError extends DeviceError {
  constructor(message: string, name?: string) {
    super(ErrorKind.RESOLUTION_ERROR, message, undefined, { name });
    this.name = 'ResolutionError';
  }
}

/**
 * Invalid or conflicting configuration found at load time
 */
export class ConfigurationError extends DeviceError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(ErrorKind.CONFIGURATION_ERROR, message, undefined, { issues });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
