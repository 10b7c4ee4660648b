export class WhoisError extends Error {
  suggestions: string[];
  retriable: boolean;

  constructor(
    message: string,
    suggestions: string[] = [],
    retriable = false
  ) {
    super(message);
    this.name = 'WhoisError';
    this.suggestions = suggestions;
    this.retriable = retriable;
  }
}

/**
 * Timeout phases for granular error reporting
 */
export type TimeoutPhase =
  | 'connect' // TCP connection
  | 'write'   // Query line upload
  | 'read';   // Waiting for the next chunk of the response

/**
 * Timeout error with phase information
 * Tells which step of the exchange with the WHOIS server stalled
 */
export class TimeoutError extends WhoisError {
  /**
   * Which phase of the exchange timed out
   */
  phase: TimeoutPhase;

  /**
   * The configured timeout for this phase (ms)
   */
  timeout: number;

  /**
   * WHOIS server being contacted
   */
  host?: string;

  /**
   * Event name for diagnostics/logging
   */
  event: string;

  constructor(options: { phase: TimeoutPhase; timeout: number; host?: string }) {
    const phaseMessages: Record<TimeoutPhase, string> = {
      connect: 'TCP connection timed out',
      write: 'Sending the WHOIS query timed out',
      read: 'Waiting for the WHOIS response timed out',
    };

    let message = `${phaseMessages[options.phase]} after ${options.timeout}ms`;
    if (options.host) {
      message += ` (${options.host})`;
    }

    super(
      message,
      [
        'Increase the WHOIS timeout for slower registries.',
        'Check network connectivity to the WHOIS server.',
        'Retry the query; some registries respond slowly under load.'
      ],
      true
    );
    this.name = 'TimeoutError';
    this.phase = options.phase;
    this.timeout = options.timeout;
    this.host = options.host;
    this.event = `timeout:${options.phase}`;
  }
}

/**
 * Error thrown when the connection to a WHOIS server cannot be established
 */
export class ConnectionError extends WhoisError {
  host?: string;
  port?: number;
  code?: string;

  constructor(
    message: string,
    options?: {
      host?: string;
      port?: number;
      code?: string;
      retriable?: boolean;
    }
  ) {
    super(
      message,
      [
        'Verify the WHOIS server is reachable and correct.',
        'Check network/firewall settings blocking WHOIS port 43.',
        'Retry the query; transient network issues can occur.'
      ],
      options?.retriable ?? true
    );
    this.name = 'ConnectionError';
    this.host = options?.host;
    this.port = options?.port;
    this.code = options?.code;
  }
}

/**
 * Error thrown when a lookup is aborted through its AbortSignal
 */
export class AbortError extends WhoisError {
  reason?: string;

  constructor(reason?: string) {
    super(
      reason || 'WHOIS lookup was aborted',
      [
        'Check if the abort was intentional (user-triggered or shutdown).',
        'Ensure the AbortController is not being triggered prematurely.'
      ],
      false
    );
    this.name = 'AbortError';
    this.reason = reason;
  }
}

/**
 * Error thrown when lookup options are invalid
 */
export class ValidationError extends WhoisError {
  field?: string;
  value?: unknown;

  constructor(
    message: string,
    options?: {
      field?: string;
      value?: unknown;
    }
  ) {
    super(
      message,
      [
        'Check the lookup options passed to resolve() or the client.',
        'Ports must be between 1 and 65535 and timeouts must be positive.'
      ],
      false
    );
    this.name = 'ValidationError';
    this.field = options?.field;
    this.value = options?.value;
  }
}

/**
 * Error thrown when text cannot be parsed into the expected value
 */
export class ParseError extends WhoisError {
  input?: string;

  constructor(message: string, options?: { input?: string }) {
    super(
      message,
      [
        'Use CIDR (10.0.0.0/8), dashed (10.0.0.0 - 10.255.255.255) or single-address notation.',
        'Both ends of a range must belong to the same address family.'
      ],
      false
    );
    this.name = 'ParseError';
    this.input = options?.input;
  }
}
