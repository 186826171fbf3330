/**
 * Transport Interface
 *
 * The request/response channel to the instrument. One command string
 * in, one reply string out. Implementations raise DeviceError on any
 * communication failure or device-reported fault and never retry.
 */

export interface SendOptions {
  /**
   * Added to the reply timeout for a command the device answers only
   * after a known delay, such as a wait for the next data update.
   */
  extraTimeoutMs?: number;
}

export interface Transport {
  /** Human-readable target, e.g. "192.168.1.40:10001" or "emulator" */
  readonly target: string;

  send(command: string, options?: SendOptions): Promise<string>;

  close(): Promise<void>;
}

/** Reply prefix the gateway uses for device-reported errors */
export const ERROR_REPLY_PREFIX = 'ERR';

export interface ErrorReply {
  code: number;
  message: string;
}

/**
 * Parse `ERR <code>[,<message>]`. Returns undefined for ordinary replies.
 */
export function parseErrorReply(reply: string): ErrorReply | undefined {
  const match = /^ERR\s+(-?\d+)\s*(?:,\s*"?(.*?)"?)?$/.exec(reply.trim());
  if (!match) return undefined;
  return {
    code: parseInt(match[1], 10),
    message: match[2] ? match[2] : 'Device error',
  };
}

export function formatErrorReply(code: number, message: string): string {
  return `${ERROR_REPLY_PREFIX} ${code},"${message}"`;
}
