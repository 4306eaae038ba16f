/**
 * Typed signals raised by the transport adapters. Nothing above the adapters
 * inspects library error messages; it only checks these classes.
 */

/** The source transport asked us to wait before the next request. */
export class RateLimitError extends Error {
  readonly seconds: number;

  constructor(seconds: number) {
    super(`rate limited, retry after ${seconds}s`);
    this.name = "RateLimitError";
    this.seconds = seconds;
  }
}

export class ChannelInaccessibleError extends Error {
  constructor(channelId: string, reason: string) {
    super(`channel ${channelId} is private or not accessible: ${reason}`);
    this.name = "ChannelInaccessibleError";
  }
}

export class EntityNotFoundError extends Error {
  constructor(channelId: string, reason: string) {
    super(`could not resolve channel ${channelId}: ${reason}`);
    this.name = "EntityNotFoundError";
  }
}

export type DeliveryErrorKind = "markup_parse" | "not_found" | "transport";

/**
 * A failed delivery-transport call. `kind` separates markup rejections and
 * missing messages from every other transport failure.
 */
export class DeliveryError extends Error {
  readonly kind: DeliveryErrorKind;
  readonly code: number | null;

  constructor(kind: DeliveryErrorKind, message: string, code: number | null = null) {
    super(message);
    this.name = "DeliveryError";
    this.kind = kind;
    this.code = code;
  }
}

export function isDeliveryError(
  err: unknown,
  kind?: DeliveryErrorKind,
): err is DeliveryError {
  return err instanceof DeliveryError && (kind === undefined || err.kind === kind);
}
