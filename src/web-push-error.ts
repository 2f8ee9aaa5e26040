'use strict';

export interface WebPushErrorOptions {
  cause?: unknown;
}

/**
 * Base class for every failure raised while building a push request or
 * reading the push service's answer.
 */
export class WebPushError extends Error {
  constructor(message: string, options?: WebPushErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    Error.captureStackTrace(this, new.target);
  }
}

/**
 * The subscriber's `p256dh` or `auth` value cannot be used. The subscription
 * itself is unusable and retrying will not help.
 */
export class KeyAgreementError extends WebPushError {}

export class PayloadTooLargeError extends WebPushError {
  readonly payloadLength: number;
  readonly maxPayloadLength: number;

  constructor(payloadLength: number, maxPayloadLength: number) {
    super(
      `Payload of ${payloadLength} bytes exceeds the maximum of ` +
        `${maxPayloadLength} bytes for a single record.`
    );
    this.payloadLength = payloadLength;
    this.maxPayloadLength = maxPayloadLength;
  }
}

export class InvalidSubjectError extends WebPushError {
  readonly subject: string;

  constructor(subject: string, message?: string, options?: WebPushErrorOptions) {
    super(
      message ??
        'The VAPID subject must be a "mailto:" address or an "https://" URL. ' +
          subject,
      options
    );
    this.subject = subject;
  }
}

export class InvalidVapidKeyError extends WebPushError {}

export class InvalidNotificationError extends WebPushError {}

export interface UnexpectedStatusDetails {
  endpoint?: string;
  headers?: Record<string, string>;
}

/**
 * The push service answered with a status code that says nothing certain
 * about the subscription. The caller decides whether to retry or drop it.
 */
export class UnexpectedStatusError extends WebPushError {
  readonly statusCode: number;
  readonly body: string;
  readonly endpoint?: string;
  readonly headers?: Record<string, string>;

  constructor(
    statusCode: number,
    body: string,
    details: UnexpectedStatusDetails = {}
  ) {
    super(`Received unexpected response code: [${statusCode}] - ${body}`);
    this.statusCode = statusCode;
    this.body = body;
    this.endpoint = details.endpoint;
    this.headers = details.headers;
  }
}

export class WebPushTransportError extends WebPushError {
  readonly endpoint: string;

  constructor(endpoint: string, options?: WebPushErrorOptions) {
    super(`Unable to deliver push message to ${endpoint}`, options);
    this.endpoint = endpoint;
  }
}
