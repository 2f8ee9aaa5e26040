'use strict';

export const supportedContentEncodings = {
  AES_128_GCM: 'aes128gcm',
} as const;

export type ContentEncoding =
  (typeof supportedContentEncodings)[keyof typeof supportedContentEncodings];

export const supportedUrgencies = {
  VERY_LOW: 'very-low',
  LOW: 'low',
  NORMAL: 'normal',
  HIGH: 'high',
} as const;

export type Urgency = (typeof supportedUrgencies)[keyof typeof supportedUrgencies];

/**
 * DEFAULT_TTL is four weeks in seconds
 */
export const DEFAULT_TTL = 2419200;

/**
 * DEFAULT_EXPIRATION_SECONDS is set to seconds in 12 hours
 */
export const DEFAULT_EXPIRATION_SECONDS = 12 * 60 * 60;

// Maximum expiration is 24 hours. (See RFC 8292)
export const MAX_EXPIRATION_SECONDS = 24 * 60 * 60;

// RFC 8291 caps a push message at a single 4096 octet record.
export const RECORD_SIZE = 4096;

// RFC 8030 topics are at most 32 characters of the URL-safe base64 alphabet.
export const MAX_TOPIC_LENGTH = 32;
